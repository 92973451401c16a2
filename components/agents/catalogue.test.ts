import { describe, it, expect, vi, afterEach } from "vitest";
import { TASK_TYPES, loadKnowledgeDocuments, type Orchestrator, type Task } from "@agencyflow/core";
import { AGENCY_AGENTS } from "./catalogue.js";
import { DEFAULT_KNOWLEDGE_DIR, createAgencyOrchestrator } from "./create-agency-orchestrator.js";
import { clientResources, domainResources } from "./define-agent.js";

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }));
vi.mock("ai", () => ({ generateText }));

const orchestrators: Orchestrator[] = [];

afterEach(() => {
  for (const orchestrator of orchestrators.splice(0)) orchestrator.shutdown();
});

function task(payload: Record<string, unknown>): Task {
  return { id: "t1", type: "reporting", priority: "medium", payload, createdAt: 0, status: "running" };
}

describe("AGENCY_AGENTS", () => {
  it("holds fourteen agents with unique ids, executives first", () => {
    const ids = AGENCY_AGENTS.map((a) => a.id);

    expect(ids).toHaveLength(14);
    expect(new Set(ids).size).toBe(14);
    expect(AGENCY_AGENTS.slice(0, 2).map((a) => a.tier)).toEqual(["executive", "executive"]);
  });

  it("covers every task type", () => {
    const covered = new Set(AGENCY_AGENTS.flatMap((a) => a.capabilities));
    expect(TASK_TYPES.filter((type) => !covered.has(type))).toEqual([]);
  });

  it("ships a knowledge file for every agent", async () => {
    for (const agent of AGENCY_AGENTS) {
      const docs = await loadKnowledgeDocuments(DEFAULT_KNOWLEDGE_DIR, agent.tier, agent.id);
      expect(docs.map((d) => d.metadata.source)).toEqual([`${agent.tier}/${agent.id}.md`]);
    }
  });
});

describe("resource helpers", () => {
  it("keys domain resources on the payload domain", () => {
    const resources = domainResources("seo_data", "backlink_data");

    expect(resources(task({ domain: " example.com " }))).toEqual([
      { resourceType: "seo_data", key: "example.com" },
      { resourceType: "backlink_data", key: "example.com" },
    ]);
    expect(resources(task({}))).toEqual([]);
  });

  it("prefers the client id over the domain", () => {
    const resources = clientResources("client_data");

    expect(resources(task({ clientId: "client-7", domain: "example.com" })))
      .toEqual([{ resourceType: "client_data", key: "client-7" }]);
    expect(resources(task({ domain: "example.com" })))
      .toEqual([{ resourceType: "client_data", key: "example.com" }]);
  });
});

describe("createAgencyOrchestrator", () => {
  it("rejects agent ids outside the catalogue", async () => {
    await expect(createAgencyOrchestrator({ model: "test-model", agents: ["reporting", "astrologer"] }))
      .rejects.toThrow("Unknown agents: astrologer");
  });

  it("registers the selected agents and answers through the model", async () => {
    generateText.mockResolvedValue({ text: "Traffic grew 12%.", usage: { inputTokens: 50, outputTokens: 10 } });
    const orchestrator = await createAgencyOrchestrator({
      model: "test-model",
      agents: ["reporting", "link_building"],
    });
    orchestrators.push(orchestrator);

    expect(orchestrator.listAgents().map((a) => [a.id, a.enabledRetrieval, a.maxConcurrent])).toEqual([
      ["link_building", false, 3],
      ["reporting", false, 3],
    ]);

    const result = await orchestrator.run({ type: "reporting", payload: { domain: "example.com" } });

    expect(result).toMatchObject({
      ok: true,
      agentId: "reporting",
      result: {
        text: "Traffic grew 12%.",
        usage: { inputTokens: 50, outputTokens: 10, totalTokens: 60 },
        knowledgeSources: [],
        dataSources: ["fallback", "fallback"],
      },
    });
    expect(generateText).toHaveBeenCalledTimes(1);
  });
});
