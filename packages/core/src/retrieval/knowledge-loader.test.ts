import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadKnowledgeDocuments } from "./knowledge-loader.js";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "knowledge-"));
  await mkdir(join(dir, "operational"));
  await writeFile(join(dir, "operational", "technical_seo_auditor.md"), "# Audit\nCheck canonicals.");
  await writeFile(join(dir, "operational", "technical-seo-auditor-checklist.md"), "robots.txt first");
  await writeFile(join(dir, "operational", "technicalseoauditor.md"), "legacy notes");
  await writeFile(join(dir, "operational", "link_building.md"), "outreach");
  await writeFile(join(dir, "operational", "technical_seo_auditor.txt"), "not markdown");
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadKnowledgeDocuments", () => {
  it("reads the agent's markdown files in name order", async () => {
    const docs = await loadKnowledgeDocuments(dir, "operational", "technical_seo_auditor");

    expect(docs.map((d) => d.metadata?.source)).toEqual([
      "operational/technical-seo-auditor-checklist.md",
      "operational/technical_seo_auditor.md",
      "operational/technicalseoauditor.md",
    ]);
    expect(docs[1]).toEqual({
      text: "# Audit\nCheck canonicals.",
      metadata: { source: "operational/technical_seo_auditor.md", tier: "operational", agent: "technical_seo_auditor" },
    });
  });

  it("returns nothing for a missing tier directory", async () => {
    await expect(loadKnowledgeDocuments(dir, "executive", "chief_seo_strategist")).resolves.toEqual([]);
  });
});
