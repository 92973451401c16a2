import { describe, it, expect } from "vitest";
import { AgentRegistry } from "./agent-registry.js";
import type { AgentDescriptor, TaskType } from "../types.js";
import { ValidationError } from "../errors.js";

function descriptor(overrides: Partial<AgentDescriptor> & Pick<AgentDescriptor, "id">): AgentDescriptor {
  return {
    tier: "operational",
    capabilities: new Set<TaskType>(["reporting"]),
    maxConcurrent: 1,
    currentLoad: 0,
    enabled: true,
    enabledRetrieval: false,
    enabledProvider: false,
    ...overrides,
  };
}

const handler = async () => "ok";

describe("AgentRegistry", () => {
  it("registers agents with zero load and returns snapshots", () => {
    const registry = new AgentRegistry();
    registry.register(descriptor({ id: "reporter", currentLoad: 4 }), handler, "Writes reports");

    const agent = registry.get("reporter");
    expect(agent?.currentLoad).toBe(0);
    expect(registry.getDescription("reporter")).toBe("Writes reports");
    expect(registry.getHandler("reporter")).toBe(handler);

    registry.tryAcquire("reporter");
    expect(agent?.currentLoad).toBe(0);
    expect(registry.get("reporter")?.currentLoad).toBe(1);
  });

  it("rejects duplicates, blank ids and invalid concurrency", () => {
    const registry = new AgentRegistry();
    registry.register(descriptor({ id: "a" }), handler);

    expect(() => registry.register(descriptor({ id: "a" }), handler)).toThrow('Agent "a" is already registered');
    expect(() => registry.register(descriptor({ id: "  " }), handler)).toThrow(ValidationError);
    expect(() => registry.register(descriptor({ id: "b", maxConcurrent: 0 }), handler)).toThrow(
      'Agent "b" needs maxConcurrent >= 1',
    );
  });

  it("hands out slots up to maxConcurrent and never drops load below zero", () => {
    const registry = new AgentRegistry();
    registry.register(descriptor({ id: "a", maxConcurrent: 2 }), handler);

    expect(registry.tryAcquire("a")).toBe(true);
    expect(registry.tryAcquire("a")).toBe(true);
    expect(registry.tryAcquire("a")).toBe(false);

    registry.release("a");
    registry.release("a");
    registry.release("a");
    expect(registry.get("a")?.currentLoad).toBe(0);
    expect(registry.tryAcquire("missing")).toBe(false);
  });

  it("lists capable enabled agents ordered by id", () => {
    const registry = new AgentRegistry();
    registry.register(descriptor({ id: "zeta" }), handler);
    registry.register(descriptor({ id: "alpha" }), handler);
    registry.register(descriptor({ id: "linker", capabilities: new Set<TaskType>(["link_building"]) }), handler);
    registry.register(descriptor({ id: "beta" }), handler);
    registry.setFlags("beta", { enabled: false });

    expect(registry.capable("reporting").map((a) => a.id)).toEqual(["alpha", "zeta"]);
    expect(registry.list().map((a) => a.id)).toEqual(["alpha", "beta", "linker", "zeta"]);
    expect(registry.tryAcquire("beta")).toBe(false);
  });

  it("tracks latency, completions and failures", () => {
    const registry = new AgentRegistry({ latencyWindow: 2 });
    registry.register(descriptor({ id: "a" }), handler);

    expect(registry.stats("a")).toEqual({
      lastLatencyMs: undefined,
      recentAvgLatencyMs: undefined,
      completed: 0,
      errorCount: 0,
      consecutiveFailures: 0,
      successRate: 1,
    });

    registry.release("a", { latencyMs: 100, success: true });
    registry.release("a", { latencyMs: 300, success: false });
    expect(registry.stats("a")).toMatchObject({
      lastLatencyMs: 300,
      recentAvgLatencyMs: 200,
      completed: 1,
      errorCount: 1,
      consecutiveFailures: 1,
      successRate: 0.5,
    });

    registry.release("a", { latencyMs: 500, success: true });
    expect(registry.stats("a")).toMatchObject({ recentAvgLatencyMs: 400, consecutiveFailures: 0 });
  });

  it("forgets deregistered agents", () => {
    const registry = new AgentRegistry();
    registry.register(descriptor({ id: "a" }), handler);

    expect(registry.deregister("a")).toBe(true);
    expect(registry.deregister("a")).toBe(false);
    expect(registry.has("a")).toBe(false);
    expect(registry.stats("a")).toBeUndefined();
    registry.release("a", { latencyMs: 1, success: true });
  });
});
