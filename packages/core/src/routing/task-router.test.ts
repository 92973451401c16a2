import { describe, it, expect } from "vitest";
import { TaskRouter, type Admission, type RouteDecision } from "./task-router.js";
import { AgentRegistry } from "../registry/agent-registry.js";
import type { AgentTier, Priority, Task, TaskType } from "../types.js";
import type { CoreConfig } from "../config.js";
import { AgentEventBus, type AgentEvent } from "../events/agent-events.js";
import { BUS_EVENTS } from "../events/events.js";
import { DeadlineExceededError, OverloadedError } from "../errors.js";

let seq = 0;

function task(type: TaskType, priority: Priority = "medium", extra: Partial<Task> = {}): Task {
  return { id: `task-${++seq}`, type, priority, payload: {}, createdAt: 0, status: "queued", ...extra };
}

function agent(
  registry: AgentRegistry,
  id: string,
  tier: AgentTier,
  capabilities: TaskType[] = ["reporting"],
  maxConcurrent = 1,
) {
  registry.register({
    id,
    tier,
    capabilities: new Set(capabilities),
    maxConcurrent,
    currentLoad: 0,
    enabled: true,
    enabledRetrieval: false,
    enabledProvider: false,
  }, async () => "ok");
}

function setup(config: CoreConfig = {}, now?: () => number) {
  const registry = new AgentRegistry();
  const events = new AgentEventBus();
  const seen: AgentEvent[] = [];
  events.subscribe((e) => { seen.push(e); });
  const router = new TaskRouter(registry, { config, events, now });
  return { registry, router, events, seen };
}

function assignedId(decision: RouteDecision | Admission): string | undefined {
  return decision.kind === "assigned" ? decision.agent.id : undefined;
}

function queued(admission: Admission) {
  if (admission.kind !== "queued") throw new Error(`expected queued, got ${admission.kind}`);
  return admission;
}

describe("TaskRouter.route", () => {
  it("escalates when no agent has the capability", () => {
    const { registry, router } = setup();
    agent(registry, "reporter", "operational", ["reporting"]);

    const t = task("link_building");
    expect(router.route(t)).toEqual({
      kind: "escalation",
      reason: "no_capable_agent",
      taskId: t.id,
      taskType: "link_building",
    });
  });

  it("prefers the tier that matches the priority", () => {
    const { registry, router, seen } = setup();
    agent(registry, "manager", "management", ["reporting"], 2);
    agent(registry, "worker", "operational", ["reporting"], 2);

    const medium = task("reporting", "medium");
    const decision = router.route(medium);

    expect(assignedId(decision)).toBe("worker");
    expect(decision.kind === "assigned" && decision.agent.currentLoad).toBe(1);
    expect(medium.status).toBe("routed");
    expect(seen.map((e) => e.type)).toEqual([BUS_EVENTS.TASK_ROUTED]);

    expect(assignedId(router.route(task("reporting", "high")))).toBe("manager");
  });

  it("scores capacity, affinity and latency with the configured weights", () => {
    const { registry, router } = setup();
    agent(registry, "slow", "operational");
    agent(registry, "fresh", "operational");
    registry.tryAcquire("slow");
    registry.release("slow", { latencyMs: 4000, success: true });

    const t = task("reporting", "medium");
    const [slow, fresh] = [registry.get("slow"), registry.get("fresh")];
    if (!slow || !fresh) throw new Error("agents missing");

    expect(router.score(t, fresh)).toBeCloseTo(1.0);
    expect(router.score(t, slow)).toBeCloseTo(0.5 + 0.3 + 0.2 * 0.25);
    expect(assignedId(router.route(t))).toBe("fresh");
  });

  it("breaks equal scores by id", () => {
    const { registry, router } = setup();
    agent(registry, "b-worker", "operational");
    agent(registry, "a-worker", "operational");

    expect(assignedId(router.route(task("reporting")))).toBe("a-worker");
  });

  it("sends critical work to the least-loaded capable agent", () => {
    const { registry, router } = setup();
    agent(registry, "chief", "executive", ["reporting"], 3);
    agent(registry, "worker", "operational", ["reporting"], 3);
    registry.tryAcquire("chief");

    expect(assignedId(router.route(task("reporting", "critical")))).toBe("worker");
    expect(assignedId(router.route(task("reporting", "critical")))).toBe("chief");
  });

  it("reports all_busy when every capable agent is at capacity", () => {
    const { registry, router } = setup();
    agent(registry, "worker", "operational");
    router.route(task("reporting"));

    const decision = router.route(task("reporting"));
    expect(decision.kind === "escalation" && decision.reason).toBe("all_busy");
  });
});

describe("TaskRouter.admit", () => {
  it("queues a task while agents are busy and routes it on release", async () => {
    const { registry, router, seen } = setup();
    agent(registry, "worker", "operational");
    router.route(task("reporting"));

    const waiting = task("reporting");
    const admission = queued(router.admit(waiting));
    expect(admission.position).toBe(1);
    expect(router.queueDepth()).toBe(1);
    expect(seen.filter((e) => e.type === BUS_EVENTS.TASK_QUEUED)).toHaveLength(1);

    router.release("worker", { latencyMs: 10, success: true });

    expect(assignedId(await admission.wait)).toBe("worker");
    expect(waiting.status).toBe("routed");
    expect(router.queueDepth()).toBe(0);
  });

  it("serves a later critical task before an earlier low one", async () => {
    const { registry, router } = setup();
    agent(registry, "worker", "operational");
    router.route(task("reporting", "medium"));

    const low = queued(router.admit(task("reporting", "low")));
    const critical = queued(router.admit(task("reporting", "critical")));
    expect(router.queueSizes()).toEqual({ critical: 1, high: 0, medium: 0, low: 1 });

    router.release("worker");
    expect(assignedId(await critical.wait)).toBe("worker");
    expect(router.queueSizes().low).toBe(1);

    router.release("worker");
    expect(assignedId(await low.wait)).toBe("worker");
  });

  it("serves tasks admitted in the same turn highest priority first, even with a free slot", async () => {
    const { registry, router } = setup();
    agent(registry, "worker", "operational");

    const low = queued(router.admit(task("reporting", "low")));
    const critical = queued(router.admit(task("reporting", "critical")));

    expect(assignedId(await critical.wait)).toBe("worker");
    expect(router.queueSizes()).toEqual({ critical: 0, high: 0, medium: 0, low: 1 });

    router.release("worker");
    expect(assignedId(await low.wait)).toBe("worker");
  });

  it("reports a waiting-for-slot status once per queued task", async () => {
    const { registry, router, seen } = setup();
    agent(registry, "worker", "operational");
    router.route(task("reporting"));

    const waiting = task("reporting");
    queued(router.admit(waiting));
    await Promise.resolve();
    router.drain();

    expect(seen.filter((e) => e.type === BUS_EVENTS.STATUS)).toEqual([{
      type: "status",
      data: {
        code: "waiting-for-slot",
        message: "Waiting for a free reporting agent",
        taskId: waiting.id,
        metadata: { priority: "medium" },
      },
      timestamp: expect.any(Number),
    }]);
  });

  it("answers no_capable_agent without queueing", () => {
    const { registry, router } = setup();
    agent(registry, "worker", "operational");

    const admission = router.admit(task("link_building"));

    expect(admission.kind === "escalation" && admission.reason).toBe("no_capable_agent");
    expect(router.queueDepth()).toBe(0);
  });

  it("rejects the task past the queue ceiling", () => {
    const { registry, router } = setup({ queueDepthCeiling: 5 });
    agent(registry, "worker", "operational");
    router.route(task("reporting"));

    for (let i = 0; i < 5; i++) queued(router.admit(task("reporting")));

    expect(() => router.admit(task("reporting"))).toThrow(OverloadedError);
    expect(router.queueDepth()).toBe(5);
    expect(router.healthCheck()).toEqual({
      componentId: "router",
      status: "degraded",
      consecutiveFailures: 1,
      detail: "queues at ceiling: medium",
    });

    expect(queued(router.admit(task("reporting", "high"))).position).toBe(1);
  });

  it("refuses a task whose deadline already passed", () => {
    const { registry, router } = setup({}, () => 1000);
    agent(registry, "worker", "operational");

    expect(() => router.admit(task("reporting", "medium", { deadline: 500 }))).toThrow(DeadlineExceededError);
  });

  it("expires a queued task once its deadline passes", async () => {
    const { registry, router } = setup();
    agent(registry, "worker", "operational");
    router.route(task("reporting"));

    const admission = queued(router.admit(task("reporting", "medium", { deadline: Date.now() + 10 })));

    await expect(admission.wait).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(router.queueDepth()).toBe(0);
  });

  it("drops late waiters when draining", async () => {
    const clock = { now: 0 };
    const { registry, router } = setup({}, () => clock.now);
    agent(registry, "worker", "operational");
    router.route(task("reporting"));

    const admission = queued(router.admit(task("reporting", "medium", { deadline: 100 })));
    const rejection = expect(admission.wait).rejects.toThrow("passed its deadline while queued");

    clock.now = 101;
    router.release("worker");
    await rejection;
  });

  it("signals no_capable_agent to waiters whose agents were removed", async () => {
    const { registry, router } = setup();
    agent(registry, "worker", "operational");
    router.route(task("reporting"));
    const admission = queued(router.admit(task("reporting")));

    registry.deregister("worker");
    router.drain();

    const decision = await admission.wait;
    expect(decision.kind === "escalation" && decision.reason).toBe("no_capable_agent");
  });

  it("fails every waiter on rejectAll", async () => {
    const { registry, router } = setup();
    agent(registry, "worker", "operational");
    router.route(task("reporting"));
    const admission = queued(router.admit(task("reporting")));

    router.rejectAll(new OverloadedError("shutting down"));

    await expect(admission.wait).rejects.toThrow("shutting down");
    expect(router.queueDepth()).toBe(0);
  });
});
