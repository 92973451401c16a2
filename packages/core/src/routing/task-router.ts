import type { AgentDescriptor, AgentTier, HealthRecord, Priority, Task, TaskType } from "../types.js";
import { PRIORITIES } from "../types.js";
import type { AgentRegistry, ReleaseOutcome } from "../registry/agent-registry.js";
import { PriorityQueues } from "./task-queue.js";
import { resolveConfig, type CoreConfig, type ResolvedConfig, type RouterWeights } from "../config.js";
import { DeadlineExceededError, OverloadedError } from "../errors.js";
import type { AgentEventBus } from "../events/agent-events.js";
import { BUS_EVENTS, STATUS_CODES } from "../events/events.js";
import { advanceStatus } from "./task-status.js";

export type EscalationReason = "no_capable_agent" | "all_busy";

export interface EscalationSignal {
  kind: "escalation";
  reason: EscalationReason;
  taskId: string;
  taskType: TaskType;
}

export interface Assignment {
  kind: "assigned";
  /** Descriptor as it was right after the slot was taken */
  agent: AgentDescriptor;
}

export type RouteDecision = Assignment | EscalationSignal;

/** Outcome of admitting a task: waiting in its queue, or not routable */
export type Admission = EscalationSignal | { kind: "queued"; position: number; wait: Promise<RouteDecision> };

/**
 * How well a tier suits a priority class. Critical work goes to executives,
 * high to management, routine work to operational agents.
 */
const TIER_AFFINITY: Record<Priority, Record<AgentTier, number>> = {
  critical: { executive: 1, management: 0.5, operational: 0.5 },
  high: { executive: 0.5, management: 1, operational: 0.5 },
  medium: { executive: 0, management: 0.5, operational: 1 },
  low: { executive: 0, management: 0.5, operational: 1 },
};

/** Latency in ms above which the latency term starts to shrink */
const LATENCY_UNIT_MS = 1000;

interface Waiter {
  task: Task;
  resolve: (decision: RouteDecision) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
  /** Set once the waiting-for-slot status went out */
  notified: boolean;
}

export interface TaskRouterOptions {
  config?: CoreConfig | ResolvedConfig;
  events?: AgentEventBus;
  now?: () => number;
}

function compareIds(a: AgentDescriptor, b: AgentDescriptor): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Selects an agent for each task by capability, load, priority/tier match
 * and recent latency, and parks tasks in per-priority FIFO queues while
 * every capable agent is busy.
 *
 * Admitted tasks always pass through the queues. Slots are taken in `route`
 * and given back in `release`, which then hands the freed capacity to
 * waiting tasks, highest priority class first.
 */
export class TaskRouter {
  private readonly registry: AgentRegistry;
  private readonly config: ResolvedConfig;
  private readonly events?: AgentEventBus;
  private readonly now: () => number;
  private readonly queues: PriorityQueues<Waiter>;
  private overloadRejections = 0;
  private drainScheduled = false;

  constructor(registry: AgentRegistry, options: TaskRouterOptions = {}) {
    this.registry = registry;
    this.config = resolveConfig(options.config);
    this.events = options.events;
    this.now = options.now ?? Date.now;
    this.queues = new PriorityQueues<Waiter>(this.config.queueDepthCeiling);
  }

  get weights(): RouterWeights {
    return { ...this.config.routerWeights };
  }

  /**
   * Picks the best free capable agent and takes one of its slots.
   * Never waits: returns an escalation when no agent is capable or all are busy.
   */
  route(task: Task): RouteDecision {
    const candidates = this.registry.capable(task.type);
    if (candidates.length === 0) return this.escalation(task, "no_capable_agent");

    const free = candidates.filter((agent) => agent.currentLoad < agent.maxConcurrent);
    for (const agent of this.rank(task, free)) {
      if (!this.registry.tryAcquire(agent.id)) continue;
      advanceStatus(task, "routed");
      this.events?.emit(BUS_EVENTS.TASK_ROUTED, { taskId: task.id, agentId: agent.id, priority: task.priority });
      return { kind: "assigned", agent: this.registry.get(agent.id) ?? agent };
    }
    return this.escalation(task, "all_busy");
  }

  /**
   * Orders candidates best first. Critical tasks go to the least-loaded agent;
   * everything else by weighted score, ties broken by lower load then id.
   */
  rank(task: Task, candidates: readonly AgentDescriptor[]): AgentDescriptor[] {
    if (task.priority === "critical") {
      return [...candidates].sort((a, b) => a.currentLoad - b.currentLoad || compareIds(a, b));
    }
    const scored = candidates.map((agent) => ({ agent, score: this.score(task, agent) }));
    scored.sort((a, b) => b.score - a.score || a.agent.currentLoad - b.agent.currentLoad || compareIds(a.agent, b.agent));
    return scored.map((s) => s.agent);
  }

  /** `w1 * freeCapacity + w2 * tierAffinity + w3 * latencyScore` */
  score(task: Task, agent: AgentDescriptor): number {
    const { w1, w2, w3 } = this.config.routerWeights;
    const freeCapacity = 1 - agent.currentLoad / agent.maxConcurrent;
    const affinity = TIER_AFFINITY[task.priority][agent.tier];
    const avgLatency = this.registry.stats(agent.id)?.recentAvgLatencyMs;
    const latencyScore = avgLatency === undefined ? 1 : 1 / Math.max(1, avgLatency / LATENCY_UNIT_MS);
    return w1 * freeCapacity + w2 * affinity + w3 * latencyScore;
  }

  /** Throws `DeadlineExceededError` when the task's deadline has passed. */
  checkDeadline(task: Task): void {
    if (task.deadline !== undefined && this.now() > task.deadline) {
      throw new DeadlineExceededError(`Task ${task.id} passed its deadline before it was routed`);
    }
  }

  /**
   * Parks the task in its priority queue and schedules a drain for the end of
   * the current turn, so tasks submitted together are served highest priority
   * first even when a slot is free. Runs synchronously: `OverloadedError` and
   * `DeadlineExceededError` are thrown to the caller, and a task no enabled
   * agent can handle comes back as an escalation without being queued.
   */
  admit(task: Task): Admission {
    this.checkDeadline(task);
    if (this.registry.capable(task.type).length === 0) return this.escalation(task, "no_capable_agent");

    if (this.queues.isFull(task.priority)) {
      this.overloadRejections++;
      throw new OverloadedError(
        `Queue for ${task.priority} tasks is full (${this.config.queueDepthCeiling}); task ${task.id} rejected`,
      );
    }
    this.overloadRejections = 0;

    let position = 0;
    const wait = new Promise<RouteDecision>((resolve, reject) => {
      const waiter: Waiter = { task, resolve, reject, notified: false };
      position = this.queues.enqueue(waiter);
      if (task.deadline !== undefined) {
        waiter.timer = setTimeout(() => this.expire(waiter), Math.max(0, task.deadline - this.now()));
        waiter.timer.unref();
      }
    });

    advanceStatus(task, "queued");
    this.events?.emit(BUS_EVENTS.TASK_QUEUED, { taskId: task.id, priority: task.priority, position });
    this.scheduleDrain();
    return { kind: "queued", position, wait };
  }

  /** Like `admit`, but resolves once the task holds a slot or cannot be routed. */
  async acquire(task: Task): Promise<RouteDecision> {
    const admission = this.admit(task);
    return admission.kind === "queued" ? admission.wait : admission;
  }

  /** Gives back a slot taken by `route` and serves waiting tasks. */
  release(agentId: string, outcome?: ReleaseOutcome): void {
    this.registry.release(agentId, outcome);
    this.drain();
  }

  /**
   * Offers free capacity to waiting tasks, critical first and FIFO within a
   * class. Call after anything that adds capacity or removes agents.
   */
  drain(): void {
    for (const waiter of this.queues.entries()) {
      if (waiter.task.deadline !== undefined && this.now() > waiter.task.deadline) {
        this.expire(waiter);
        continue;
      }
      const decision = this.route(waiter.task);
      if (decision.kind === "escalation" && decision.reason === "all_busy") {
        this.notifyWaiting(waiter);
        continue;
      }
      this.dequeue(waiter);
      waiter.resolve(decision);
    }
  }

  /** Queued tasks, optionally only those `agent` could serve */
  queueDepth(agent?: Pick<AgentDescriptor, "capabilities">): number {
    if (!agent) return this.queues.size();
    return this.queues.count((w) => agent.capabilities.has(w.task.type));
  }

  queueSizes(): Record<Priority, number> {
    return {
      critical: this.queues.size("critical"),
      high: this.queues.size("high"),
      medium: this.queues.size("medium"),
      low: this.queues.size("low"),
    };
  }

  healthCheck(): HealthRecord {
    const full = PRIORITIES.filter((p) => this.queues.size(p) >= this.config.queueDepthCeiling);
    return {
      componentId: "router",
      status: full.length > 0 ? "degraded" : "healthy",
      consecutiveFailures: this.overloadRejections,
      detail: full.length > 0
        ? `queues at ceiling: ${full.join(", ")}`
        : `${this.queues.size()} task(s) queued`,
    };
  }

  /** Fails every waiting task. Used on shutdown. */
  rejectAll(error: Error): void {
    for (const waiter of this.queues.entries()) {
      this.dequeue(waiter);
      waiter.reject(error);
    }
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  /** Emitted once per task, the first time a drain finds every capable agent busy */
  private notifyWaiting(waiter: Waiter): void {
    if (waiter.notified) return;
    waiter.notified = true;
    this.events?.emit(BUS_EVENTS.STATUS, {
      code: STATUS_CODES.WAITING_FOR_SLOT,
      message: `Waiting for a free ${waiter.task.type} agent`,
      taskId: waiter.task.id,
      metadata: { priority: waiter.task.priority },
    });
  }

  private expire(waiter: Waiter): void {
    if (!this.dequeue(waiter)) return;
    waiter.reject(new DeadlineExceededError(`Task ${waiter.task.id} passed its deadline while queued`));
  }

  private dequeue(waiter: Waiter): boolean {
    clearTimeout(waiter.timer);
    return this.queues.remove(waiter);
  }

  private escalation(task: Task, reason: EscalationReason): EscalationSignal {
    return { kind: "escalation", reason, taskId: task.id, taskType: task.type };
  }
}
