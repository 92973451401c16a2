import { randomUUID } from "node:crypto";
import type { AgentDescriptor, AgentStats, HealthRecord, Task } from "../types.js";
import { TERMINAL_STATUSES } from "../types.js";
import { AgentRegistry, type AgentFlags, type AgentSpec } from "../registry/agent-registry.js";
import { TaskRouter, type Admission } from "../routing/task-router.js";
import { advanceStatus } from "../routing/task-status.js";
import { RetrievalIndex } from "../retrieval/retrieval-index.js";
import type { Embedder } from "../retrieval/embedder.js";
import { ResourceProvider, createResourceProvider } from "../providers/resource-provider.js";
import type { TaskRecord, TaskRecordPatch, TaskStore } from "../storage/interfaces.js";
import { createInMemoryTaskStore } from "../storage/in-memory/task-store.js";
import { AgentEventBus } from "../events/agent-events.js";
import { BUS_EVENTS } from "../events/events.js";
import { resolveConfig, type CoreConfig, type ResolvedConfig } from "../config.js";
import {
  CapabilityError,
  OrchestrationError,
  OverloadedError,
  ValidationError,
  err,
  ok,
  toTaskFailure,
  type Result,
  type TaskFailure,
} from "../errors.js";
import { agentFlagsSchema, agentSpecSchema, formatZodIssue, taskSubmissionSchema } from "../schemas/task.schemas.js";
import { sleep } from "../utils/resilience.js";
import { executeTask } from "./execute-task.js";

export interface OrchestratorOptions {
  config?: CoreConfig;
  /** Required for retrieval; agents are built without it otherwise */
  embedder?: Embedder;
  /** Shared provider. Built from `config.primary` with a static fallback when omitted. */
  provider?: ResourceProvider;
  events?: AgentEventBus;
  taskStore?: TaskStore;
  now?: () => number;
  /** Delay between escalation retries, overridable in tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface CreateAgentOptions {
  /** Default: true */
  enableRetrieval?: boolean;
  /** Default: true */
  enableProvider?: boolean;
  /** Dedicated provider instead of the shared one */
  provider?: ResourceProvider;
}

export interface AgentHandle {
  readonly id: string;
  /** Current descriptor, or undefined once deregistered */
  descriptor(): AgentDescriptor | undefined;
  readonly index?: RetrievalIndex;
  readonly provider?: ResourceProvider;
}

export interface AgentView extends AgentDescriptor {
  description?: string;
  queueDepth: number;
  stats: AgentStats;
}

export interface SubmitReceipt {
  taskId: string;
  status: Task["status"];
}

export interface SubmitRejection {
  /** Set when the task was recorded before it was rejected */
  taskId?: string;
  error: TaskFailure;
}

export type TaskResult =
  | { ok: true; taskId: string; agentId: string; result: unknown; late: boolean }
  | { ok: false; taskId?: string; error: TaskFailure };

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Composition root of the orchestration core. Builds agents with their
 * retrieval index and resource provider, accepts tasks, runs them through
 * the router and reports aggregate health.
 *
 * Every terminal failure comes back as a `TaskFailure`; nothing thrown by an
 * agent leaks to the caller.
 */
export class Orchestrator {
  readonly registry: AgentRegistry;
  readonly router: TaskRouter;
  readonly events: AgentEventBus;
  readonly tasks: TaskStore;
  readonly config: ResolvedConfig;
  readonly provider: ResourceProvider;

  private readonly embedder?: Embedder;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly indexes = new Map<string, RetrievalIndex>();
  private readonly agentProviders = new Map<string, ResourceProvider>();
  private readonly degradedReasons = new Map<string, string[]>();
  private readonly inflight = new Map<string, Promise<TaskResult>>();
  private readonly lifetime = new AbortController();
  private closed = false;

  constructor(options: OrchestratorOptions = {}) {
    this.config = resolveConfig(options.config);
    this.events = options.events ?? new AgentEventBus();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.embedder = options.embedder;
    this.registry = new AgentRegistry({ latencyWindow: this.config.latencyWindow });
    this.router = new TaskRouter(this.registry, { config: this.config, events: this.events, now: this.now });
    this.tasks = options.taskStore ?? createInMemoryTaskStore({
      retentionSeconds: this.config.taskRetentionSeconds,
      now: this.now,
    });
    this.provider = options.provider ?? createResourceProvider({ config: this.config, events: this.events, now: this.now });
  }

  /** Probes the shared provider. Never throws; an unreachable primary only means fallback data. */
  async initialize(): Promise<void> {
    const reachable = await this.provider.initialize();
    console.log(
      `[orchestrator] Initialized: ${this.registry.list().length} agents, primary source ${reachable ? "reachable" : "unavailable (serving fallback data)"}`,
    );
  }

  // ── Agents ──

  /**
   * Registers an agent with its retrieval index and resource provider. A
   * dependency that fails to initialize leaves the agent in degraded mode
   * (flag off) instead of failing the registration.
   */
  async createAgent(spec: AgentSpec, options: CreateAgentOptions = {}): Promise<AgentHandle> {
    const parsed = agentSpecSchema.safeParse(spec);
    if (!parsed.success) {
      throw new ValidationError(`Invalid agent spec: ${formatZodIssue(parsed.error)}`, "registry");
    }
    if (this.registry.has(spec.id)) {
      throw new ValidationError(`Agent "${spec.id}" is already registered`, "registry");
    }

    const { enableRetrieval = true, enableProvider = true } = options;
    const degraded: string[] = [];

    const index = enableRetrieval ? await this.buildIndex(spec, degraded) : undefined;
    const provider = enableProvider ? await this.attachProvider(spec.id, options.provider, degraded) : undefined;

    const { id, tier, capabilities, maxConcurrent } = parsed.data;
    try {
      this.registry.register({
        id,
        tier,
        capabilities: new Set(capabilities),
        maxConcurrent,
        currentLoad: 0,
        enabled: true,
        enabledRetrieval: index !== undefined,
        enabledProvider: provider !== undefined,
      }, spec.handler, spec.description);
    } catch (error: unknown) {
      // A concurrent createAgent may have taken the id during the awaits above
      index?.close();
      if (provider && provider !== this.provider) provider.close();
      throw error;
    }

    if (index) this.indexes.set(id, index);
    if (provider) this.agentProviders.set(id, provider);
    if (degraded.length > 0) {
      this.degradedReasons.set(id, degraded);
      console.warn(`[orchestrator] Agent ${id} running in degraded mode: ${degraded.join("; ")}`);
    }

    this.events.emit(BUS_EVENTS.AGENT_REGISTERED, {
      agentId: id,
      tier,
      enabledRetrieval: index !== undefined,
      enabledProvider: provider !== undefined,
    });
    this.router.drain();

    const registry = this.registry;
    return { id, index, provider, descriptor: () => registry.get(id) };
  }

  deregister(id: string): boolean {
    if (!this.registry.deregister(id)) return false;

    this.indexes.get(id)?.close();
    this.indexes.delete(id);
    const provider = this.agentProviders.get(id);
    if (provider && provider !== this.provider) provider.close();
    this.agentProviders.delete(id);
    this.degradedReasons.delete(id);

    this.events.emit(BUS_EVENTS.AGENT_DEREGISTERED, { agentId: id });
    this.router.drain();
    return true;
  }

  /** Toggles an agent. Retrieval and live data can only be re-enabled when attached. */
  setAgentFlags(id: string, flags: AgentFlags): AgentDescriptor | undefined {
    const parsed = agentFlagsSchema.safeParse(flags);
    if (!parsed.success) {
      throw new ValidationError(`Invalid agent flags: ${formatZodIssue(parsed.error)}`, "registry");
    }
    if (!this.registry.has(id)) return undefined;
    if (parsed.data.enabledRetrieval && !this.indexes.has(id)) {
      throw new ValidationError(`Agent "${id}" has no retrieval index`, "registry");
    }
    if (parsed.data.enabledProvider && !this.agentProviders.has(id)) {
      throw new ValidationError(`Agent "${id}" has no resource provider`, "registry");
    }
    const updated = this.registry.setFlags(id, parsed.data);
    this.router.drain();
    return updated;
  }

  getAgent(id: string): AgentView | undefined {
    const descriptor = this.registry.get(id);
    return descriptor ? this.toView(descriptor) : undefined;
  }

  listAgents(): AgentView[] {
    return this.registry.list().map((descriptor) => this.toView(descriptor));
  }

  // ── Tasks ──

  /**
   * Validates and admits a task, then runs it in the background.
   * Malformed input, a passed deadline, a full queue and a shut-down
   * orchestrator are rejected here.
   */
  async submit(input: unknown): Promise<Result<SubmitReceipt, SubmitRejection>> {
    if (this.closed) {
      const error = new OrchestrationError("overloaded", "Orchestrator is shut down", {
        component: "orchestrator",
        retryable: false,
      });
      return err({ error: error.toFailure() });
    }
    const parsed = taskSubmissionSchema.safeParse(input);
    if (!parsed.success) {
      const error = new ValidationError(`Invalid task: ${formatZodIssue(parsed.error)}`);
      return err({ error: error.toFailure() });
    }

    const { type, priority, payload, deadline } = parsed.data;
    const createdAt = this.now();
    const task: Task = {
      id: randomUUID(),
      type,
      priority,
      payload,
      createdAt,
      ...(deadline !== undefined && { deadline }),
      status: "queued",
    };
    await this.tasks.create({
      id: task.id,
      type,
      priority,
      status: task.status,
      late: false,
      ...(deadline !== undefined && { deadline }),
      createdAt,
      updatedAt: createdAt,
      history: [{ status: task.status, at: createdAt }],
    });

    let admission: Admission;
    try {
      admission = this.router.admit(task);
    } catch (error: unknown) {
      const failed = await this.fail(task, error);
      return err({ taskId: task.id, error: failed });
    }

    const outcome = this.execute(task, admission).finally(() => this.inflight.delete(task.id));
    this.inflight.set(task.id, outcome);
    return ok({ taskId: task.id, status: task.status });
  }

  /** Submits a task and waits for its outcome. */
  async run(input: unknown): Promise<TaskResult> {
    const receipt = await this.submit(input);
    if (!receipt.ok) return { ok: false, ...receipt.error };
    const result = await this.wait(receipt.value.taskId);
    return result ?? {
      ok: false,
      taskId: receipt.value.taskId,
      error: { kind: "agent_error", message: "Task record expired", component: "orchestrator", retryable: false },
    };
  }

  /** Outcome of a task, waiting if it is still in flight. `null` for unknown or expired ids. */
  async wait(taskId: string): Promise<TaskResult | null> {
    const pending = this.inflight.get(taskId);
    if (pending) return pending;
    const record = await this.tasks.get(taskId);
    return record ? this.resultFromRecord(record) : null;
  }

  getTask(taskId: string): Promise<TaskRecord | null> {
    return this.tasks.get(taskId);
  }

  // ── Health ──

  /** Health of every component keyed by component id. Makes no external calls. */
  aggregateHealth(): Record<string, HealthRecord> {
    const health: Record<string, HealthRecord> = {};
    for (const provider of new Set([this.provider, ...this.agentProviders.values()])) {
      health[provider.id] = provider.healthCheck();
    }
    for (const index of this.indexes.values()) {
      health[index.id] = index.healthCheck();
    }
    for (const agent of this.registry.list()) {
      health[`agent:${agent.id}`] = this.agentHealth(agent);
    }
    health.router = this.router.healthCheck();
    return health;
  }

  /** Fails queued tasks, signals running handlers to stop and releases timers. Later submissions are refused. */
  shutdown(): void {
    this.closed = true;
    this.router.rejectAll(new OverloadedError("Orchestrator is shutting down"));
    this.lifetime.abort();
    for (const index of this.indexes.values()) index.close();
    for (const provider of new Set([this.provider, ...this.agentProviders.values()])) provider.close();
  }

  // ── Internals ──

  private async buildIndex(spec: AgentSpec, degraded: string[]): Promise<RetrievalIndex | undefined> {
    if (!this.embedder) {
      degraded.push("no embedder configured, retrieval disabled");
      this.events.emit(BUS_EVENTS.RETRIEVAL_DEGRADED, { agentId: spec.id, reason: "no embedder configured" });
      return undefined;
    }

    const index = new RetrievalIndex({
      agentId: spec.id,
      embedder: this.embedder,
      config: this.config,
      events: this.events,
      now: this.now,
    });
    try {
      if (spec.knowledge && spec.knowledge.length > 0) await index.addDocuments(spec.knowledge);
      return index;
    } catch (error: unknown) {
      index.close();
      degraded.push(`retrieval index failed: ${messageOf(error)}`);
      return undefined;
    }
  }

  private async attachProvider(
    agentId: string,
    dedicated: ResourceProvider | undefined,
    degraded: string[],
  ): Promise<ResourceProvider | undefined> {
    if (!dedicated) return this.provider;
    try {
      const reachable = await dedicated.initialize();
      if (!reachable) degraded.push(`primary source of ${dedicated.id} unreachable, serving fallback data`);
      return dedicated;
    } catch (error: unknown) {
      degraded.push(`resource provider failed for ${agentId}: ${messageOf(error)}`);
      return undefined;
    }
  }

  private async execute(task: Task, admission: Admission): Promise<TaskResult> {
    try {
      let decision = admission.kind === "queued" ? await admission.wait : admission;

      for (let attempt = 1; decision.kind === "escalation"; attempt++) {
        this.events.emit(BUS_EVENTS.TASK_ESCALATED, {
          taskId: task.id, type: task.type, reason: decision.reason, attempt,
        });
        if (attempt > this.config.escalationRetries) {
          advanceStatus(task, "escalated");
          await this.persist(task);
          throw new CapabilityError(`No agent can handle ${task.type} tasks (${attempt} routing attempts)`);
        }
        console.warn(
          `[router] No capable agent for ${task.type}; retrying in ${this.config.escalationRetryDelayMs}ms (${attempt}/${this.config.escalationRetries})`,
        );
        await this.sleep(this.config.escalationRetryDelayMs);
        decision = await this.router.acquire(task);
      }

      return await this.runOnAgent(task, decision.agent);
    } catch (error: unknown) {
      return { ok: false, taskId: task.id, error: await this.fail(task, error) };
    }
  }

  private async runOnAgent(task: Task, agent: AgentDescriptor): Promise<TaskResult> {
    const started = this.now();
    let success = false;
    try {
      await this.persist(task, { agentId: agent.id });
      advanceStatus(task, "running");
      await this.persist(task);
      this.events.emit(BUS_EVENTS.TASK_STARTED, { taskId: task.id, agentId: agent.id });

      const result = await executeTask({
        registry: this.registry,
        events: this.events,
        index: this.indexes.get(agent.id),
        provider: this.agentProviders.get(agent.id),
      }, task, agent, this.lifetime.signal);

      success = true;
      const late = task.deadline !== undefined && this.now() > task.deadline;
      advanceStatus(task, "done");
      await this.persist(task, { result, late });
      this.events.emit(BUS_EVENTS.TASK_COMPLETED, {
        taskId: task.id, agentId: agent.id, late, latencyMs: this.now() - started,
      });
      return { ok: true, taskId: task.id, agentId: agent.id, result, late };
    } finally {
      this.router.release(agent.id, { latencyMs: this.now() - started, success });
    }
  }

  private async fail(task: Task, error: unknown): Promise<TaskFailure> {
    const failure = toTaskFailure(error);
    advanceStatus(task, "failed");
    await this.persist(task, { error: failure });
    console.error(`[orchestrator] Task ${task.id} (${task.type}) failed: [${failure.kind}] ${failure.message}`);
    this.events.emit(BUS_EVENTS.TASK_FAILED, { taskId: task.id, ...failure });
    return failure;
  }

  private async persist(task: Task, patch: TaskRecordPatch = {}): Promise<void> {
    await this.tasks.update(task.id, { ...patch, status: task.status });
  }

  private resultFromRecord(record: TaskRecord): TaskResult | null {
    if (!TERMINAL_STATUSES.has(record.status)) return null;
    if (record.status === "done") {
      return { ok: true, taskId: record.id, agentId: record.agentId ?? "", result: record.result, late: record.late };
    }
    return {
      ok: false,
      taskId: record.id,
      error: record.error ?? { kind: "agent_error", message: "Task failed", component: "orchestrator", retryable: false },
    };
  }

  private toView(descriptor: AgentDescriptor): AgentView {
    const stats = this.registry.stats(descriptor.id) ?? { completed: 0, errorCount: 0, consecutiveFailures: 0, successRate: 1 };
    const description = this.registry.getDescription(descriptor.id);
    return {
      ...descriptor,
      ...(description !== undefined && { description }),
      queueDepth: this.router.queueDepth(descriptor),
      stats,
    };
  }

  private agentHealth(agent: AgentDescriptor): HealthRecord {
    const stats = this.registry.stats(agent.id);
    const consecutiveFailures = stats?.consecutiveFailures ?? 0;
    const reasons = [...(this.degradedReasons.get(agent.id) ?? [])];
    if (consecutiveFailures >= this.config.degradedAfterFailures) reasons.push(`${consecutiveFailures} consecutive failures`);

    return {
      componentId: `agent:${agent.id}`,
      status: !agent.enabled ? "unavailable" : reasons.length > 0 ? "degraded" : "healthy",
      consecutiveFailures,
      ...(!agent.enabled ? { detail: "disabled" } : reasons.length > 0 && { detail: reasons.join("; ") }),
    };
  }
}
