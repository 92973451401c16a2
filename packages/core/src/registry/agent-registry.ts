import type { AgentDescriptor, AgentStats, AgentTier, ResourceParameters, ResourceResponse, ResourceType, Task, TaskType } from "../types.js";
import type { KnowledgeDocument, SearchHit } from "../retrieval/retrieval-index.js";
import type { StatusCode } from "../events/events.js";
import type { Result } from "../errors.js";
import { ValidationError } from "../errors.js";
import { DEFAULTS } from "../utils/constants.js";

/** What an agent handler sees while it works on one task */
export interface AgentContext {
  task: Readonly<Task>;
  agent: Readonly<AgentDescriptor>;
  /** Knowledge snippets for `query`; `[]` when the agent runs without retrieval */
  retrieve(query: string, options?: { topK?: number; threshold?: number }): Promise<SearchHit[]>;
  /** Live data through the agent's resource provider */
  fetchResource(resourceType: ResourceType, key: string, parameters?: ResourceParameters): Promise<Result<ResourceResponse>>;
  emitStatus(code: StatusCode, message: string, metadata?: Record<string, unknown>): void;
  signal: AbortSignal;
}

export type AgentHandler = (ctx: AgentContext) => unknown;

/** Everything needed to build an agent */
export interface AgentSpec {
  id: string;
  tier: AgentTier;
  capabilities: readonly TaskType[];
  /** Default: 1 */
  maxConcurrent?: number;
  description?: string;
  handler: AgentHandler;
  /** Documents indexed when retrieval is enabled */
  knowledge?: readonly KnowledgeDocument[];
}

export type AgentFlags = Partial<Pick<AgentDescriptor, "enabled" | "enabledRetrieval" | "enabledProvider">>;

export interface ReleaseOutcome {
  latencyMs: number;
  success: boolean;
}

interface AgentEntry {
  descriptor: AgentDescriptor;
  handler: AgentHandler;
  description?: string;
  latencies: number[];
  completed: number;
  errorCount: number;
  consecutiveFailures: number;
}

/**
 * Holds registered agents, their capabilities and runtime counters.
 *
 * `tryAcquire`/`release` are the only writers of `currentLoad`; both run to
 * completion without awaiting, so each update is atomic per agent.
 */
export class AgentRegistry {
  private agents = new Map<string, AgentEntry>();
  private readonly latencyWindow: number;

  constructor(options: { latencyWindow?: number } = {}) {
    this.latencyWindow = options.latencyWindow ?? DEFAULTS.LATENCY_WINDOW;
  }

  register(descriptor: AgentDescriptor, handler: AgentHandler, description?: string): void {
    if (!descriptor.id.trim()) throw new ValidationError("Agent id must be a non-empty string", "registry");
    if (this.agents.has(descriptor.id)) {
      throw new ValidationError(`Agent "${descriptor.id}" is already registered`, "registry");
    }
    if (!Number.isInteger(descriptor.maxConcurrent) || descriptor.maxConcurrent < 1) {
      throw new ValidationError(`Agent "${descriptor.id}" needs maxConcurrent >= 1`, "registry");
    }
    this.agents.set(descriptor.id, {
      descriptor: { ...descriptor, capabilities: new Set(descriptor.capabilities), currentLoad: 0 },
      handler,
      description,
      latencies: [],
      completed: 0,
      errorCount: 0,
      consecutiveFailures: 0,
    });
  }

  deregister(id: string): boolean {
    return this.agents.delete(id);
  }

  has(id: string): boolean {
    return this.agents.has(id);
  }

  /** Snapshot of the descriptor; later load changes are not reflected in it. */
  get(id: string): AgentDescriptor | undefined {
    const entry = this.agents.get(id);
    return entry ? { ...entry.descriptor } : undefined;
  }

  getHandler(id: string): AgentHandler | undefined {
    return this.agents.get(id)?.handler;
  }

  getDescription(id: string): string | undefined {
    return this.agents.get(id)?.description;
  }

  /** All agents, ordered by id */
  list(): AgentDescriptor[] {
    return [...this.agents.values()]
      .map((entry) => ({ ...entry.descriptor }))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /** Enabled agents whose capabilities include `type` */
  capable(type: TaskType): AgentDescriptor[] {
    return this.list().filter((agent) => agent.enabled && agent.capabilities.has(type));
  }

  /** Increments the agent's load if it has a free slot. */
  tryAcquire(id: string): boolean {
    const entry = this.agents.get(id);
    if (!entry || !entry.descriptor.enabled) return false;
    if (entry.descriptor.currentLoad >= entry.descriptor.maxConcurrent) return false;
    entry.descriptor.currentLoad++;
    return true;
  }

  /** Decrements the agent's load and records the outcome. No-op for deregistered agents. */
  release(id: string, outcome?: ReleaseOutcome): void {
    const entry = this.agents.get(id);
    if (!entry) return;
    entry.descriptor.currentLoad = Math.max(0, entry.descriptor.currentLoad - 1);
    if (!outcome) return;

    entry.latencies.push(outcome.latencyMs);
    if (entry.latencies.length > this.latencyWindow) entry.latencies.shift();
    if (outcome.success) {
      entry.completed++;
      entry.consecutiveFailures = 0;
    } else {
      entry.errorCount++;
      entry.consecutiveFailures++;
    }
  }

  setFlags(id: string, flags: AgentFlags): AgentDescriptor | undefined {
    const entry = this.agents.get(id);
    if (!entry) return undefined;
    if (flags.enabled !== undefined) entry.descriptor.enabled = flags.enabled;
    if (flags.enabledRetrieval !== undefined) entry.descriptor.enabledRetrieval = flags.enabledRetrieval;
    if (flags.enabledProvider !== undefined) entry.descriptor.enabledProvider = flags.enabledProvider;
    return { ...entry.descriptor };
  }

  stats(id: string): AgentStats | undefined {
    const entry = this.agents.get(id);
    if (!entry) return undefined;
    const { latencies, completed, errorCount, consecutiveFailures } = entry;
    const total = completed + errorCount;
    return {
      lastLatencyMs: latencies.at(-1),
      recentAvgLatencyMs: latencies.length > 0
        ? latencies.reduce((sum, ms) => sum + ms, 0) / latencies.length
        : undefined,
      completed,
      errorCount,
      consecutiveFailures,
      successRate: total > 0 ? completed / total : 1,
    };
  }
}
