// ── Task catalogue ──

export const TASK_TYPES = [
  "lead_qualification",
  "proposal_generation",
  "sales_conversation",
  "technical_seo_audit",
  "content_strategy",
  "link_building",
  "competitive_analysis",
  "reporting",
  "client_success",
  "sales_operations",
  "technical_seo_operations",
  "task_coordination",
  "seo_strategy",
  "business_development",
] as const;

export type TaskType = (typeof TASK_TYPES)[number];

/** Highest first: the router drains queues in this order */
export const PRIORITIES = ["critical", "high", "medium", "low"] as const;

export type Priority = (typeof PRIORITIES)[number];

export const AGENT_TIERS = ["executive", "management", "operational"] as const;

export type AgentTier = (typeof AGENT_TIERS)[number];

export const TASK_STATUSES = ["queued", "routed", "running", "escalated", "done", "failed"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["done", "failed"]);

/** A submitted unit of work. Immutable apart from `status`, which the router owns. */
export interface Task {
  readonly id: string;
  readonly type: TaskType;
  readonly priority: Priority;
  readonly payload: Readonly<Record<string, unknown>>;
  /** Epoch ms */
  readonly createdAt: number;
  /** Epoch ms */
  readonly deadline?: number;
  status: TaskStatus;
}

// ── Agents ──

export interface AgentDescriptor {
  id: string;
  tier: AgentTier;
  capabilities: ReadonlySet<TaskType>;
  maxConcurrent: number;
  currentLoad: number;
  /** Disabled agents are never routed to */
  enabled: boolean;
  /** False when the agent runs without a retrieval index */
  enabledRetrieval: boolean;
  /** False when the agent runs without live resource data */
  enabledProvider: boolean;
}

export interface AgentStats {
  lastLatencyMs?: number;
  /** Mean of the recent latency window; undefined until the first completion */
  recentAvgLatencyMs?: number;
  completed: number;
  errorCount: number;
  consecutiveFailures: number;
  successRate: number;
}

// ── Resources ──

export const RESOURCE_TYPES = [
  "seo_data",
  "client_data",
  "competitive_data",
  "keyword_data",
  "backlink_data",
  "content_data",
  "technical_audit",
  "analytics_data",
] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export type ResourceParameters = Record<string, unknown>;

export interface ResourceRequest {
  resourceType: ResourceType;
  key: string;
  parameters: ResourceParameters;
}

export type ResourceOrigin = "primary" | "fallback" | "cache";

export interface ResourceResponse {
  payload: Record<string, unknown>;
  source: ResourceOrigin;
  /** Epoch ms when the payload was obtained from its origin */
  fetchedAt: number;
}

// ── Health ──

export type HealthStatus = "healthy" | "degraded" | "unavailable";

export interface HealthRecord {
  componentId: string;
  status: HealthStatus;
  /** Epoch ms of the last successful call, if any */
  lastSuccessAt?: number;
  consecutiveFailures: number;
  detail?: string;
}

const HEALTH_RANK: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unavailable: 2 };

/** Returns the worse of the given statuses (`healthy` for an empty list). */
export function worstHealth(statuses: Iterable<HealthStatus>): HealthStatus {
  let worst: HealthStatus = "healthy";
  for (const status of statuses) {
    if (HEALTH_RANK[status] > HEALTH_RANK[worst]) worst = status;
  }
  return worst;
}
