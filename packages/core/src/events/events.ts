/** Bus event names emitted by the router, providers and orchestrator */
export const BUS_EVENTS = {
  TASK_QUEUED: "task:queued",
  TASK_ROUTED: "task:routed",
  TASK_STARTED: "task:started",
  TASK_COMPLETED: "task:completed",
  TASK_FAILED: "task:failed",
  TASK_ESCALATED: "task:escalated",
  RESOURCE_FETCHED: "resource:fetched",
  RESOURCE_FALLBACK: "resource:fallback",
  PROVIDER_HEALTH: "provider:health",
  RETRIEVAL_DEGRADED: "retrieval:degraded",
  AGENT_REGISTERED: "agent:registered",
  AGENT_DEREGISTERED: "agent:deregistered",
  STATUS: "status",
} as const;

export type BusEventName = (typeof BUS_EVENTS)[keyof typeof BUS_EVENTS];

/** Typed status codes for the `status` event */
export const STATUS_CODES = {
  RETRYING: "retrying",
  FALLBACK: "fallback",
  LOADING_CONTEXT: "loading-context",
  FETCHING_DATA: "fetching-data",
  PROCESSING: "processing",
  WAITING_FOR_SLOT: "waiting-for-slot",
} as const;

export type StatusCode = (typeof STATUS_CODES)[keyof typeof STATUS_CODES];

export interface StatusPayload {
  code: StatusCode;
  message: string;
  agent?: string;
  metadata?: Record<string, unknown>;
}
