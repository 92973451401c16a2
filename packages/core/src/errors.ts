/** Error categories surfaced by the orchestration core */
export type ErrorKind =
  | "validation"
  | "transient"
  | "capability"
  | "overloaded"
  | "deadline_exceeded"
  | "index_unavailable"
  | "agent_error";

/** Component that produced a failure */
export type ErrorComponent =
  | "orchestrator"
  | "router"
  | "registry"
  | "resource-provider"
  | "retrieval"
  | "embedding"
  | "agent"
  | "config";

/**
 * Serializable failure returned to callers of the orchestrator.
 * Carries no stack trace, only what a caller needs to decide on a retry.
 */
export interface TaskFailure {
  kind: ErrorKind;
  message: string;
  component: ErrorComponent;
  retryable: boolean;
  /** Set to `fallback_failed` when both resource paths failed */
  source?: "fallback_failed";
}

export interface OrchestrationErrorOptions {
  component: ErrorComponent;
  retryable?: boolean;
  source?: "fallback_failed";
  cause?: unknown;
}

export class OrchestrationError extends Error {
  readonly kind: ErrorKind;
  readonly component: ErrorComponent;
  readonly retryable: boolean;
  readonly source?: "fallback_failed";

  constructor(kind: ErrorKind, message: string, options: OrchestrationErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "OrchestrationError";
    this.kind = kind;
    this.component = options.component;
    this.retryable = options.retryable ?? false;
    this.source = options.source;
  }

  toFailure(): TaskFailure {
    return {
      kind: this.kind,
      message: this.message,
      component: this.component,
      retryable: this.retryable,
      ...(this.source && { source: this.source }),
    };
  }
}

/** Malformed task or request. Never retried. */
export class ValidationError extends OrchestrationError {
  constructor(message: string, component: ErrorComponent = "orchestrator") {
    super("validation", message, { component });
    this.name = "ValidationError";
  }
}

/** Timeout, network failure or 5xx from an external call. */
export class TransientError extends OrchestrationError {
  readonly status?: number;

  constructor(message: string, options: { component?: ErrorComponent; status?: number; source?: "fallback_failed"; cause?: unknown } = {}) {
    super("transient", message, {
      component: options.component ?? "resource-provider",
      retryable: true,
      source: options.source,
      cause: options.cause,
    });
    this.name = "TransientError";
    this.status = options.status;
  }
}

/** No registered agent can serve the task type. */
export class CapabilityError extends OrchestrationError {
  constructor(message: string) {
    super("capability", message, { component: "router" });
    this.name = "CapabilityError";
  }
}

/** The queue for the task's priority class is full. */
export class OverloadedError extends OrchestrationError {
  constructor(message: string) {
    super("overloaded", message, { component: "router", retryable: true });
    this.name = "OverloadedError";
  }
}

export class DeadlineExceededError extends OrchestrationError {
  constructor(message: string, component: ErrorComponent = "router") {
    super("deadline_exceeded", message, { component });
    this.name = "DeadlineExceededError";
  }
}

/** Retrieval index missing or inconsistent. Agents proceed without context. */
export class IndexUnavailableError extends OrchestrationError {
  constructor(message: string, cause?: unknown) {
    super("index_unavailable", message, { component: "retrieval", cause });
    this.name = "IndexUnavailableError";
  }
}

// ── Result ──

export type Result<T, E = OrchestrationError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Converts anything thrown by agent code into a failure. Errors outside the
 * taxonomy are reported as non-retryable `agent_error` failures.
 */
export function toTaskFailure(error: unknown, component: ErrorComponent = "agent"): TaskFailure {
  if (error instanceof OrchestrationError) return error.toFailure();
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "agent_error", message: `Agent execution failed: ${message}`, component, retryable: false };
}
