import { OrchestrationError, TransientError, type ErrorComponent } from "../errors.js";

export interface RetryInfo {
  /** 1-based number of the retry about to run */
  attempt: number;
  maxRetries: number;
  delay: number;
  error: Error;
}

export interface RetryOptions<T> {
  /** The call to wrap. Receives a signal that aborts on timeout or caller cancellation. */
  fn: (signal: AbortSignal) => Promise<T>;
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  multiplier?: number;
  /** Max delay cap in ms (default: 8000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 to randomize delay (default: 0) */
  jitterFactor?: number;
  /** Per-attempt deadline in ms. Omit for no timeout. */
  timeoutMs?: number;
  /** Component charged with timeouts */
  component?: ErrorComponent;
  abortSignal?: AbortSignal;
  isRetryable?: (error: Error) => boolean;
  onRetry?: (info: RetryInfo) => void;
  /** Overridable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const NON_RETRYABLE_STATUS_CODES = new Set([400, 401, 403, 404, 422]);

/**
 * Classifies whether an error is retryable.
 * Retryable: 408, 429, 500-504, timeouts, network errors, "overloaded"/"capacity".
 * Not retryable: AbortError, auth errors (401/403), validation errors (400/422).
 * Errors from the orchestration taxonomy carry their own `retryable` flag.
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error instanceof OrchestrationError) return error.retryable;

  // Never retry abort
  if (error.name === "AbortError") return false;

  const statusProp = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  if (typeof statusProp === "number") {
    if (RETRYABLE_STATUS_CODES.has(statusProp)) return true;
    if (NON_RETRYABLE_STATUS_CODES.has(statusProp)) return false;
  }

  const message = error.message.toLowerCase();

  const statusMatch = message.match(/\b(\d{3})\b/);
  if (statusMatch) {
    const status = Number(statusMatch[1]);
    if (RETRYABLE_STATUS_CODES.has(status)) return true;
    if (NON_RETRYABLE_STATUS_CODES.has(status)) return false;
  }

  if (
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("network") ||
    message.includes("fetch failed") ||
    message.includes("socket hang up")
  ) {
    return true;
  }

  if (message.includes("overloaded") || message.includes("capacity")) {
    return true;
  }

  return message.includes("rate limit") || message.includes("too many requests");
}

export function computeDelay(
  attempt: number,
  baseDelayMs: number,
  multiplier: number,
  maxDelayMs: number,
  jitterFactor = 0,
): number {
  const exponential = Math.min(baseDelayMs * Math.pow(multiplier, attempt), maxDelayMs);
  const jitter = exponential * jitterFactor * Math.random();
  return exponential + jitter;
}

function abortError(): Error {
  return Object.assign(new Error("Aborted"), { name: "AbortError" });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(abortError());
    }, { once: true });
  });
}

/**
 * Runs `fn` with a deadline. On expiry the signal handed to `fn` is aborted and
 * the returned promise rejects with a `TransientError`, whether or not `fn`
 * honours the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { abortSignal?: AbortSignal; component?: ErrorComponent } = {},
): Promise<T> {
  const { abortSignal, component } = options;
  if (abortSignal?.aborted) throw abortError();

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(abortSignal?.reason);
  abortSignal?.addEventListener("abort", onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TransientError(`Request timed out after ${timeoutMs}ms`, { component });
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    abortSignal?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Generic retry wrapper with exponential backoff.
 *
 * Retries retryable errors up to `maxRetries` times, waiting
 * `min(base * multiplier^attempt, maxDelay)` between attempts. Non-retryable
 * errors and aborts are rethrown immediately. When retries exhaust, the last
 * error is thrown so the caller can take its fallback path.
 */
export async function withRetry<T>(opts: RetryOptions<T>): Promise<T> {
  const {
    fn,
    maxRetries = 2,
    baseDelayMs = 1000,
    multiplier = 2,
    maxDelayMs = 8000,
    jitterFactor = 0,
    timeoutMs,
    component,
    abortSignal,
    isRetryable = isRetryableError,
    onRetry,
    sleep: wait = sleep,
  } = opts;

  let lastError: Error = new Error("withRetry: no attempt was made");

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      if (timeoutMs !== undefined) {
        return await withTimeout(fn, timeoutMs, { abortSignal, component });
      }
      return await fn(abortSignal ?? new AbortController().signal);
    } catch (error: unknown) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (lastError.name === "AbortError" || abortSignal?.aborted) {
        throw lastError;
      }

      if (!isRetryable(lastError)) {
        throw lastError;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delay = computeDelay(attempt, baseDelayMs, multiplier, maxDelayMs, jitterFactor);
      onRetry?.({ attempt: attempt + 1, maxRetries, delay, error: lastError });
      await wait(delay, abortSignal);
    }
  }

  throw lastError;
}
