import { z } from "zod";
import type {
  HealthRecord,
  HealthStatus,
  ResourceParameters,
  ResourceRequest,
  ResourceResponse,
  ResourceType,
} from "../types.js";
import { RESOURCE_TYPES } from "../types.js";
import type { ResourceSource } from "./resource-source.js";
import { HttpResourceSource } from "./http-resource-source.js";
import { StaticResourceSource } from "./static-resource-source.js";
import { resolveConfig, type CoreConfig, type ResolvedConfig } from "../config.js";
import { TtlCache } from "../cache/ttl-cache.js";
import { SingleFlight } from "../utils/singleflight.js";
import { isRetryableError, sleep, withRetry, withTimeout } from "../utils/resilience.js";
import { stableStringify } from "../utils/stable-key.js";
import { OrchestrationError, TransientError, ValidationError, err, ok, type Result } from "../errors.js";
import type { AgentEventBus } from "../events/agent-events.js";
import { BUS_EVENTS, STATUS_CODES } from "../events/events.js";

export interface ResourceProviderOptions {
  /** Appears in the component id `resource-provider:<name>` */
  name?: string;
  /** Remote source. Without one every request is served by the fallback. */
  primary?: ResourceSource;
  /** Local substitute with no external dependency */
  fallback: ResourceSource;
  config?: CoreConfig | ResolvedConfig;
  events?: AgentEventBus;
  /** Clock, overridable in tests */
  now?: () => number;
  /** Backoff sleep, overridable in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface ProviderStats {
  totalRequests: number;
  cacheHits: number;
  primaryFetches: number;
  fallbacks: number;
  errors: number;
  cacheHitRate: number;
  errorRate: number;
  averageResponseTimeMs: number;
  cacheSize: number;
}

const requestSchema = z.object({
  resourceType: z.enum(RESOURCE_TYPES),
  key: z.string().trim().min(1, "key must be a non-empty string"),
  parameters: z.record(z.unknown()),
});

const RESPONSE_TIME_WINDOW = 100;

/**
 * Fetches typed external resources cache-first, from a primary source with
 * retries and a timeout, falling back to a local substitute once the primary
 * is exhausted.
 *
 * Concurrent requests for the same cache key share one in-flight load, so the
 * primary source sees at most one call per key at a time.
 */
export class ResourceProvider {
  readonly id: string;
  private readonly primary?: ResourceSource;
  private readonly fallback: ResourceSource;
  private readonly config: ResolvedConfig;
  private readonly events?: AgentEventBus;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly cache: TtlCache<ResourceResponse>;
  private readonly flights = new SingleFlight<Result<ResourceResponse>>();

  private consecutiveFailures = 0;
  private fallbackFailing = false;
  private lastSuccessAt?: number;
  private lastStatus: HealthStatus;

  private counters = { totalRequests: 0, cacheHits: 0, primaryFetches: 0, fallbacks: 0, errors: 0 };
  private responseTimes: number[] = [];

  constructor(options: ResourceProviderOptions) {
    this.id = `resource-provider:${options.name ?? "default"}`;
    this.primary = options.primary;
    this.fallback = options.fallback;
    this.config = resolveConfig(options.config);
    this.events = options.events;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.cache = new TtlCache({ maxEntries: this.config.cacheMaxEntries, now: this.now });
    this.cache.startSweeper(this.config.cacheSweepIntervalMs);
    this.lastStatus = this.computeStatus();
  }

  /**
   * Probes the primary source. Returns false when it is missing or unreachable;
   * the provider still works, serving from the fallback.
   */
  async initialize(): Promise<boolean> {
    if (!this.primary) {
      console.warn(`[resource-provider] ${this.id}: no primary source configured, serving fallback data`);
      return false;
    }
    if (!this.primary.ping) return true;
    const ping = this.primary.ping.bind(this.primary);
    try {
      const reachable = await withTimeout(ping, this.config.requestTimeoutSeconds * 1000, { component: "resource-provider" });
      if (!reachable) console.warn(`[resource-provider] ${this.id}: primary source "${this.primary.name}" failed its health probe`);
      return reachable;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[resource-provider] ${this.id}: primary source "${this.primary.name}" unreachable: ${message}`);
      return false;
    }
  }

  cacheKey(request: ResourceRequest): string {
    return `${request.resourceType}:${request.key}:${stableStringify(request.parameters)}`;
  }

  async fetch(
    resourceType: ResourceType,
    key: string,
    parameters: ResourceParameters = {},
  ): Promise<Result<ResourceResponse>> {
    const parsed = requestSchema.safeParse({ resourceType, key, parameters });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return err(new ValidationError(`Invalid resource request: ${issue?.path.join(".")}: ${issue?.message}`, "resource-provider"));
    }

    const request: ResourceRequest = parsed.data;
    const cacheKey = this.cacheKey(request);
    this.counters.totalRequests++;

    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.counters.cacheHits++;
      return ok({ ...cached.value, source: "cache" });
    }

    return this.flights.do(cacheKey, () => this.load(request, cacheKey));
  }

  /** Best-effort search. Returns an empty list on any failure. */
  async searchResources(
    resourceType: ResourceType,
    query: string,
    filters: Record<string, unknown> = {},
  ): Promise<Record<string, unknown>[]> {
    const source = this.primary ?? this.fallback;
    if (!source.search) return [];
    const search = source.search.bind(source);
    try {
      return await withTimeout(
        (signal) => search(resourceType, query, filters, signal),
        this.config.requestTimeoutSeconds * 1000,
        { component: "resource-provider" },
      );
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[resource-provider] ${this.id}: search failed: ${message}`);
      return [];
    }
  }

  /** Current health record. Makes no external calls. */
  healthCheck(): HealthRecord {
    const status = this.computeStatus();
    return {
      componentId: this.id,
      status,
      ...(this.lastSuccessAt !== undefined && { lastSuccessAt: this.lastSuccessAt }),
      consecutiveFailures: this.consecutiveFailures,
      ...(!this.primary && { detail: "no primary source configured" }),
      ...(this.fallbackFailing && { detail: "fallback source failing" }),
    };
  }

  stats(): ProviderStats {
    const { totalRequests, cacheHits, errors } = this.counters;
    const avg = this.responseTimes.length > 0
      ? this.responseTimes.reduce((sum, t) => sum + t, 0) / this.responseTimes.length
      : 0;
    return {
      ...this.counters,
      cacheHitRate: cacheHits / Math.max(1, totalRequests),
      errorRate: errors / Math.max(1, totalRequests),
      averageResponseTimeMs: Math.round(avg),
      cacheSize: this.cache.size,
    };
  }

  /** Drops cached responses, all of them or those whose key contains `pattern`. */
  clearCache(pattern?: string): number {
    return this.cache.clear(pattern);
  }

  close(): void {
    this.cache.stopSweeper();
  }

  // ── Internals ──

  private async load(request: ResourceRequest, cacheKey: string): Promise<Result<ResourceResponse>> {
    const started = this.now();

    if (this.primary) {
      const primary = this.primary;
      this.counters.primaryFetches++;
      try {
        const payload = await withRetry({
          fn: (signal) => primary.fetch(request, signal),
          maxRetries: this.config.maxRetries,
          baseDelayMs: this.config.retryBaseDelayMs,
          multiplier: this.config.retryMultiplier,
          maxDelayMs: this.config.retryMaxDelayMs,
          timeoutMs: this.config.requestTimeoutSeconds * 1000,
          component: "resource-provider",
          sleep: this.sleep,
          onRetry: ({ attempt, maxRetries, delay, error }) => {
            this.events?.emit(BUS_EVENTS.STATUS, {
              code: STATUS_CODES.RETRYING,
              message: `Retrying ${request.resourceType}:${request.key} (attempt ${attempt}/${maxRetries})`,
              metadata: { provider: this.id, delay, error: error.message },
            });
          },
        });

        const response: ResourceResponse = { payload, source: "primary", fetchedAt: this.now() };
        this.cache.set(cacheKey, response, this.config.cacheTtlSeconds * 1000);
        this.recordPrimarySuccess(started);
        this.events?.emit(BUS_EVENTS.RESOURCE_FETCHED, {
          provider: this.id, resourceType: request.resourceType, key: request.key, source: "primary",
        });
        return ok(response);
      } catch (error: unknown) {
        if (!isRetryableError(error)) {
          this.counters.errors++;
          return err(this.asNonRetryable(error));
        }
        this.recordPrimaryFailure(error);
      }
    }

    return this.loadFallback(request, cacheKey, started);
  }

  private async loadFallback(request: ResourceRequest, cacheKey: string, started: number): Promise<Result<ResourceResponse>> {
    const fallback = this.fallback;
    try {
      const payload = await withTimeout(
        (signal) => fallback.fetch(request, signal),
        this.config.requestTimeoutSeconds * 1000,
        { component: "resource-provider" },
      );
      const response: ResourceResponse = { payload, source: "fallback", fetchedAt: this.now() };
      const ttlSeconds = Math.min(this.config.cacheTtlSeconds, this.config.fallbackTtlSeconds);
      this.cache.set(cacheKey, response, ttlSeconds * 1000);
      this.counters.fallbacks++;
      this.recordResponseTime(started);
      this.fallbackFailing = false;
      this.publishHealth();
      this.events?.emit(BUS_EVENTS.RESOURCE_FALLBACK, {
        provider: this.id, resourceType: request.resourceType, key: request.key, source: "fallback",
      });
      return ok(response);
    } catch (error: unknown) {
      this.counters.errors++;
      this.fallbackFailing = true;
      this.publishHealth();
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[resource-provider] ${this.id}: fallback failed for ${request.resourceType}:${request.key}: ${message}`);
      return err(new TransientError(
        `Primary and fallback sources failed for ${request.resourceType}:${request.key}: ${message}`,
        { source: "fallback_failed", cause: error },
      ));
    }
  }

  private asNonRetryable(error: unknown): OrchestrationError {
    if (error instanceof OrchestrationError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ValidationError(`Primary source rejected request: ${message}`, "resource-provider");
  }

  private recordPrimarySuccess(started: number): void {
    this.consecutiveFailures = 0;
    this.fallbackFailing = false;
    this.lastSuccessAt = this.now();
    this.recordResponseTime(started);
    this.publishHealth();
  }

  private recordPrimaryFailure(error: unknown): void {
    this.consecutiveFailures++;
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[resource-provider] ${this.id}: primary exhausted (${this.consecutiveFailures} consecutive): ${message}`);
    this.events?.emit(BUS_EVENTS.STATUS, {
      code: STATUS_CODES.FALLBACK,
      message: "Switching to fallback source",
      metadata: { provider: this.id, error: message },
    });
    this.publishHealth();
  }

  private recordResponseTime(started: number): void {
    this.responseTimes.push(this.now() - started);
    if (this.responseTimes.length > RESPONSE_TIME_WINDOW) this.responseTimes.shift();
  }

  private computeStatus(): HealthStatus {
    if (this.fallbackFailing) return "unavailable";
    if (!this.primary) return "degraded";
    if (this.consecutiveFailures >= this.config.degradedAfterFailures) return "degraded";
    return "healthy";
  }

  private publishHealth(): void {
    const status = this.computeStatus();
    if (status === this.lastStatus) return;
    this.lastStatus = status;
    this.events?.emit(BUS_EVENTS.PROVIDER_HEALTH, { provider: this.id, status, consecutiveFailures: this.consecutiveFailures });
  }
}

export interface CreateResourceProviderOptions {
  name?: string;
  config?: CoreConfig | ResolvedConfig;
  events?: AgentEventBus;
  now?: () => number;
}

/**
 * Builds a provider from configuration: an HTTP primary when `config.primary`
 * is set, and the static substitute as fallback.
 */
export function createResourceProvider(options: CreateResourceProviderOptions = {}): ResourceProvider {
  const config = resolveConfig(options.config);
  const primary = config.primary
    ? new HttpResourceSource({ url: config.primary.url, token: config.primary.token })
    : undefined;
  return new ResourceProvider({
    name: options.name,
    primary,
    fallback: new StaticResourceSource(),
    config,
    events: options.events,
    now: options.now,
  });
}
