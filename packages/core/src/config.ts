import { z } from "zod";
import { DEFAULTS, ENV_KEYS } from "./utils/constants.js";
import { ValidationError } from "./errors.js";

export interface RouterWeights {
  /** Weight of free capacity (1 - load / maxConcurrent) */
  w1: number;
  /** Weight of the priority/tier match */
  w2: number;
  /** Weight of inverse recent latency */
  w3: number;
}

export interface PrimarySourceConfig {
  /** Base URL of the primary resource server */
  url: string;
  /** Bearer token sent with every request */
  token?: string;
}

/** Core configuration — framework-agnostic. Every field is optional; see `DEFAULTS`. */
export interface CoreConfig {
  cacheTtlSeconds?: number;
  /** Upper bound for the TTL of fallback responses */
  fallbackTtlSeconds?: number;
  maxRetries?: number;
  requestTimeoutSeconds?: number;
  retryBaseDelayMs?: number;
  retryMultiplier?: number;
  retryMaxDelayMs?: number;
  /** Consecutive failures after which a provider reports `degraded` */
  degradedAfterFailures?: number;
  cacheMaxEntries?: number;
  /** Background sweep interval. 0 disables the sweeper. */
  cacheSweepIntervalMs?: number;
  similarityThreshold?: number;
  topK?: number;
  chunkSize?: number;
  chunkOverlap?: number;
  /** Queue ceiling per priority class */
  queueDepthCeiling?: number;
  routerWeights?: RouterWeights;
  /** Routing re-attempts when no agent is capable of a task */
  escalationRetries?: number;
  escalationRetryDelayMs?: number;
  taskRetentionSeconds?: number;
  /** Number of latency samples kept per agent */
  latencyWindow?: number;
  primary?: PrimarySourceConfig;
}

export type ResolvedConfig = Required<Omit<CoreConfig, "primary">> & { primary?: PrimarySourceConfig };

const weightsSchema = z.object({
  w1: z.number().min(0),
  w2: z.number().min(0),
  w3: z.number().min(0),
});

const configSchema = z
  .object({
    cacheTtlSeconds: z.number().positive(),
    fallbackTtlSeconds: z.number().positive(),
    maxRetries: z.number().int().min(0),
    requestTimeoutSeconds: z.number().positive(),
    retryBaseDelayMs: z.number().min(0),
    retryMultiplier: z.number().min(1),
    retryMaxDelayMs: z.number().min(0),
    degradedAfterFailures: z.number().int().positive(),
    cacheMaxEntries: z.number().int().positive(),
    cacheSweepIntervalMs: z.number().int().min(0),
    similarityThreshold: z.number().min(-1).max(1),
    topK: z.number().int().min(0),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().min(0),
    queueDepthCeiling: z.number().int().min(0),
    routerWeights: weightsSchema,
    escalationRetries: z.number().int().min(0),
    escalationRetryDelayMs: z.number().min(0),
    taskRetentionSeconds: z.number().positive(),
    latencyWindow: z.number().int().positive(),
    primary: z.object({ url: z.string().url(), token: z.string().optional() }).optional(),
  })
  .refine((c) => c.chunkOverlap < c.chunkSize, {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  });

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** Merges a partial config over `DEFAULTS` and validates the result. */
export function resolveConfig(config: CoreConfig = {}): ResolvedConfig {
  const merged = {
    cacheTtlSeconds: config.cacheTtlSeconds ?? DEFAULTS.CACHE_TTL_SECONDS,
    fallbackTtlSeconds: config.fallbackTtlSeconds ?? DEFAULTS.FALLBACK_TTL_SECONDS,
    maxRetries: config.maxRetries ?? DEFAULTS.MAX_RETRIES,
    requestTimeoutSeconds: config.requestTimeoutSeconds ?? DEFAULTS.REQUEST_TIMEOUT_SECONDS,
    retryBaseDelayMs: config.retryBaseDelayMs ?? DEFAULTS.RETRY_BASE_DELAY_MS,
    retryMultiplier: config.retryMultiplier ?? DEFAULTS.RETRY_MULTIPLIER,
    retryMaxDelayMs: config.retryMaxDelayMs ?? DEFAULTS.RETRY_MAX_DELAY_MS,
    degradedAfterFailures: config.degradedAfterFailures ?? DEFAULTS.DEGRADED_AFTER_FAILURES,
    cacheMaxEntries: config.cacheMaxEntries ?? DEFAULTS.CACHE_MAX_ENTRIES,
    cacheSweepIntervalMs: config.cacheSweepIntervalMs ?? DEFAULTS.CACHE_SWEEP_INTERVAL_MS,
    similarityThreshold: config.similarityThreshold ?? DEFAULTS.SIMILARITY_THRESHOLD,
    topK: config.topK ?? DEFAULTS.TOP_K,
    chunkSize: config.chunkSize ?? DEFAULTS.CHUNK_SIZE,
    chunkOverlap: config.chunkOverlap ?? DEFAULTS.CHUNK_OVERLAP,
    queueDepthCeiling: config.queueDepthCeiling ?? DEFAULTS.QUEUE_DEPTH_CEILING,
    routerWeights: config.routerWeights ?? { ...DEFAULTS.ROUTER_WEIGHTS },
    escalationRetries: config.escalationRetries ?? DEFAULTS.ESCALATION_RETRIES,
    escalationRetryDelayMs: config.escalationRetryDelayMs ?? DEFAULTS.ESCALATION_RETRY_DELAY_MS,
    taskRetentionSeconds: config.taskRetentionSeconds ?? DEFAULTS.TASK_RETENTION_SECONDS,
    latencyWindow: config.latencyWindow ?? DEFAULTS.LATENCY_WINDOW,
    primary: config.primary,
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${formatIssues(parsed.error)}`, "config");
  }
  return parsed.data;
}

const numberFromEnv = z.coerce.number().finite();

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const parsed = numberFromEnv.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`${key} must be a number, got "${raw}"`, "config");
  }
  return parsed.data;
}

function readWeights(env: NodeJS.ProcessEnv): RouterWeights | undefined {
  const raw = env[ENV_KEYS.ROUTER_WEIGHTS];
  if (raw === undefined || raw.trim() === "") return undefined;
  const parts = raw.split(",").map((p) => numberFromEnv.safeParse(p.trim()));
  if (parts.length !== 3 || parts.some((p) => !p.success)) {
    throw new ValidationError(`${ENV_KEYS.ROUTER_WEIGHTS} must be three comma-separated numbers, got "${raw}"`, "config");
  }
  const [w1, w2, w3] = parts.map((p) => (p.success ? p.data : 0));
  return { w1, w2, w3 };
}

/**
 * Reads the configuration surface from environment variables.
 * Unset variables fall back to `DEFAULTS`; malformed ones throw `ValidationError`.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const url = env[ENV_KEYS.PRIMARY_URL];
  return resolveConfig({
    cacheTtlSeconds: readNumber(env, ENV_KEYS.CACHE_TTL_SECONDS),
    fallbackTtlSeconds: readNumber(env, ENV_KEYS.FALLBACK_TTL_SECONDS),
    maxRetries: readNumber(env, ENV_KEYS.MAX_RETRIES),
    requestTimeoutSeconds: readNumber(env, ENV_KEYS.REQUEST_TIMEOUT_SECONDS),
    similarityThreshold: readNumber(env, ENV_KEYS.SIMILARITY_THRESHOLD),
    topK: readNumber(env, ENV_KEYS.TOP_K),
    queueDepthCeiling: readNumber(env, ENV_KEYS.QUEUE_DEPTH_CEILING),
    chunkSize: readNumber(env, ENV_KEYS.CHUNK_SIZE),
    chunkOverlap: readNumber(env, ENV_KEYS.CHUNK_OVERLAP),
    routerWeights: readWeights(env),
    ...(url && { primary: { url, token: env[ENV_KEYS.PRIMARY_TOKEN] } }),
  });
}
