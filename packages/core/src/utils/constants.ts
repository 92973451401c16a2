/** Default configuration values */
export const DEFAULTS = {
  CACHE_TTL_SECONDS: 1800,
  FALLBACK_TTL_SECONDS: 300,
  MAX_RETRIES: 2,
  REQUEST_TIMEOUT_SECONDS: 30,
  RETRY_BASE_DELAY_MS: 1000,
  RETRY_MULTIPLIER: 2,
  RETRY_MAX_DELAY_MS: 8000,
  DEGRADED_AFTER_FAILURES: 3,
  CACHE_MAX_ENTRIES: 1000,
  CACHE_SWEEP_INTERVAL_MS: 60_000,
  SIMILARITY_THRESHOLD: 0.7,
  TOP_K: 10,
  CHUNK_SIZE: 1000,
  CHUNK_OVERLAP: 100,
  QUEUE_DEPTH_CEILING: 1000,
  ROUTER_WEIGHTS: { w1: 0.5, w2: 0.3, w3: 0.2 },
  ESCALATION_RETRIES: 2,
  ESCALATION_RETRY_DELAY_MS: 250,
  TASK_RETENTION_SECONDS: 3600,
  LATENCY_WINDOW: 20,
} as const;

/** Environment variable names read by `loadConfigFromEnv` */
export const ENV_KEYS = {
  CACHE_TTL_SECONDS: "AGENCYFLOW_CACHE_TTL_SECONDS",
  FALLBACK_TTL_SECONDS: "AGENCYFLOW_FALLBACK_TTL_SECONDS",
  MAX_RETRIES: "AGENCYFLOW_MAX_RETRIES",
  REQUEST_TIMEOUT_SECONDS: "AGENCYFLOW_REQUEST_TIMEOUT_SECONDS",
  SIMILARITY_THRESHOLD: "AGENCYFLOW_SIMILARITY_THRESHOLD",
  TOP_K: "AGENCYFLOW_TOP_K",
  QUEUE_DEPTH_CEILING: "AGENCYFLOW_QUEUE_DEPTH_CEILING",
  ROUTER_WEIGHTS: "AGENCYFLOW_ROUTER_WEIGHTS",
  CHUNK_SIZE: "AGENCYFLOW_CHUNK_SIZE",
  CHUNK_OVERLAP: "AGENCYFLOW_CHUNK_OVERLAP",
  PRIMARY_URL: "AGENCYFLOW_PRIMARY_URL",
  PRIMARY_TOKEN: "AGENCYFLOW_PRIMARY_TOKEN",
} as const;
