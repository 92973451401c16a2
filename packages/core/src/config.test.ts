import { describe, it, expect } from "vitest";
import { loadConfigFromEnv, resolveConfig } from "./config.js";
import { ValidationError } from "./errors.js";

describe("resolveConfig", () => {
  it("fills every key from the defaults", () => {
    const config = resolveConfig();
    expect(config.cacheTtlSeconds).toBe(1800);
    expect(config.maxRetries).toBe(2);
    expect(config.requestTimeoutSeconds).toBe(30);
    expect(config.similarityThreshold).toBe(0.7);
    expect(config.topK).toBe(10);
    expect(config.queueDepthCeiling).toBe(1000);
    expect(config.routerWeights).toEqual({ w1: 0.5, w2: 0.3, w3: 0.2 });
    expect(config.primary).toBeUndefined();
  });

  it("keeps explicit values over defaults", () => {
    const config = resolveConfig({ topK: 3, routerWeights: { w1: 1, w2: 0, w3: 0 } });
    expect(config.topK).toBe(3);
    expect(config.routerWeights).toEqual({ w1: 1, w2: 0, w3: 0 });
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => resolveConfig({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      "Invalid configuration: chunkOverlap: chunkOverlap must be smaller than chunkSize",
    );
  });

  it("rejects negative weights and out-of-range thresholds", () => {
    expect(() => resolveConfig({ routerWeights: { w1: -1, w2: 0, w3: 0 } })).toThrow(ValidationError);
    expect(() => resolveConfig({ similarityThreshold: 1.5 })).toThrow(ValidationError);
  });
});

describe("loadConfigFromEnv", () => {
  it("reads numbers, weights and the primary source", () => {
    const config = loadConfigFromEnv({
      AGENCYFLOW_TOP_K: "5",
      AGENCYFLOW_CACHE_TTL_SECONDS: "60",
      AGENCYFLOW_ROUTER_WEIGHTS: "0.6, 0.2, 0.2",
      AGENCYFLOW_PRIMARY_URL: "http://primary.test",
      AGENCYFLOW_PRIMARY_TOKEN: "test-secret",
    });

    expect(config.topK).toBe(5);
    expect(config.cacheTtlSeconds).toBe(60);
    expect(config.routerWeights).toEqual({ w1: 0.6, w2: 0.2, w3: 0.2 });
    expect(config.primary).toEqual({ url: "http://primary.test", token: "test-secret" });
  });

  it("ignores empty variables", () => {
    expect(loadConfigFromEnv({ AGENCYFLOW_TOP_K: "  " }).topK).toBe(10);
  });

  it("names the variable that failed to parse", () => {
    expect(() => loadConfigFromEnv({ AGENCYFLOW_MAX_RETRIES: "three" })).toThrow(
      'AGENCYFLOW_MAX_RETRIES must be a number, got "three"',
    );
    expect(() => loadConfigFromEnv({ AGENCYFLOW_ROUTER_WEIGHTS: "1,2" })).toThrow(
      'AGENCYFLOW_ROUTER_WEIGHTS must be three comma-separated numbers, got "1,2"',
    );
  });
});
