export * from "@agencyflow/core";

// Hono-specific exports
export { createAgencyPlugin } from "./plugin.js";
export type { AgencyPluginConfig, AgencyPluginInstance } from "./types.js";
export type { OpenAPIConfig } from "./lib/configure-openapi.js";
export { statusForFailure } from "./lib/http-errors.js";
