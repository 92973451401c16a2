import type { OpenAPIHono } from "@hono/zod-openapi";
import type { Orchestrator, OrchestratorOptions } from "@agencyflow/core";
import type { OpenAPIConfig } from "./lib/configure-openapi.js";

export interface AgencyPluginConfig extends OrchestratorOptions {
  /** Serve an orchestrator built elsewhere; the other options are then ignored */
  orchestrator?: Orchestrator;
  openapi?: OpenAPIConfig;
}

export interface AgencyPluginInstance {
  app: OpenAPIHono;
  orchestrator: Orchestrator;
  initialize(): Promise<void>;
}
