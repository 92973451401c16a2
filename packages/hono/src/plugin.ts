import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { OrchestrationError, Orchestrator } from "@agencyflow/core";
import type { AgencyPluginConfig, AgencyPluginInstance } from "./types.js";
import { configureOpenAPI } from "./lib/configure-openapi.js";
import { statusForFailure } from "./lib/http-errors.js";

// Route factories
import { createHealthRoutes } from "./routes/health/health.route.js";
import { createAgentsRoutes } from "./routes/agents/agents.routes.js";
import { createTasksRoutes } from "./routes/tasks/tasks.routes.js";

export function createAgencyPlugin(config: AgencyPluginConfig = {}): AgencyPluginInstance {
  const { orchestrator: provided, openapi, ...options } = config;
  const orchestrator = provided ?? new Orchestrator(options);

  // Build the Hono sub-app
  const app = new OpenAPIHono();

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.res ?? c.json({ error: err.message }, err.status);
    }

    if (err instanceof OrchestrationError) {
      const failure = err.toFailure();
      return c.json({ error: failure }, statusForFailure(failure));
    }

    console.error("[agencyflow] Unhandled error:", err);
    return c.json({ error: "Internal Server Error" }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: "Not Found" }, 404);
  });

  app.route("/health", createHealthRoutes(orchestrator));
  app.route("/agents", createAgentsRoutes(orchestrator));
  app.route("/tasks", createTasksRoutes(orchestrator));

  configureOpenAPI(app, openapi);

  return {
    app,
    orchestrator,
    async initialize() {
      await orchestrator.initialize();
      console.log(`[agencyflow] Serving ${orchestrator.listAgents().length} agents`);
    },
  };
}
