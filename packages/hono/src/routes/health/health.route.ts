import { createRoute, OpenAPIHono } from "@hono/zod-openapi";
import { worstHealth, type Orchestrator } from "@agencyflow/core";
import { healthResponseSchema } from "../../lib/schemas.js";

export function createHealthRoutes(orchestrator: Orchestrator) {
  const router = new OpenAPIHono();

  router.openapi(
    createRoute({
      method: "get",
      path: "/",
      tags: ["Health"],
      summary: "Health check",
      description: "Health of every provider, retrieval index, agent and the router. The overall status is the worst component status.",
      responses: {
        200: {
          description: "Component health",
          content: { "application/json": { schema: healthResponseSchema } },
        },
      },
    }),
    (c) => {
      const components = orchestrator.aggregateHealth();
      return c.json(
        {
          status: worstHealth(Object.values(components).map((record) => record.status)),
          timestamp: new Date().toISOString(),
          components,
        },
        200,
      );
    },
  );

  return router;
}
