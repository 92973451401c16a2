import { createRoute, z } from "@hono/zod-openapi";
import { agentFlagsSchema, type AgentView, type Orchestrator } from "@agencyflow/core";
import { createRouter } from "../../lib/create-router.js";
import { agentSchema, errorResponseSchema, notFoundSchema } from "../../lib/schemas.js";

function toAgentJson(view: AgentView) {
  return {
    id: view.id,
    tier: view.tier,
    ...(view.description !== undefined && { description: view.description }),
    capabilities: [...view.capabilities].sort(),
    maxConcurrent: view.maxConcurrent,
    currentLoad: view.currentLoad,
    queueDepth: view.queueDepth,
    enabled: view.enabled,
    enabledRetrieval: view.enabledRetrieval,
    enabledProvider: view.enabledProvider,
    stats: view.stats,
  };
}

const agentParams = z.object({
  agentId: z.string().openapi({ example: "technical_seo_auditor" }),
});

const notFound = {
  description: "Agent not found",
  content: { "application/json": { schema: notFoundSchema } },
};

export function createAgentsRoutes(orchestrator: Orchestrator) {
  const router = createRouter();

  // GET / — List all registered agents
  router.openapi(
    createRoute({
      method: "get",
      path: "/",
      tags: ["Agents"],
      summary: "List all registered agents",
      description: "Returns every agent with its flags, current load, queue depth and runtime stats",
      responses: {
        200: {
          description: "List of agents",
          content: {
            "application/json": {
              schema: z.object({ agents: z.array(agentSchema), count: z.number() }),
            },
          },
        },
      },
    }),
    (c) => {
      const agents = orchestrator.listAgents().map(toAgentJson);
      return c.json({ agents, count: agents.length }, 200);
    },
  );

  // GET /:agentId — Get agent details
  router.openapi(
    createRoute({
      method: "get",
      path: "/{agentId}",
      tags: ["Agents"],
      summary: "Get agent details",
      request: { params: agentParams },
      responses: {
        200: { description: "Agent details", content: { "application/json": { schema: agentSchema } } },
        404: notFound,
      },
    }),
    (c) => {
      const { agentId } = c.req.valid("param");
      const view = orchestrator.getAgent(agentId);
      if (!view) return c.json({ error: `Agent not found: ${agentId}` }, 404);
      return c.json(toAgentJson(view), 200);
    },
  );

  // PATCH /:agentId — Toggle agent flags
  router.openapi(
    createRoute({
      method: "patch",
      path: "/{agentId}",
      tags: ["Agents"],
      summary: "Enable or disable an agent, its retrieval or its live data",
      description: "Disabled agents are never routed to. Retrieval and live data can only be enabled when the agent was built with them.",
      request: {
        params: agentParams,
        body: { content: { "application/json": { schema: agentFlagsSchema } } },
      },
      responses: {
        200: { description: "Updated agent", content: { "application/json": { schema: agentSchema } } },
        400: { description: "Invalid flags", content: { "application/json": { schema: errorResponseSchema } } },
        404: notFound,
      },
    }),
    (c) => {
      const { agentId } = c.req.valid("param");
      const flags = c.req.valid("json");
      orchestrator.setAgentFlags(agentId, flags);
      const view = orchestrator.getAgent(agentId);
      if (!view) return c.json({ error: `Agent not found: ${agentId}` }, 404);
      return c.json(toAgentJson(view), 200);
    },
  );

  // DELETE /:agentId — Deregister an agent
  router.openapi(
    createRoute({
      method: "delete",
      path: "/{agentId}",
      tags: ["Agents"],
      summary: "Deregister an agent",
      description: "Closes the agent's retrieval index and dedicated provider. Running tasks finish; queued tasks are routed elsewhere.",
      request: { params: agentParams },
      responses: {
        200: {
          description: "Agent deregistered",
          content: { "application/json": { schema: z.object({ deleted: z.literal(true), agentId: z.string() }) } },
        },
        404: notFound,
      },
    }),
    (c) => {
      const { agentId } = c.req.valid("param");
      if (!orchestrator.deregister(agentId)) return c.json({ error: `Agent not found: ${agentId}` }, 404);
      return c.json({ deleted: true as const, agentId }, 200);
    },
  );

  return router;
}
