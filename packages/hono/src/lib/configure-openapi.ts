import type { OpenAPIHono } from "@hono/zod-openapi";

export interface OpenAPIConfig {
  title?: string;
  version?: string;
  description?: string;
  serverUrl?: string;
}

export function configureOpenAPI(app: OpenAPIHono, config: OpenAPIConfig = {}) {
  const {
    title = "Agency Orchestrator API",
    version = "1.0.0",
    description = "Task routing across the agency's agents",
    serverUrl,
  } = config;

  const servers = serverUrl
    ? [{ url: serverUrl, description: "Server" }]
    : [];

  app.doc31("/doc", {
    openapi: "3.1.0",
    info: { title, version, description },
    ...(servers.length > 0 && { servers }),
  });
}
