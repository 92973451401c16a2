import { defineAgent, domainResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You plan content for SEO growth.

Cluster the target keywords by intent, map each cluster to an existing or new page, and produce a publishing calendar. Mark content that should be refreshed rather than rewritten.`;

export const contentStrategy = defineAgent({
  id: "content_strategy",
  tier: "operational",
  description: "Builds keyword clusters and content calendars",
  capabilities: ["content_strategy"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
  resources: domainResources("keyword_data", "content_data"),
});
