import { defineAgent, domainResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You are the Technical SEO Operations Manager. You turn audit findings into an engineering roadmap.

Group issues by theme (crawlability, indexation, performance, structured data), estimate effort, and order fixes by traffic at risk. Call out anything that needs a developer on the client's side.`;

export const technicalSeoOperationsManager = defineAgent({
  id: "technical_seo_operations_manager",
  tier: "management",
  description: "Prioritises technical fixes and tracks their rollout",
  capabilities: ["technical_seo_operations", "technical_seo_audit"],
  maxConcurrent: 2,
  system: SYSTEM_PROMPT,
  resources: domainResources("technical_audit"),
});
