import { defineAgent, domainResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You write client performance reports.

Summarise traffic, rankings and conversions for the period, explain the main movements, and close with three recommendations. Start with a five-line executive summary.`;

export const reporting = defineAgent({
  id: "reporting",
  tier: "operational",
  description: "Produces periodic performance reports",
  capabilities: ["reporting"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
  resources: domainResources("analytics_data", "seo_data"),
});
