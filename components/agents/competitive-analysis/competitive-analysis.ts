import { defineAgent, domainResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You analyse search competitors.

Compare the domain with its main competitors on visibility, keyword overlap, content depth and backlinks. Identify the gaps worth closing first and the SERP features the client could win.`;

export const competitiveAnalysis = defineAgent({
  id: "competitive_analysis",
  tier: "operational",
  description: "Compares a domain with its search competitors",
  capabilities: ["competitive_analysis"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
  resources: domainResources("competitive_data", "keyword_data"),
});
