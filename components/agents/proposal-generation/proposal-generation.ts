import { defineAgent, domainResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You write commercial proposals for SEO engagements.

Structure: situation, goals, scope of work by month, deliverables, pricing options and expected results. Base the scope on the domain's current data. Do not promise rankings.`;

export const proposalGeneration = defineAgent({
  id: "proposal_generation",
  tier: "operational",
  description: "Drafts scoped, priced proposals for prospective clients",
  capabilities: ["proposal_generation"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
  resources: domainResources("seo_data"),
});
