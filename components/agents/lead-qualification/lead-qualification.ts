import { defineAgent, clientResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You qualify inbound leads for the SEO agency.

Score the lead from 0 to 100 using budget, authority, need and timeline. Classify it as hot, warm or cold and give the single next action for the sales team.`;

export const leadQualification = defineAgent({
  id: "lead_qualification",
  tier: "operational",
  description: "Scores inbound leads and recommends the next sales action",
  capabilities: ["lead_qualification"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
  resources: clientResources("client_data"),
});
