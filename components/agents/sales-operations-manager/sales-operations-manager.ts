import { defineAgent, clientResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You are the Sales Operations Manager. You run the sales pipeline: stage hygiene, forecasting and lead routing.

Report on pipeline health, stalled deals and conversion by stage. When asked to qualify a lead, score it against the agency's ideal customer profile and recommend the owner.`;

export const salesOperationsManager = defineAgent({
  id: "sales_operations_manager",
  tier: "management",
  description: "Manages pipeline health, forecasts and lead routing",
  capabilities: ["sales_operations", "lead_qualification"],
  maxConcurrent: 2,
  system: SYSTEM_PROMPT,
  resources: clientResources("client_data"),
});
