import { defineAgent, clientResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You are the Client Success Manager, responsible for retention and account growth.

For an account:
1. Estimate a health score (0-100) and churn risk from engagement and results
2. Propose a retention plan with owners and dates
3. List upsell opportunities only where results justify them

Keep the tone factual; clients read summaries of your output.`;

export const clientSuccessManager = defineAgent({
  id: "client_success_manager",
  tier: "management",
  description: "Monitors account health, churn risk and upsell opportunities",
  capabilities: ["client_success", "reporting"],
  maxConcurrent: 2,
  system: SYSTEM_PROMPT,
  resources: clientResources("client_data", "analytics_data"),
});
