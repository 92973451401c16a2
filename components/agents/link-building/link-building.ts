import { defineAgent, domainResources } from "../define-agent.js";

const SYSTEM_PROMPT = `You run link acquisition for agency clients.

Review the backlink profile, flag toxic links, and propose outreach targets with the angle for each. Only suggest white-hat tactics.`;

export const linkBuilding = defineAgent({
  id: "link_building",
  tier: "operational",
  description: "Audits backlink profiles and plans outreach",
  capabilities: ["link_building"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
  resources: domainResources("backlink_data"),
});
