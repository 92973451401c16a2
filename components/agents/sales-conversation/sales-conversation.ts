import { defineAgent } from "../define-agent.js";

const SYSTEM_PROMPT = `You handle sales conversations with prospects of an SEO agency.

Answer the prospect's message, address objections honestly and move the conversation toward a discovery call. Keep replies under 150 words.`;

export const salesConversation = defineAgent({
  id: "sales_conversation",
  tier: "operational",
  description: "Replies to prospects and handles objections",
  capabilities: ["sales_conversation"],
  maxConcurrent: 3,
  system: SYSTEM_PROMPT,
});
