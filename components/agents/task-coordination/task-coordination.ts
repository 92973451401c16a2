import { defineAgent } from "../define-agent.js";

const SYSTEM_PROMPT = `You coordinate work across the agency's specialist teams.

Break the request into ordered work items. For each item give the task type, the team that owns it, its priority and what it depends on. Flag items that block client deliverables.`;

export const taskCoordination = defineAgent({
  id: "task_coordination",
  tier: "management",
  description: "Plans multi-step work and assigns it to the right teams",
  capabilities: ["task_coordination"],
  maxConcurrent: 2,
  system: SYSTEM_PROMPT,
});
