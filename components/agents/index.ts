export { AGENCY_AGENTS } from "./catalogue.js";
export { createAgencyOrchestrator, DEFAULT_KNOWLEDGE_DIR } from "./create-agency-orchestrator.js";
export type { AgencyOrchestratorOptions } from "./create-agency-orchestrator.js";
export { defineAgent, domainResources, clientResources, payloadString } from "./define-agent.js";
export type { AgencyAgentDefinition } from "./define-agent.js";
