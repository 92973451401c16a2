import type { AgencyAgentDefinition } from "./define-agent.js";
import { chiefSeoStrategist } from "./chief-seo-strategist/chief-seo-strategist.js";
import { businessDevelopmentDirector } from "./business-development-director/business-development-director.js";
import { taskCoordination } from "./task-coordination/task-coordination.js";
import { salesOperationsManager } from "./sales-operations-manager/sales-operations-manager.js";
import { technicalSeoOperationsManager } from "./technical-seo-operations-manager/technical-seo-operations-manager.js";
import { clientSuccessManager } from "./client-success-manager/client-success-manager.js";
import { leadQualification } from "./lead-qualification/lead-qualification.js";
import { proposalGeneration } from "./proposal-generation/proposal-generation.js";
import { salesConversation } from "./sales-conversation/sales-conversation.js";
import { technicalSeoAuditor } from "./technical-seo-auditor/technical-seo-auditor.js";
import { contentStrategy } from "./content-strategy/content-strategy.js";
import { linkBuilding } from "./link-building/link-building.js";
import { competitiveAnalysis } from "./competitive-analysis/competitive-analysis.js";
import { reporting } from "./reporting/reporting.js";

/** Every agency agent, executive tier first */
export const AGENCY_AGENTS: readonly AgencyAgentDefinition[] = [
  chiefSeoStrategist,
  businessDevelopmentDirector,
  taskCoordination,
  salesOperationsManager,
  technicalSeoOperationsManager,
  clientSuccessManager,
  leadQualification,
  proposalGeneration,
  salesConversation,
  technicalSeoAuditor,
  contentStrategy,
  linkBuilding,
  competitiveAnalysis,
  reporting,
];
