import { fileURLToPath } from "node:url";
import type { EmbeddingModel, LanguageModel } from "ai";
import {
  Orchestrator,
  ValidationError,
  createAIEmbedder,
  createLLMAgentHandler,
  loadKnowledgeDocuments,
  type OrchestratorOptions,
} from "@agencyflow/core";
import { AGENCY_AGENTS } from "./catalogue.js";

export const DEFAULT_KNOWLEDGE_DIR = fileURLToPath(new URL("./knowledge", import.meta.url));

export interface AgencyOrchestratorOptions extends OrchestratorOptions {
  /** Model every agent answers with */
  model: LanguageModel;
  /** Used to build the embedder when `embedder` is not given */
  embeddingModel?: EmbeddingModel<string>;
  /** Root of `<tier>/<agent>.md` knowledge files */
  knowledgeDir?: string;
  /** Build only these agents (default: the whole catalogue) */
  agents?: readonly string[];
  /** Retries of each model call */
  modelRetries?: number;
}

/**
 * Builds an orchestrator with the agency's agents registered, each answering
 * through the given model with its own knowledge files indexed.
 */
export async function createAgencyOrchestrator(options: AgencyOrchestratorOptions): Promise<Orchestrator> {
  const { model, embeddingModel, knowledgeDir = DEFAULT_KNOWLEDGE_DIR, agents, modelRetries, ...rest } = options;

  const unknown = agents?.filter((id) => !AGENCY_AGENTS.some((a) => a.id === id)) ?? [];
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown agents: ${unknown.join(", ")}`, "registry");
  }

  const embedder = rest.embedder ?? (embeddingModel ? createAIEmbedder(embeddingModel) : undefined);
  const orchestrator = new Orchestrator({ ...rest, ...(embedder && { embedder }) });
  await orchestrator.initialize();

  const selected = agents ? AGENCY_AGENTS.filter((a) => agents.includes(a.id)) : AGENCY_AGENTS;
  for (const definition of selected) {
    const knowledge = embedder ? await loadKnowledgeDocuments(knowledgeDir, definition.tier, definition.id) : [];
    await orchestrator.createAgent({
      id: definition.id,
      tier: definition.tier,
      capabilities: definition.capabilities,
      maxConcurrent: definition.maxConcurrent,
      description: definition.description,
      knowledge,
      handler: createLLMAgentHandler({
        model,
        system: definition.system,
        ...(definition.resources && { resources: definition.resources }),
        ...(modelRetries !== undefined && { maxRetries: modelRetries }),
      }),
    });
  }

  console.log(`[agencyflow] Built ${selected.length} agents${embedder ? "" : " (no embedder, retrieval disabled)"}`);
  return orchestrator;
}
