import { generateText, type LanguageModel } from "ai";
import type { ResourceOrigin, ResourceParameters, ResourceResponse, ResourceType, Task } from "../types.js";
import type { AgentHandler } from "../registry/agent-registry.js";
import type { SearchHit } from "../retrieval/retrieval-index.js";
import { STATUS_CODES } from "../events/events.js";
import { withRetry } from "../utils/resilience.js";
import { extractUsage, type UsageInfo } from "../utils/ai-provider.js";
import { DEFAULTS } from "../utils/constants.js";

export interface ResourceQuery {
  resourceType: ResourceType;
  key: string;
  parameters?: ResourceParameters;
}

export interface LLMAgentConfig {
  model: LanguageModel;
  system: string;
  /** Knowledge snippets per task; the index default applies when omitted */
  topK?: number;
  /** Live data to fetch for a task */
  resources?: (task: Readonly<Task>) => ResourceQuery[];
  /** Retries of the model call (default: 2) */
  maxRetries?: number;
}

export interface LLMAgentResult {
  text: string;
  usage: UsageInfo;
  /** `metadata.source` of every knowledge chunk used */
  knowledgeSources: string[];
  /** Where each live-data payload came from */
  dataSources: ResourceOrigin[];
}

const QUERY_FIELDS = ["query", "message", "description", "domain"] as const;

/** Text used as the retrieval query: the first string among the payload's usual fields. */
export function taskQuery(task: Readonly<Task>): string {
  for (const field of QUERY_FIELDS) {
    const value = task.payload[field];
    if (typeof value === "string" && value.trim()) return value;
  }
  return `${task.type.replace(/_/g, " ")} ${JSON.stringify(task.payload)}`;
}

export function buildTaskPrompt(task: Readonly<Task>): string {
  return [
    `Task type: ${task.type}`,
    `Priority: ${task.priority}`,
    "",
    "Details:",
    JSON.stringify(task.payload, null, 2),
  ].join("\n");
}

function sourceOf(hit: SearchHit): string {
  const source = hit.chunk.metadata.source;
  return typeof source === "string" ? source : hit.chunk.id;
}

export function buildSystemPrompt(
  system: string,
  hits: readonly SearchHit[],
  data: readonly { query: ResourceQuery; response: ResourceResponse }[],
): string {
  const sections = [system];

  if (hits.length > 0) {
    const snippets = hits.map((hit) => `### ${sourceOf(hit)} (score ${hit.score.toFixed(2)})\n${hit.chunk.text}`);
    sections.push(`# Knowledge Context\n\n${snippets.join("\n\n")}`);
  }

  if (data.length > 0) {
    const blocks = data.map(({ query, response }) =>
      `### ${query.resourceType}: ${query.key} (source: ${response.source})\n${JSON.stringify(response.payload, null, 2)}`,
    );
    sections.push(`# Live Data\n\n${blocks.join("\n\n")}`);
  }

  return sections.join("\n\n");
}

/**
 * Builds an agent handler that answers a task with one model call, its
 * system prompt enriched with retrieved knowledge and live resource data.
 * Missing context is logged and skipped; a failed model call fails the task.
 */
export function createLLMAgentHandler(config: LLMAgentConfig): AgentHandler {
  return async (ctx): Promise<LLMAgentResult> => {
    const { task, agent } = ctx;

    let hits: SearchHit[] = [];
    try {
      hits = await ctx.retrieve(taskQuery(task), config.topK !== undefined ? { topK: config.topK } : {});
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[agent] ${agent.id}: knowledge retrieval failed, continuing without it: ${message}`);
    }

    const data: { query: ResourceQuery; response: ResourceResponse }[] = [];
    for (const query of config.resources?.(task) ?? []) {
      const res = await ctx.fetchResource(query.resourceType, query.key, query.parameters);
      if (res.ok) {
        data.push({ query, response: res.value });
      } else {
        console.warn(`[agent] ${agent.id}: no ${query.resourceType} for ${query.key}: ${res.error.message}`);
      }
    }

    ctx.emitStatus(STATUS_CODES.PROCESSING, "Generating response");
    const startTime = performance.now();
    const result = await withRetry({
      fn: (abortSignal) => generateText({
        model: config.model,
        system: buildSystemPrompt(config.system, hits, data),
        prompt: buildTaskPrompt(task),
        maxRetries: 0,
        abortSignal,
      }),
      maxRetries: config.maxRetries ?? DEFAULTS.MAX_RETRIES,
      component: "agent",
      abortSignal: ctx.signal,
      onRetry: ({ attempt, maxRetries, delay, error }) => {
        ctx.emitStatus(STATUS_CODES.RETRYING, `Model call failed, retrying (${attempt}/${maxRetries})`, {
          delay,
          error: error.message,
        });
      },
    });

    return {
      text: result.text,
      usage: extractUsage(result, startTime),
      knowledgeSources: hits.map(sourceOf),
      dataSources: data.map((d) => d.response.source),
    };
  };
}
