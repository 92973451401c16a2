import type { AgentDescriptor, Task } from "../types.js";
import type { AgentContext, AgentRegistry } from "../registry/agent-registry.js";
import type { RetrievalIndex } from "../retrieval/retrieval-index.js";
import type { ResourceProvider } from "../providers/resource-provider.js";
import type { AgentEventBus } from "../events/agent-events.js";
import { BUS_EVENTS, STATUS_CODES } from "../events/events.js";
import { CapabilityError, IndexUnavailableError, OrchestrationError, err } from "../errors.js";

/** Dependencies wired to one agent */
export interface ExecutionDeps {
  registry: AgentRegistry;
  events: AgentEventBus;
  index?: RetrievalIndex;
  provider?: ResourceProvider;
}

export function createAgentContext(
  deps: ExecutionDeps,
  task: Task,
  agent: AgentDescriptor,
  signal: AbortSignal,
): AgentContext {
  const { registry, events, index, provider } = deps;

  const emitStatus: AgentContext["emitStatus"] = (code, message, metadata) => {
    events.emit(BUS_EVENTS.STATUS, {
      code,
      message,
      agent: agent.id,
      taskId: task.id,
      ...(metadata && { metadata }),
    });
  };

  return {
    task,
    agent,
    signal,
    emitStatus,

    async retrieve(query, options = {}) {
      // Flags are read per call so toggles apply to running tasks
      if (!index || !registry.get(agent.id)?.enabledRetrieval) return [];
      emitStatus(STATUS_CODES.LOADING_CONTEXT, "Searching knowledge base");
      try {
        return await index.search(query, { ...options, signal });
      } catch (error: unknown) {
        if (!(error instanceof IndexUnavailableError)) throw error;
        console.warn(`[retrieval] ${agent.id}: proceeding without knowledge context: ${error.message}`);
        events.emit(BUS_EVENTS.RETRIEVAL_DEGRADED, { index: index.id, taskId: task.id, reason: error.message });
        return [];
      }
    },

    async fetchResource(resourceType, key, parameters = {}) {
      if (!provider || !registry.get(agent.id)?.enabledProvider) {
        return err(new OrchestrationError("capability", `Live data is disabled for agent "${agent.id}"`, {
          component: "resource-provider",
        }));
      }
      emitStatus(STATUS_CODES.FETCHING_DATA, `Fetching ${resourceType} for ${key}`);
      return provider.fetch(resourceType, key, parameters);
    },
  };
}

/** Runs the agent's handler for one task and returns whatever it produced. */
export async function executeTask(
  deps: ExecutionDeps,
  task: Task,
  agent: AgentDescriptor,
  signal: AbortSignal,
): Promise<unknown> {
  const handler = deps.registry.getHandler(agent.id);
  if (!handler) {
    throw new CapabilityError(`Agent "${agent.id}" was deregistered before task ${task.id} started`);
  }
  return await handler(createAgentContext(deps, task, agent, signal));
}
