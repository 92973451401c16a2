// ── Core types ──
export type {
  TaskType,
  Priority,
  AgentTier,
  TaskStatus,
  Task,
  AgentDescriptor,
  AgentStats,
  ResourceType,
  ResourceParameters,
  ResourceRequest,
  ResourceOrigin,
  ResourceResponse,
  HealthStatus,
  HealthRecord,
} from "./types.js";
export { TASK_TYPES, TASK_STATUSES, PRIORITIES, AGENT_TIERS, RESOURCE_TYPES, TERMINAL_STATUSES, worstHealth } from "./types.js";

// ── Config ──
export { resolveConfig, loadConfigFromEnv } from "./config.js";
export type { CoreConfig, ResolvedConfig, RouterWeights, PrimarySourceConfig } from "./config.js";

// ── Errors ──
export {
  OrchestrationError,
  ValidationError,
  TransientError,
  CapabilityError,
  OverloadedError,
  DeadlineExceededError,
  IndexUnavailableError,
  ok,
  err,
  toTaskFailure,
} from "./errors.js";
export type { ErrorKind, ErrorComponent, TaskFailure, Result } from "./errors.js";

// ── Registry ──
export { AgentRegistry } from "./registry/agent-registry.js";
export type { AgentContext, AgentHandler, AgentSpec, AgentFlags, ReleaseOutcome } from "./registry/agent-registry.js";

// ── Routing ──
export { TaskRouter } from "./routing/task-router.js";
export type { RouteDecision, Assignment, EscalationSignal, EscalationReason, Admission, TaskRouterOptions } from "./routing/task-router.js";
export { PriorityQueues } from "./routing/task-queue.js";
export { advanceStatus, canTransition } from "./routing/task-status.js";

// ── Orchestrator ──
export { Orchestrator } from "./agents/orchestrator.js";
export type {
  OrchestratorOptions,
  CreateAgentOptions,
  AgentHandle,
  AgentView,
  SubmitReceipt,
  SubmitRejection,
  TaskResult,
} from "./agents/orchestrator.js";
export { executeTask, createAgentContext } from "./agents/execute-task.js";
export { createLLMAgentHandler, buildSystemPrompt, buildTaskPrompt, taskQuery } from "./agents/llm-agent.js";
export type { LLMAgentConfig, LLMAgentResult, ResourceQuery } from "./agents/llm-agent.js";
export { taskSubmissionSchema, agentSpecSchema, agentFlagsSchema, formatZodIssue } from "./schemas/task.schemas.js";
export type { TaskSubmission } from "./schemas/task.schemas.js";

// ── Resource providers ──
export { ResourceProvider, createResourceProvider } from "./providers/resource-provider.js";
export type { ResourceProviderOptions, ProviderStats, CreateResourceProviderOptions } from "./providers/resource-provider.js";
export type { ResourceSource } from "./providers/resource-source.js";
export { HttpResourceSource } from "./providers/http-resource-source.js";
export type { HttpResourceSourceOptions } from "./providers/http-resource-source.js";
export { StaticResourceSource } from "./providers/static-resource-source.js";

// ── Retrieval ──
export { RetrievalIndex } from "./retrieval/retrieval-index.js";
export type { KnowledgeDocument, KnowledgeChunk, SearchHit, SearchOptions, RetrievalIndexOptions } from "./retrieval/retrieval-index.js";
export { chunkText } from "./retrieval/chunker.js";
export type { ChunkOptions } from "./retrieval/chunker.js";
export { createAIEmbedder, normalize } from "./retrieval/embedder.js";
export type { Embedder, AIEmbedderOptions } from "./retrieval/embedder.js";
export { loadKnowledgeDocuments } from "./retrieval/knowledge-loader.js";

// ── Cache ──
export { TtlCache } from "./cache/ttl-cache.js";
export type { CacheEntry, TtlCacheOptions } from "./cache/ttl-cache.js";
export { SingleFlight } from "./utils/singleflight.js";

// ── Events ──
export { AgentEventBus } from "./events/agent-events.js";
export type { AgentEvent } from "./events/agent-events.js";
export { BUS_EVENTS, STATUS_CODES } from "./events/events.js";
export type { BusEventName, StatusCode, StatusPayload } from "./events/events.js";

// ── Constants ──
export { DEFAULTS, ENV_KEYS } from "./utils/constants.js";

// ── Resilience ──
export { withRetry, withTimeout, isRetryableError, computeDelay } from "./utils/resilience.js";
export type { RetryOptions, RetryInfo } from "./utils/resilience.js";

// ── AI provider utilities ──
export type { UsageInfo } from "./utils/ai-provider.js";
export { extractUsage } from "./utils/ai-provider.js";

// ── Storage ──
export type { TaskStore, TaskRecord, TaskRecordPatch, TaskTransition } from "./storage/interfaces.js";
export { createInMemoryTaskStore } from "./storage/in-memory/task-store.js";
export type { InMemoryTaskStoreOptions } from "./storage/in-memory/task-store.js";
