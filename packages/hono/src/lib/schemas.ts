import { z } from "@hono/zod-openapi";
import { AGENT_TIERS, PRIORITIES, TASK_STATUSES, TASK_TYPES } from "@agencyflow/core";

const healthStatusSchema = z.enum(["healthy", "degraded", "unavailable"]);

export const taskFailureSchema = z
  .object({
    kind: z.enum([
      "validation",
      "transient",
      "capability",
      "overloaded",
      "deadline_exceeded",
      "index_unavailable",
      "agent_error",
    ]),
    message: z.string(),
    component: z.enum([
      "orchestrator",
      "router",
      "registry",
      "resource-provider",
      "retrieval",
      "embedding",
      "agent",
      "config",
    ]),
    retryable: z.boolean(),
    source: z.literal("fallback_failed").optional(),
  })
  .openapi("TaskFailure");

export const errorResponseSchema = z.object({ error: taskFailureSchema });

export const notFoundSchema = z.object({ error: z.string() });

export const healthRecordSchema = z
  .object({
    componentId: z.string(),
    status: healthStatusSchema,
    lastSuccessAt: z.number().optional(),
    consecutiveFailures: z.number(),
    detail: z.string().optional(),
  })
  .openapi("HealthRecord");

export const healthResponseSchema = z.object({
  status: healthStatusSchema,
  timestamp: z.string(),
  components: z.record(healthRecordSchema),
});

export const agentSchema = z
  .object({
    id: z.string(),
    tier: z.enum(AGENT_TIERS),
    description: z.string().optional(),
    capabilities: z.array(z.enum(TASK_TYPES)),
    maxConcurrent: z.number(),
    currentLoad: z.number(),
    queueDepth: z.number(),
    enabled: z.boolean(),
    enabledRetrieval: z.boolean(),
    enabledProvider: z.boolean(),
    stats: z.object({
      lastLatencyMs: z.number().optional(),
      recentAvgLatencyMs: z.number().optional(),
      completed: z.number(),
      errorCount: z.number(),
      consecutiveFailures: z.number(),
      successRate: z.number(),
    }),
  })
  .openapi("Agent");

export const taskReceiptSchema = z.object({
  taskId: z.string(),
  status: z.enum(TASK_STATUSES),
});

export const taskOutcomeSchema = z.union([
  z.object({
    ok: z.literal(true),
    taskId: z.string(),
    agentId: z.string(),
    result: z.unknown(),
    late: z.boolean(),
  }),
  z.object({
    ok: z.literal(false),
    taskId: z.string().optional(),
    error: taskFailureSchema,
  }),
]);

export const taskRecordSchema = z
  .object({
    id: z.string(),
    type: z.enum(TASK_TYPES),
    priority: z.enum(PRIORITIES),
    status: z.enum(TASK_STATUSES),
    agentId: z.string().optional(),
    result: z.unknown(),
    error: taskFailureSchema.optional(),
    late: z.boolean(),
    deadline: z.number().optional(),
    createdAt: z.number(),
    updatedAt: z.number(),
    history: z.array(z.object({ status: z.enum(TASK_STATUSES), at: z.number() })),
  })
  .openapi("TaskRecord");
