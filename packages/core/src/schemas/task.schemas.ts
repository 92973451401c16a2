import { z } from "zod";
import { AGENT_TIERS, PRIORITIES, TASK_TYPES } from "../types.js";

/** Accepts an ISO timestamp or epoch ms; yields epoch ms */
const deadlineSchema = z
  .union([z.number().int().nonnegative(), z.string().datetime({ offset: true })])
  .transform((value) => (typeof value === "string" ? Date.parse(value) : value));

export const taskSubmissionSchema = z.object({
  type: z.enum(TASK_TYPES),
  priority: z.enum(PRIORITIES).default("medium"),
  payload: z.record(z.unknown()).default({}),
  deadline: deadlineSchema.optional(),
});

export type TaskSubmission = z.input<typeof taskSubmissionSchema>;

export const agentSpecSchema = z.object({
  id: z.string().trim().min(1).regex(/^[a-z0-9][a-z0-9_-]*$/i, "id may contain letters, digits, '_' and '-'"),
  tier: z.enum(AGENT_TIERS),
  capabilities: z.array(z.enum(TASK_TYPES)).min(1),
  maxConcurrent: z.number().int().min(1).default(1),
});

export const agentFlagsSchema = z
  .object({
    enabled: z.boolean(),
    enabledRetrieval: z.boolean(),
    enabledProvider: z.boolean(),
  })
  .partial();

export function formatZodIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid input";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
