import { createRoute, z } from "@hono/zod-openapi";
import { taskSubmissionSchema, type Orchestrator } from "@agencyflow/core";
import { createRouter } from "../../lib/create-router.js";
import { failureException } from "../../lib/http-errors.js";
import {
  errorResponseSchema,
  notFoundSchema,
  taskOutcomeSchema,
  taskReceiptSchema,
  taskRecordSchema,
} from "../../lib/schemas.js";

export function createTasksRoutes(orchestrator: Orchestrator) {
  const router = createRouter();

  // POST / — Submit a task
  router.openapi(
    createRoute({
      method: "post",
      path: "/",
      tags: ["Tasks"],
      summary: "Submit a task",
      description: "Queues the task and answers 202 with its id. With `wait=true` the request blocks until the task is done or failed.",
      request: {
        query: z.object({
          wait: z.enum(["true", "false"]).optional().openapi({ example: "true" }),
        }),
        body: { content: { "application/json": { schema: taskSubmissionSchema } } },
      },
      responses: {
        200: { description: "Task outcome (wait=true)", content: { "application/json": { schema: taskOutcomeSchema } } },
        202: { description: "Task accepted", content: { "application/json": { schema: taskReceiptSchema } } },
        400: { description: "Invalid task", content: { "application/json": { schema: errorResponseSchema } } },
        503: { description: "Queue full", content: { "application/json": { schema: errorResponseSchema } } },
      },
    }),
    async (c) => {
      const { wait } = c.req.valid("query");
      const receipt = await orchestrator.submit(c.req.valid("json"));
      if (!receipt.ok) throw failureException(receipt.error.error);

      if (wait !== "true") return c.json(receipt.value, 202);

      const outcome = await orchestrator.wait(receipt.value.taskId);
      if (!outcome) {
        throw failureException({
          kind: "agent_error",
          message: `Task ${receipt.value.taskId} expired before it could be read`,
          component: "orchestrator",
          retryable: false,
        });
      }
      return c.json(outcome, 200);
    },
  );

  // GET /:taskId — Poll a task
  router.openapi(
    createRoute({
      method: "get",
      path: "/{taskId}",
      tags: ["Tasks"],
      summary: "Get a task record",
      description: "Status, history and outcome of a task. Finished tasks are kept for the configured retention period.",
      request: { params: z.object({ taskId: z.string() }) },
      responses: {
        200: { description: "Task record", content: { "application/json": { schema: taskRecordSchema } } },
        404: { description: "Unknown or expired task", content: { "application/json": { schema: notFoundSchema } } },
      },
    }),
    async (c) => {
      const { taskId } = c.req.valid("param");
      const record = await orchestrator.getTask(taskId);
      if (!record) return c.json({ error: `Task not found: ${taskId}` }, 404);
      return c.json(record, 200);
    },
  );

  return router;
}
