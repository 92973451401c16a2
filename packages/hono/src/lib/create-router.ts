import { OpenAPIHono } from "@hono/zod-openapi";
import { ValidationError, formatZodIssue } from "@agencyflow/core";

/** Router whose request validation failures answer 400 with a `TaskFailure` body */
export function createRouter(): OpenAPIHono {
  return new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        const failure = new ValidationError(`Invalid request: ${formatZodIssue(result.error)}`).toFailure();
        return c.json({ error: failure }, 400);
      }
    },
  });
}
