import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ErrorKind, TaskFailure } from "@agencyflow/core";

const STATUS_BY_KIND: Record<ErrorKind, ContentfulStatusCode> = {
  validation: 400,
  capability: 422,
  overloaded: 503,
  deadline_exceeded: 408,
  index_unavailable: 503,
  transient: 502,
  agent_error: 500,
};

export function statusForFailure(failure: TaskFailure): ContentfulStatusCode {
  return STATUS_BY_KIND[failure.kind];
}

/** Wraps a failure so `onError` answers with `{ error: TaskFailure }` and the matching status. */
export function failureException(failure: TaskFailure): HTTPException {
  const status = statusForFailure(failure);
  return new HTTPException(status, {
    message: failure.message,
    res: Response.json({ error: failure }, { status }),
  });
}
