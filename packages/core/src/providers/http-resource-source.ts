import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ResourceRequest, ResourceType } from "../types.js";
import type { ResourceSource } from "./resource-source.js";
import { OrchestrationError, TransientError, ValidationError } from "../errors.js";
import { isRetryableError } from "../utils/resilience.js";

export interface HttpResourceSourceOptions {
  /** Base URL of the primary server, e.g. `https://data.internal/v1` */
  url: string;
  /** Bearer token */
  token?: string;
  name?: string;
  /** Injected for tests; defaults to the global `fetch` */
  fetch?: typeof fetch;
}

const queryResponseSchema = z.object({
  request_id: z.string().optional(),
  status: z.enum(["success", "error", "partial"]),
  data: z.union([z.record(z.unknown()), z.array(z.record(z.unknown())), z.null()]).optional(),
  error_message: z.string().nullish(),
  error_code: z.string().nullish(),
});

type QueryResponse = z.infer<typeof queryResponseSchema>;

const NON_RETRYABLE_ERROR_CODES = new Set(["invalid_request", "not_found"]);

/**
 * Primary resource source: a query/response protocol over HTTP.
 *
 * Every request is a POST to `<url>/query` carrying
 * `{ method, resource_type, resource_id, parameters, request_id }`.
 */
export class HttpResourceSource implements ResourceSource {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpResourceSourceOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.token = options.token;
    this.name = options.name ?? "primary";
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetch(request: ResourceRequest, signal: AbortSignal): Promise<Record<string, unknown>> {
    const body = await this.query({
      method: "get_resource",
      resource_type: request.resourceType,
      resource_id: request.key,
      parameters: request.parameters,
    }, signal);

    if (Array.isArray(body.data)) return { items: body.data };
    if (!body.data) {
      throw new TransientError(`Primary source returned no data for ${request.resourceType}:${request.key}`);
    }
    return body.data;
  }

  async search(
    resourceType: ResourceType,
    query: string,
    filters: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<Record<string, unknown>[]> {
    const body = await this.query({
      method: "search_resources",
      resource_type: resourceType,
      parameters: { query },
      filters,
    }, signal);
    return Array.isArray(body.data) ? body.data : [];
  }

  async ping(signal: AbortSignal): Promise<boolean> {
    const res = await this.fetchImpl(`${this.baseUrl}/health`, { headers: this.headers(), signal });
    return res.ok;
  }

  private headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      ...(this.token && { Authorization: `Bearer ${this.token}` }),
    };
  }

  private async query(message: Record<string, unknown>, signal: AbortSignal): Promise<QueryResponse> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/query`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({ ...message, request_id: randomUUID() }),
        signal,
      });
    } catch (error: unknown) {
      if (error instanceof Error && error.name === "AbortError") throw error;
      const text = error instanceof Error ? error.message : String(error);
      throw new TransientError(`Primary source unreachable: ${text}`, { cause: error });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      const message = `Primary source responded ${res.status}${text ? `: ${text.slice(0, 200)}` : ""}`;
      if (isRetryableError(Object.assign(new Error(message), { status: res.status }))) {
        throw new TransientError(message, { status: res.status });
      }
      throw new ValidationError(message, "resource-provider");
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error: unknown) {
      throw new TransientError("Primary source returned malformed JSON", { cause: error });
    }

    const parsed = queryResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransientError(`Primary source returned an unexpected body: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }

    const body = parsed.data;
    if (body.status === "error") {
      throw this.protocolError(body);
    }
    return body;
  }

  private protocolError(body: QueryResponse): OrchestrationError {
    const message = `Primary source error${body.error_code ? ` (${body.error_code})` : ""}: ${body.error_message ?? "unknown error"}`;
    if (body.error_code && NON_RETRYABLE_ERROR_CODES.has(body.error_code)) {
      return new ValidationError(message, "resource-provider");
    }
    return new TransientError(message);
  }
}
