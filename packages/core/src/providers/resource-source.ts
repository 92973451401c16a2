import type { ResourceRequest, ResourceType } from "../types.js";

/**
 * A place resource payloads come from. The primary (remote) source and the
 * local fallback implement the same shape, so callers only learn which one
 * served them from `ResourceResponse.source`.
 *
 * Implementations throw `TransientError` for failures worth retrying and
 * `ValidationError` for requests the source will never accept.
 */
export interface ResourceSource {
  readonly name: string;
  fetch(request: ResourceRequest, signal: AbortSignal): Promise<Record<string, unknown>>;
  /** Best-effort search across resources of one type */
  search?(
    resourceType: ResourceType,
    query: string,
    filters: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<Record<string, unknown>[]>;
  /** Cheap reachability probe used at initialization */
  ping?(signal: AbortSignal): Promise<boolean>;
}
