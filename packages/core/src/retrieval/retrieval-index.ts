import type { HealthRecord, HealthStatus } from "../types.js";
import type { Embedder } from "./embedder.js";
import { dot, normalize } from "./embedder.js";
import { chunkText } from "./chunker.js";
import { resolveConfig, type CoreConfig, type ResolvedConfig } from "../config.js";
import { TtlCache } from "../cache/ttl-cache.js";
import { IndexUnavailableError, TransientError } from "../errors.js";
import type { AgentEventBus } from "../events/agent-events.js";
import { BUS_EVENTS } from "../events/events.js";

export interface KnowledgeDocument {
  text: string;
  metadata?: Record<string, unknown>;
}

export interface KnowledgeChunk {
  /** `<agentId>:<zero-padded sequence>`, so ids sort in insertion order */
  readonly id: string;
  /** Unit length */
  readonly vector: readonly number[];
  readonly text: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly agentId: string;
}

export interface SearchHit {
  chunk: KnowledgeChunk;
  score: number;
}

export interface SearchOptions {
  /** Defaults to `config.topK` */
  topK?: number;
  /** Defaults to `config.similarityThreshold` */
  threshold?: number;
  signal?: AbortSignal;
}

export interface RetrievalIndexOptions {
  agentId: string;
  embedder: Embedder;
  config?: CoreConfig | ResolvedConfig;
  events?: AgentEventBus;
  now?: () => number;
}

const ID_PAD = 6;

/**
 * Per-agent knowledge index searched by cosine similarity.
 *
 * Vectors are normalized when added, so a similarity score is a plain dot
 * product. Results are ordered by score descending, then by chunk id.
 */
export class RetrievalIndex {
  readonly id: string;
  readonly agentId: string;
  private readonly embedder: Embedder;
  private readonly config: ResolvedConfig;
  private readonly events?: AgentEventBus;
  private readonly now: () => number;
  private readonly queryCache: TtlCache<number[]>;
  private chunks: KnowledgeChunk[] = [];
  private dim?: number;
  private unavailableReason?: string;
  private consecutiveFailures = 0;
  private lastSuccessAt?: number;

  constructor(options: RetrievalIndexOptions) {
    this.agentId = options.agentId;
    this.id = `retrieval:${options.agentId}`;
    this.embedder = options.embedder;
    this.config = resolveConfig(options.config);
    this.events = options.events;
    this.now = options.now ?? Date.now;
    this.queryCache = new TtlCache({ maxEntries: this.config.cacheMaxEntries, now: this.now });
    this.queryCache.startSweeper(this.config.cacheSweepIntervalMs);
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Vector length fixed by the first embedded chunk */
  get dimension(): number | undefined {
    return this.dim;
  }

  /**
   * Chunks, embeds and stores documents. The batch is added whole or not at
   * all. Returns the number of chunks added.
   */
  async addDocuments(documents: readonly KnowledgeDocument[], signal?: AbortSignal): Promise<number> {
    const pending: { text: string; metadata: Record<string, unknown> }[] = [];
    for (const doc of documents) {
      const pieces = chunkText(doc.text, { chunkSize: this.config.chunkSize, chunkOverlap: this.config.chunkOverlap });
      pieces.forEach((text, chunkIndex) => {
        pending.push({ text, metadata: { ...doc.metadata, chunkIndex, chunkCount: pieces.length } });
      });
    }
    if (pending.length === 0) return 0;

    let vectors: number[][];
    try {
      vectors = await this.embedder.embed(pending.map((p) => p.text), signal);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw this.markUnavailable(`Failed to embed knowledge for ${this.agentId}: ${message}`, error);
    }
    if (vectors.length !== pending.length) {
      throw this.markUnavailable(`Embedder returned ${vectors.length} vectors for ${pending.length} chunks`);
    }

    let dimension = this.dim;
    for (const vector of vectors) {
      dimension ??= vector.length;
      if (vector.length === 0 || vector.length !== dimension) {
        throw this.markUnavailable(`Vector dimension ${vector.length} does not match index dimension ${dimension}`);
      }
    }

    const offset = this.chunks.length;
    const added = pending.map((p, i): KnowledgeChunk => Object.freeze({
      id: `${this.agentId}:${String(offset + i).padStart(ID_PAD, "0")}`,
      vector: Object.freeze(normalize(vectors[i] ?? [])),
      text: p.text,
      metadata: Object.freeze(p.metadata),
      agentId: this.agentId,
    }));

    this.dim = dimension;
    this.chunks = [...this.chunks, ...added];
    this.unavailableReason = undefined;
    this.queryCache.clear();
    return added.length;
  }

  /**
   * Embeds `query` once and returns the best matching chunks.
   * An empty index or `topK <= 0` yields `[]` without calling the embedder;
   * an index whose first load failed throws `IndexUnavailableError`.
   * A failed query embedding throws `TransientError`.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const topK = options.topK ?? this.config.topK;
    if (topK <= 0) return [];
    if (this.unavailableReason) throw new IndexUnavailableError(this.unavailableReason);
    if (this.chunks.length === 0) return [];

    const vector = await this.embedQuery(query, options.signal);
    return this.searchVector(vector, { topK, threshold: options.threshold });
  }

  /** Ranks chunks against an already-embedded query vector. */
  searchVector(queryVector: readonly number[], options: Omit<SearchOptions, "signal"> = {}): SearchHit[] {
    const topK = options.topK ?? this.config.topK;
    const threshold = options.threshold ?? this.config.similarityThreshold;
    if (topK <= 0 || this.chunks.length === 0) return [];
    if (queryVector.length !== this.dim) {
      throw new IndexUnavailableError(`Query dimension ${queryVector.length} does not match index dimension ${this.dim}`);
    }

    const unit = normalize(queryVector);
    return this.chunks
      .map((chunk) => ({ chunk, score: dot(unit, chunk.vector) }))
      .filter((hit) => hit.score >= threshold)
      .sort((a, b) => b.score - a.score || (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0))
      .slice(0, topK);
  }

  healthCheck(): HealthRecord {
    let status: HealthStatus = "healthy";
    if (this.unavailableReason) status = "unavailable";
    else if (this.consecutiveFailures >= this.config.degradedAfterFailures) status = "degraded";
    return {
      componentId: this.id,
      status,
      ...(this.lastSuccessAt !== undefined && { lastSuccessAt: this.lastSuccessAt }),
      consecutiveFailures: this.consecutiveFailures,
      ...(this.unavailableReason
        ? { detail: this.unavailableReason }
        : this.chunks.length === 0 && { detail: "index is empty" }),
    };
  }

  close(): void {
    this.queryCache.stopSweeper();
  }

  private async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const cached = this.queryCache.getValue(query);
    if (cached) return cached;

    let vectors: number[][];
    try {
      vectors = await this.embedder.embed([query], signal);
    } catch (error: unknown) {
      this.consecutiveFailures++;
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientError(`Query embedding failed: ${message}`, { component: "embedding", cause: error });
    }

    const [vector] = vectors;
    if (!vector) {
      this.consecutiveFailures++;
      throw new TransientError("Query embedding failed: embedder returned no vector", { component: "embedding" });
    }

    this.consecutiveFailures = 0;
    this.lastSuccessAt = this.now();
    this.queryCache.set(query, vector, this.config.cacheTtlSeconds * 1000);
    return vector;
  }

  private markUnavailable(reason: string, cause?: unknown): IndexUnavailableError {
    if (this.chunks.length === 0) this.unavailableReason = reason;
    console.warn(`[retrieval] ${this.id}: ${reason}`);
    this.events?.emit(BUS_EVENTS.RETRIEVAL_DEGRADED, { index: this.id, reason });
    return new IndexUnavailableError(reason, cause);
  }
}
