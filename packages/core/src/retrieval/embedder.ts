import { embedMany, type EmbeddingModel } from "ai";

/** Converts text to fixed-length vectors, one per input, in input order. */
export interface Embedder {
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface AIEmbedderOptions {
  /** Retries performed by the SDK itself (default: 2) */
  maxRetries?: number;
}

/** Embedder backed by any embedding model the `ai` SDK supports. */
export function createAIEmbedder(model: EmbeddingModel<string>, options: AIEmbedderOptions = {}): Embedder {
  return {
    async embed(texts, signal) {
      if (texts.length === 0) return [];
      const { embeddings } = await embedMany({
        model,
        values: texts,
        maxRetries: options.maxRetries ?? 2,
        abortSignal: signal,
      });
      return embeddings;
    },
  };
}

/** Scales a vector to unit length. Zero vectors are returned unchanged. */
export function normalize(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const v of vector) sumSquares += v * v;
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) return [...vector];
  return vector.map((v) => v / norm);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}
