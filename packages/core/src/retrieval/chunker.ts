export interface ChunkOptions {
  /** Window size in token-equivalents (whitespace-separated words) */
  chunkSize: number;
  /** Words shared between consecutive windows; must be smaller than `chunkSize` */
  chunkOverlap: number;
}

/**
 * Splits text into overlapping word windows. Each window starts
 * `chunkSize - chunkOverlap` words after the previous one; the last window
 * ends at the final word.
 */
export function chunkText(text: string, { chunkSize, chunkOverlap }: ChunkOptions): string[] {
  if (chunkSize <= 0 || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap (${chunkOverlap}) must be in [0, chunkSize=${chunkSize})`);
  }

  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) return [];

  const step = chunkSize - chunkOverlap;
  const chunks: string[] = [];
  for (let start = 0; start < words.length; start += step) {
    const end = Math.min(start + chunkSize, words.length);
    chunks.push(words.slice(start, end).join(" "));
    if (end === words.length) break;
  }
  return chunks;
}
