export interface UsageInfo {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  durationMs: number;
}

interface UsageLike {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * Extract usage and timing from an AI SDK result.
 * - Prefers `totalUsage` (aggregated across steps) over `usage` (last step only)
 * - Requires `startTime` from `performance.now()` to compute duration
 */
export function extractUsage(
  result: { totalUsage?: UsageLike; usage?: UsageLike },
  startTime: number,
): UsageInfo {
  const u = result.totalUsage ?? result.usage;
  const inputTokens = u?.inputTokens ?? 0;
  const outputTokens = u?.outputTokens ?? 0;
  const totalTokens = u?.totalTokens ?? (inputTokens + outputTokens);
  const durationMs = Math.round(performance.now() - startTime);

  return { inputTokens, outputTokens, totalTokens, durationMs };
}
