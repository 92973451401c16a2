import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { AgentTier } from "../types.js";
import type { KnowledgeDocument } from "./retrieval-index.js";

function matchesAgent(fileName: string, agentId: string): boolean {
  const stem = fileName.replace(/\.md$/i, "").toLowerCase().replace(/-/g, "_");
  const id = agentId.toLowerCase().replace(/-/g, "_");
  return stem.includes(id) || stem.replace(/_/g, "") === id.replace(/_/g, "");
}

/**
 * Reads the Markdown knowledge files for one agent from `<dir>/<tier>/`.
 * A missing directory yields no documents.
 */
export async function loadKnowledgeDocuments(dir: string, tier: AgentTier, agentId: string): Promise<KnowledgeDocument[]> {
  const tierDir = join(dir, tier);

  let entries: string[];
  try {
    entries = await readdir(tierDir);
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }

  const files = entries
    .filter((name) => name.toLowerCase().endsWith(".md") && matchesAgent(name, agentId))
    .sort();

  return Promise.all(
    files.map(async (name) => ({
      text: await readFile(join(tierDir, name), "utf-8"),
      metadata: { source: `${tier}/${name}`, tier, agent: agentId },
    })),
  );
}
