import type { IndexStats } from "../../rag/ingest.js";
import type { RagSession } from "../../rag/session.js";

export function formatIndexStats(stats: IndexStats): string {
  const lines = [
    `documents: ${stats.documentsScanned} scanned, ${stats.documentsIndexed} indexed, ${stats.documentsSkipped} unchanged, ${stats.documentsRemoved} removed`,
    `chunks: ${stats.chunksAdded} added, ${stats.chunksSkipped} unchanged, ${stats.chunksRemoved} removed, ${stats.chunksFailed} failed`
  ];
  for (const w of stats.warnings) lines.push(`warning: ${w.message}`);
  for (const e of stats.errors) lines.push(`error: ${e.message}`);
  return `${lines.join("\n")}\n`;
}

export async function runIndexCommand(
  args: string[],
  session: RagSession,
  write: (text: string) => void
): Promise<void> {
  const stats = await session.index(args[0]);
  write(formatIndexStats(stats));
}
