import type { RagSession } from "../../rag/session.js";

export async function runStatsCommand(
  session: RagSession,
  write: (text: string) => void
): Promise<void> {
  const stats = await session.getStats();
  const available = await session.isModelAvailable();
  write(
    `${stats.documentCount} documents, ${stats.chunkCount} chunks indexed, ${stats.filesFound} supported files found\n` +
      `model: ${session.model} (${available ? "available" : "not available"})\n`
  );
}
