import type { RagSession } from "../../rag/session.js";

/** Empties the vector index; the next `index` rebuilds it from the documents. */
export async function runResetCommand(
  session: RagSession,
  write: (text: string) => void
): Promise<void> {
  const removed = await session.resetIndex();
  write(`Index cleared (${removed.documentCount} documents, ${removed.chunkCount} chunks removed)\n`);
}
