import type { Exchange } from "../memory/conversationMemory.js";
import type { RetrievedChunk } from "../retrieval/retriever.js";

export const NO_CONTEXT_MARKER = "[no relevant context found]";

export const INSTRUCTIONS = [
  "You are an assistant that answers questions about the user's local documents.",
  "Answer only using the provided document context. If the context is insufficient, say so."
].join("\n");

export function buildContext(chunks: RetrievedChunk[]): string {
  if (chunks.length === 0) return NO_CONTEXT_MARKER;
  return chunks
    .map(
      ({ chunk }, i) =>
        `[${i + 1}] SOURCE: ${chunk.documentPath} (chunk ${chunk.index})\n${chunk.text}`
    )
    .join("\n\n---\n\n");
}

export function buildHistory(window: Exchange[]): string {
  return window.map((e) => `Human: ${e.question}\nAssistant: ${e.answer}`).join("\n\n");
}

/**
 * Instructions, then document context, then the conversation window, with the
 * new question last.
 */
export function assemblePrompt(
  query: string,
  chunks: RetrievedChunk[],
  window: Exchange[]
): string {
  const sections = [INSTRUCTIONS, `Context from documents:\n${buildContext(chunks)}`];
  if (window.length > 0) {
    sections.push(`Previous conversation:\n${buildHistory(window)}`);
  }
  sections.push(`Current question: ${query}\n\nAnswer:`);
  return sections.join("\n\n");
}
