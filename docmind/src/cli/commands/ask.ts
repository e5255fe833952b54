import type { RagSession } from "../../rag/session.js";

/** Indexes the documents directory first when nothing is indexed yet. */
export async function ensureIndexed(session: RagSession): Promise<void> {
  const stats = await session.getStats();
  if (stats.documentCount === 0) {
    await session.index();
  }
}

export async function runAskCommand(
  args: string[],
  session: RagSession,
  write: (text: string) => void
): Promise<void> {
  const question = args.join(" ").trim();
  if (!question) {
    throw new Error("Usage: docmind ask <question>");
  }

  await ensureIndexed(session);
  const answer = await session.query(question);
  write(`${answer}\n`);
}
