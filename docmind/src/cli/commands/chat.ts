import readline from "node:readline";

import { errorMessage } from "../../errors.js";
import type { RagSession } from "../../rag/session.js";
import { ensureIndexed } from "./ask.js";
import { formatIndexStats } from "./index.js";
import { runModelsCommand } from "./models.js";
import { runResetCommand } from "./reset.js";
import { runStatsCommand } from "./stats.js";

export const CHAT_HELP =
  "Commands: quit, reindex, reset, clear, history [n], stats, models, model <name>. Anything else is a question.";

/** Handles one REPL line. Failures are printed, not thrown. */
export async function handleChatLine(
  line: string,
  session: RagSession,
  write: (text: string) => void
): Promise<"quit" | "continue"> {
  const input = line.trim();
  if (!input) return "continue";

  const [head = "", ...rest] = input.split(/\s+/);
  const command = head.toLowerCase();

  if (command === "quit" || command === "exit") return "quit";

  try {
    return await dispatchChatCommand(command, rest, input, session, write);
  } catch (err: unknown) {
    write(`Error: ${errorMessage(err)}\n`);
    return "continue";
  }
}

async function dispatchChatCommand(
  command: string,
  rest: string[],
  input: string,
  session: RagSession,
  write: (text: string) => void
): Promise<"continue"> {
  if (command === "reindex") {
    write("Reindexing documents...\n");
    write(formatIndexStats(await session.index()));
    return "continue";
  }

  if (command === "reset") {
    await runResetCommand(session, write);
    return "continue";
  }

  if (command === "models") {
    await runModelsCommand(session, write);
    return "continue";
  }

  if (command === "clear") {
    const removed = session.clearHistory();
    write(`Chat history cleared (${removed} entries removed)\n`);
    return "continue";
  }

  if (command === "history") {
    const n = rest[0] ? Number.parseInt(rest[0], 10) : undefined;
    const exchanges = session.getHistory(Number.isFinite(n) ? n : undefined);
    if (exchanges.length === 0) {
      write("No chat history.\n");
      return "continue";
    }
    for (const e of exchanges) {
      write(`#${e.sequence} You: ${e.question}\n#${e.sequence} Assistant: ${e.answer}\n`);
    }
    return "continue";
  }

  if (command === "stats") {
    await runStatsCommand(session, write);
    return "continue";
  }

  if (command === "model" && rest.length > 0) {
    session.setModel(rest.join(" "));
    write(`Model set to ${session.model}\n`);
    if (!(await session.isModelAvailable())) {
      write(`Model ${session.model} is not installed. Pull it with: ollama pull ${session.model}\n`);
    }
    return "continue";
  }

  const answer = await session.queryWithHistory(input);
  write(`Assistant: ${answer}\n`);
  return "continue";
}

export async function runChatCommand(
  session: RagSession,
  write: (text: string) => void
): Promise<void> {
  await ensureIndexed(session);
  write(`docmind chat (model: ${session.model})\n${CHAT_HELP}\n`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("You: ");
  rl.prompt();
  try {
    for await (const line of rl) {
      if ((await handleChatLine(line, session, write)) === "quit") break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
  write("Goodbye!\n");
}
