#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

function loadEnv(): void {
  const explicitPath = process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return;
  }

  const cwd = process.cwd();
  const candidates = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return;
    }
  }

  dotenv.config();
}

loadEnv();

import { loadSettings } from "../config/settings.js";
import { openSession } from "../rag/openSession.js";
import { runAskCommand } from "./commands/ask.js";
import { runChatCommand } from "./commands/chat.js";
import { runIndexCommand } from "./commands/index.js";
import { runModelsCommand } from "./commands/models.js";
import { runResetCommand } from "./commands/reset.js";
import { runStatsCommand } from "./commands/stats.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);
  const settings = loadSettings();
  if (parsed.options.model) settings.chatModel = parsed.options.model;
  if (parsed.options.documentsDir) settings.documentsDir = path.resolve(parsed.options.documentsDir);

  const session = await openSession(settings);
  const write = (text: string) => {
    process.stdout.write(text);
  };

  if (parsed.command === "index") {
    await runIndexCommand(parsed.args, session, write);
    return;
  }

  if (parsed.command === "ask") {
    await runAskCommand(parsed.args, session, write);
    return;
  }

  if (parsed.command === "chat") {
    await runChatCommand(session, write);
    return;
  }

  if (parsed.command === "models") {
    await runModelsCommand(session, write);
    return;
  }

  if (parsed.command === "reset") {
    await runResetCommand(session, write);
    return;
  }

  await runStatsCommand(session, write);
}

try {
  await main(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
