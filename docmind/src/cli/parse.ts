export type Command = "index" | "ask" | "chat" | "stats" | "models" | "reset";

export type CliOptions = {
  model?: string;
  documentsDir?: string;
};

const COMMANDS: readonly Command[] = ["index", "ask", "chat", "stats", "models", "reset"];
const USAGE = "Usage: docmind <index|ask|chat|stats|models|reset> [--model <name>] [--dir <documentsDir>] [...]";

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[]; options: CliOptions } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(USAGE);
  }

  const options: CliOptions = {};
  const args: string[] = [];
  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i] ?? "";
    if (token === "--model" || token === "--dir") {
      const value = rest[i + 1];
      if (!value) throw new Error(`Missing value for ${token}\n${USAGE}`);
      if (token === "--model") options.model = value;
      else options.documentsDir = value;
      i += 1;
      continue;
    }
    args.push(token);
  }
  return { command, args, options };
}
