export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
};

/**
 * Line logger writing `[docmind] ...` to stderr so stdout stays free for
 * answers. `debug` lines only appear when verbose.
 */
export function createLogger(options: {
  verbose?: boolean;
  write?: (line: string) => void;
} = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const verbose = options.verbose ?? false;

  return {
    info: (message) => write(`[docmind] ${message}`),
    warn: (message) => write(`[docmind] warning: ${message}`),
    error: (message) => write(`[docmind] error: ${message}`),
    debug: (message) => {
      if (verbose) write(`[docmind][verbose] ${message}`);
    }
  };
}

export const silentLogger: Logger = createLogger({ write: () => {} });
