import { describe, expect, it } from "vitest";

import { createLogger } from "../src/logging/logger.js";

describe("createLogger", () => {
  it("prefixes each level", () => {
    const lines: string[] = [];
    const logger = createLogger({ write: (line) => lines.push(line) });

    logger.info("Scanning 2 documents");
    logger.warn("Skipping a.bin: binary content");
    logger.error("Failed to write a.txt: full");
    logger.debug("hidden");

    expect(lines).toEqual([
      "[docmind] Scanning 2 documents",
      "[docmind] warning: Skipping a.bin: binary content",
      "[docmind] error: Failed to write a.txt: full"
    ]);
  });

  it("prints debug lines when verbose", () => {
    const lines: string[] = [];
    createLogger({ verbose: true, write: (line) => lines.push(line) }).debug("Unchanged: a.txt");

    expect(lines).toEqual(["[docmind][verbose] Unchanged: a.txt"]);
  });
});
