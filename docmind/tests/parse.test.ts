import { describe, expect, it } from "vitest";

import { parseCli } from "../src/cli/parse.js";

const argv = (...args: string[]) => ["node", "docmind", ...args];

describe("parseCli", () => {
  it("splits the command, its arguments and options", () => {
    expect(parseCli(argv("ask", "--model", "mistral:7b", "what", "is", "this?"))).toEqual({
      command: "ask",
      args: ["what", "is", "this?"],
      options: { model: "mistral:7b" }
    });
  });

  it("takes a documents directory", () => {
    expect(parseCli(argv("index", "--dir", "notes")).options).toEqual({ documentsDir: "notes" });
  });

  it("accepts the maintenance commands", () => {
    expect(parseCli(argv("reset")).command).toBe("reset");
    expect(parseCli(argv("models")).command).toBe("models");
  });

  it("rejects unknown commands", () => {
    expect(() => parseCli(argv("serve"))).toThrow(/^Usage: docmind <index\|ask\|chat\|stats\|models\|reset>/);
    expect(() => parseCli(argv())).toThrow(/^Usage: docmind/);
  });

  it("requires a value after an option", () => {
    expect(() => parseCli(argv("chat", "--model"))).toThrow(/^Missing value for --model\nUsage:/);
  });
});
