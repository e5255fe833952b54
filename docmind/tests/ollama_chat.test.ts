import { AIMessageChunk } from "@langchain/core/messages";
import { ChatOllama } from "@langchain/ollama";
import { afterEach, describe, expect, it, vi } from "vitest";

import { loadSettings } from "../src/config/settings.js";
import { InferenceError, ModelUnavailableError } from "../src/errors.js";
import { isModelUnavailable, OllamaGenerator } from "../src/integrations/ollama/chat.js";

describe("isModelUnavailable", () => {
  it("recognizes a missing model", () => {
    expect(isModelUnavailable(Object.assign(new Error("model not found"), { status_code: 404 }))).toBe(true);
    expect(isModelUnavailable(new Error('model "tiny" not found, try pulling it first'))).toBe(true);
  });

  it("recognizes an unreachable server", () => {
    expect(isModelUnavailable(new TypeError("request failed", { cause: { code: "ECONNREFUSED" } }))).toBe(true);
    expect(isModelUnavailable(new TypeError("fetch failed"))).toBe(true);
  });

  it("leaves other failures alone", () => {
    expect(isModelUnavailable(new Error("context window exceeded"))).toBe(false);
    expect(isModelUnavailable(Object.assign(new Error("bad request"), { status_code: 400 }))).toBe(false);
    expect(isModelUnavailable("weird")).toBe(false);
  });
});

describe("OllamaGenerator", () => {
  const settings = loadSettings({});

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the model's text", async () => {
    const invoke = vi.spyOn(ChatOllama.prototype, "invoke").mockResolvedValue(new AIMessageChunk("Blue."));

    await expect(new OllamaGenerator(settings).generate("prompt", "llama3.1:8b")).resolves.toBe("Blue.");
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it("maps a missing model to ModelUnavailableError", async () => {
    vi.spyOn(ChatOllama.prototype, "invoke").mockRejectedValue(
      Object.assign(new Error('model "tiny" not found, try pulling it first'), { status_code: 404 })
    );

    const attempt = new OllamaGenerator(settings).generate("prompt", "tiny");

    await expect(attempt).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(attempt).rejects.toThrow(/Pull it with: ollama pull tiny$/);
  });

  it("maps other failures to InferenceError", async () => {
    vi.spyOn(ChatOllama.prototype, "invoke").mockRejectedValue(new Error("context window exceeded"));

    const attempt = new OllamaGenerator(settings).generate("prompt", "llama3.1:8b");

    await expect(attempt).rejects.toBeInstanceOf(InferenceError);
    await expect(attempt).rejects.toThrow('Generation with "llama3.1:8b" failed: context window exceeded');
  });
});
