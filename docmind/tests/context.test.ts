import { describe, expect, it } from "vitest";

import { assemblePrompt, INSTRUCTIONS, NO_CONTEXT_MARKER } from "../src/rag/context.js";
import type { Exchange } from "../src/memory/conversationMemory.js";
import type { RetrievedChunk } from "../src/retrieval/retriever.js";

const chunk: RetrievedChunk = {
  chunk: {
    id: "a.txt#0123456789abcdef:1",
    documentPath: "a.txt",
    index: 1,
    text: ". Grass is green.",
    start: 15,
    end: 32
  },
  score: 0.58
};

const history: Exchange[] = [
  { sequence: 1, question: "What color is the sky?", answer: "Blue.", at: 0 },
  { sequence: 2, question: "Are you sure?", answer: "Yes.", at: 1 }
];

describe("assemblePrompt", () => {
  it("orders instructions, documents, history and the new question", () => {
    const prompt = assemblePrompt("What color is grass?", [chunk], history);

    expect(prompt).toBe(
      [
        INSTRUCTIONS,
        "Context from documents:\n[1] SOURCE: a.txt (chunk 1)\n. Grass is green.",
        "Previous conversation:\nHuman: What color is the sky?\nAssistant: Blue.\n\nHuman: Are you sure?\nAssistant: Yes.",
        "Current question: What color is grass?\n\nAnswer:"
      ].join("\n\n")
    );
  });

  it("states the grounding rule", () => {
    expect(INSTRUCTIONS).toContain(
      "Answer only using the provided document context. If the context is insufficient, say so."
    );
  });

  it("puts the no-context marker in place of missing documents", () => {
    const prompt = assemblePrompt("anything", [], []);

    expect(prompt).toBe(
      `${INSTRUCTIONS}\n\nContext from documents:\n${NO_CONTEXT_MARKER}\n\nCurrent question: anything\n\nAnswer:`
    );
  });

  it("separates multiple sources", () => {
    const second: RetrievedChunk = {
      chunk: { ...chunk.chunk, id: "b.md#x:0", documentPath: "b.md", index: 0, text: "Sky." },
      score: 0.2
    };
    const prompt = assemblePrompt("q", [chunk, second], []);

    expect(prompt).toContain(
      "[1] SOURCE: a.txt (chunk 1)\n. Grass is green.\n\n---\n\n[2] SOURCE: b.md (chunk 0)\nSky."
    );
    expect(prompt.indexOf("Context from documents:")).toBeLessThan(prompt.indexOf("Current question:"));
  });
});
