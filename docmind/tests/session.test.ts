import fs from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  loadSettings,
  ModelUnavailableError,
  NO_CONTEXT_MARKER,
  openSession,
  type Settings
} from "../src/index.js";
import { MANIFEST_FILE, RECORDS_FILE } from "../src/rag/openSession.js";
import {
  makeTempDir,
  recordingLogger,
  sleep,
  StubGenerator,
  StubModelCatalog,
  VocabularyEmbeddings,
  writeDoc
} from "./helpers/fakes.js";

const VOCAB = ["sky", "blue", "grass", "green", "color", "what", "is"];

async function settingsFor(prefix: string, env: Record<string, string> = {}): Promise<Settings> {
  const root = await makeTempDir(prefix);
  return loadSettings({
    DOCMIND_DOCUMENTS_DIR: path.join(root, "documents"),
    DOCMIND_INDEX_DIR: path.join(root, "index"),
    DOCMIND_CHUNK_SIZE: "20",
    DOCMIND_CHUNK_OVERLAP: "5",
    DOCMIND_TOP_K: "1",
    ...env
  });
}

async function sessionWith(
  settings: Settings,
  generator = new StubGenerator(),
  models = new StubModelCatalog()
) {
  const { logger, lines } = recordingLogger();
  const session = await openSession(settings, {
    embeddings: new VocabularyEmbeddings(VOCAB),
    generator,
    models,
    logger
  });
  return { session, generator, lines };
}

describe("RagSession", () => {
  it("answers from the most similar chunk", async () => {
    const settings = await settingsFor("grass");
    await writeDoc(settings.documentsDir, "a.txt", "The sky is blue. Grass is green.");
    const { session, generator } = await sessionWith(settings, new StubGenerator("Green."));

    const stats = await session.index();
    const result = await session.ask("What color is grass?", { withHistory: false });

    expect(stats.chunksAdded).toBe(2);
    expect(result.answer).toBe("Green.");
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0]?.chunk.text).toBe(". Grass is green.");
    expect(generator.calls[0]?.prompt).toContain(
      "Context from documents:\n[1] SOURCE: a.txt (chunk 1)\n. Grass is green."
    );
    expect(generator.calls[0]?.model).toBe("llama3.1:8b");
  });

  it("returns sources in descending similarity, at most top-k", async () => {
    const settings = await settingsFor("topk", { DOCMIND_TOP_K: "5" });
    await writeDoc(settings.documentsDir, "a.txt", "The sky is blue. Grass is green.");
    const { session } = await sessionWith(settings);
    await session.index();

    const result = await session.ask("grass green", { withHistory: false });

    expect(result.sources.map((s) => s.chunk.index)).toEqual([1, 0]);
    expect(result.sources[0]?.score).toBeGreaterThan(result.sources[1]?.score ?? 1);
  });

  it("still answers when nothing is indexed", async () => {
    const settings = await settingsFor("empty");
    const { session, generator } = await sessionWith(settings);

    await session.index();
    const answer = await session.query("anything?");

    expect(answer).toBe("stub answer");
    expect(generator.calls[0]?.prompt).toContain(`Context from documents:\n${NO_CONTEXT_MARKER}`);
  });

  it("query() neither reads nor writes the conversation", async () => {
    const settings = await settingsFor("stateless");
    const { session, generator } = await sessionWith(settings);

    await session.queryWithHistory("first?");
    await session.query("second?");

    expect(session.getHistory()).toHaveLength(1);
    expect(generator.calls[1]?.prompt).not.toContain("Previous conversation:");
  });

  it("feeds earlier exchanges into the next prompt", async () => {
    const settings = await settingsFor("history");
    const generator = new StubGenerator(async (_prompt, call) => `answer ${call}`);
    const { session } = await sessionWith(settings, generator);

    await session.queryWithHistory("What is blue?");
    await session.queryWithHistory("And green?");

    expect(generator.calls[1]?.prompt).toContain(
      "Previous conversation:\nHuman: What is blue?\nAssistant: answer 1\n\nCurrent question: And green?"
    );
    expect(session.getHistory().map((e) => [e.sequence, e.answer])).toEqual([
      [1, "answer 1"],
      [2, "answer 2"]
    ]);
    expect(session.getHistory(1).map((e) => e.question)).toEqual(["And green?"]);
  });

  it("leaves the conversation untouched when the model is unavailable", async () => {
    const settings = await settingsFor("unavailable");
    const generator = new StubGenerator(async (_prompt, call) => {
      if (call === 1) throw new ModelUnavailableError("llama3.1:8b", "model not found");
      return "recovered";
    });
    const { session } = await sessionWith(settings, generator);

    await expect(session.queryWithHistory("hello?")).rejects.toBeInstanceOf(ModelUnavailableError);
    expect(session.getHistory()).toEqual([]);

    await expect(session.queryWithHistory("hello again?")).resolves.toBe("recovered");
    expect(session.getHistory().map((e) => e.question)).toEqual(["hello again?"]);
  });

  it("runs concurrent queries one at a time in call order", async () => {
    const settings = await settingsFor("serial");
    const generator = new StubGenerator(async (_prompt, call) => {
      if (call === 1) {
        await sleep(20);
        return "first";
      }
      return "second";
    });
    const { session } = await sessionWith(settings, generator);

    const answers = await Promise.all([
      session.queryWithHistory("one?"),
      session.queryWithHistory("two?")
    ]);

    expect(answers).toEqual(["first", "second"]);
    expect(session.getHistory().map((e) => e.answer)).toEqual(["first", "second"]);
    expect(generator.calls[1]?.prompt).toContain("Human: one?\nAssistant: first");
  });

  it("clears history and restarts numbering", async () => {
    const settings = await settingsFor("clear");
    const { session } = await sessionWith(settings);
    await session.queryWithHistory("a?");
    await session.queryWithHistory("b?");

    expect(session.clearHistory()).toBe(2);
    await session.queryWithHistory("c?");

    expect(session.getHistory().map((e) => e.sequence)).toEqual([1]);
  });

  it("sends queries to the selected model", async () => {
    const settings = await settingsFor("model");
    const { session, generator } = await sessionWith(settings);

    session.setModel("mistral:7b");
    await session.query("hi?");

    expect(session.model).toBe("mistral:7b");
    expect(generator.calls[0]?.model).toBe("mistral:7b");
  });

  it("shares one indexing pass between concurrent callers", async () => {
    const settings = await settingsFor("shared");
    await writeDoc(settings.documentsDir, "a.txt", "The sky is blue.");
    const { session } = await sessionWith(settings);

    const first = session.index();
    const second = session.index();

    expect(second).toBe(first);
    expect((await first).chunksAdded).toBe(1);
  });

  it("reports corpus stats and reloads them from disk", async () => {
    const settings = await settingsFor("stats");
    await writeDoc(settings.documentsDir, "a.txt", "The sky is blue. Grass is green.");
    await writeDoc(settings.documentsDir, "b.md", "Sky.");
    const { session } = await sessionWith(settings);
    await session.index();

    expect(await session.getStats()).toEqual({ documentCount: 2, chunkCount: 3, filesFound: 2 });

    const { session: reopened } = await sessionWith(settings);
    expect(await reopened.getStats()).toEqual({ documentCount: 2, chunkCount: 3, filesFound: 2 });
    const again = await reopened.index();
    expect(again.documentsSkipped).toBe(2);
    expect(again.chunksAdded).toBe(0);
  });

  it("starts from an empty index when the stored one is corrupt", async () => {
    const settings = await settingsFor("corrupt");
    await fs.mkdir(settings.indexDir, { recursive: true });
    await fs.writeFile(path.join(settings.indexDir, RECORDS_FILE), "{not json", "utf-8");
    await fs.writeFile(path.join(settings.indexDir, MANIFEST_FILE), "{}", "utf-8");

    const { session, lines } = await sessionWith(settings);

    expect(await session.getStats()).toEqual({ documentCount: 0, chunkCount: 0, filesFound: 0 });
    const warnings = lines.filter((l) => l.startsWith("[docmind] warning: "));
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^\[docmind\] warning: .*\nStarting from an empty index\.$/s);
  });

  it("counts supported files that are not indexed yet", async () => {
    const settings = await settingsFor("files-found");
    await writeDoc(settings.documentsDir, "a.txt", "The sky is blue.");
    await writeDoc(settings.documentsDir, "photo.png", "not text");
    const { session } = await sessionWith(settings);

    expect(await session.getStats()).toEqual({ documentCount: 0, chunkCount: 0, filesFound: 1 });
  });

  it("resets the index on disk and rebuilds on the next pass", async () => {
    const settings = await settingsFor("reset");
    await writeDoc(settings.documentsDir, "a.txt", "The sky is blue. Grass is green.");
    const { session, generator } = await sessionWith(settings);
    await session.index();

    expect(await session.resetIndex()).toEqual({ documentCount: 1, chunkCount: 2 });
    expect(await session.getStats()).toEqual({ documentCount: 0, chunkCount: 0, filesFound: 1 });
    await session.query("What color is grass?");
    expect(generator.calls[0]?.prompt).toContain(NO_CONTEXT_MARKER);

    const { session: reopened } = await sessionWith(settings);
    expect(await reopened.getStats()).toEqual({ documentCount: 0, chunkCount: 0, filesFound: 1 });
    expect((await reopened.index()).chunksAdded).toBe(2);
  });

  it("overwrites an unreadable store on reset", async () => {
    const settings = await settingsFor("reset-corrupt");
    await fs.mkdir(settings.indexDir, { recursive: true });
    await fs.writeFile(path.join(settings.indexDir, RECORDS_FILE), "{not json", "utf-8");
    const { session } = await sessionWith(settings);

    await session.resetIndex();

    const { lines } = await sessionWith(settings);
    expect(lines.filter((l) => l.startsWith("[docmind] warning: "))).toEqual([]);
  });

  it("checks whether a model is installed", async () => {
    const settings = await settingsFor("models");
    const { session } = await sessionWith(
      settings,
      new StubGenerator(),
      new StubModelCatalog(["llama3.1:8b", "all-minilm:latest"])
    );

    expect(await session.isModelAvailable()).toBe(true);
    expect(await session.isModelAvailable("all-minilm")).toBe(true);
    expect(await session.isModelAvailable("mistral:7b")).toBe(false);
  });

  it("reports models as unavailable when the backend cannot be reached", async () => {
    const settings = await settingsFor("models-down");
    const { session } = await sessionWith(
      settings,
      new StubGenerator(),
      new StubModelCatalog(new Error("connect ECONNREFUSED 127.0.0.1:11434"))
    );

    expect(await session.isModelAvailable()).toBe(false);
    await expect(session.listModels()).rejects.toThrow("connect ECONNREFUSED 127.0.0.1:11434");
  });
});
