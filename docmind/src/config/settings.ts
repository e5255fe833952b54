import path from "node:path";

import { DEFAULT_EXTENSIONS } from "../loaders/sourceDirectory.js";
import { DEFAULT_MAX_BATCH_SIZE } from "../retrieval/indexStore.js";

export type Settings = {
  ollamaBaseUrl: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  documentsDir: string;
  indexDir: string;
  extensions: string[];
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  memoryMaxExchanges: number;
  memoryWindow: number;
  indexBatchSize: number;
  embeddingBatchSize: number;
  verbose: boolean;
};

type Env = Record<string, string | undefined>;

function intFromEnv(raw: string | undefined, fallback: number, min: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n >= min ? n : fallback;
}

function flagFromEnv(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

export function loadSettings(env: Env = process.env): Settings {
  const chunkSize = intFromEnv(env.DOCMIND_CHUNK_SIZE, 1000, 1);
  const chunkOverlap = intFromEnv(env.DOCMIND_CHUNK_OVERLAP, 200, 0);
  if (chunkOverlap >= chunkSize) {
    throw new Error(
      `DOCMIND_CHUNK_OVERLAP (${chunkOverlap}) must be smaller than DOCMIND_CHUNK_SIZE (${chunkSize})`
    );
  }

  const temperatureRaw = Number.parseFloat(env.DOCMIND_TEMPERATURE ?? "");
  const extensions = env.DOCMIND_EXTENSIONS?.split(",")
    .map((s) => s.trim().replace(/^\./, "").toLowerCase())
    .filter(Boolean);

  return {
    ollamaBaseUrl: env.OLLAMA_BASE_URL?.trim() || "http://127.0.0.1:11434",
    chatModel: env.DOCMIND_CHAT_MODEL?.trim() || "llama3.1:8b",
    embeddingModel: env.DOCMIND_EMBEDDING_MODEL?.trim() || "all-minilm",
    temperature: Number.isFinite(temperatureRaw) ? temperatureRaw : 0.7,
    documentsDir: path.resolve(env.DOCMIND_DOCUMENTS_DIR?.trim() || "documents"),
    indexDir: path.resolve(env.DOCMIND_INDEX_DIR?.trim() || ".docmind/index"),
    extensions: extensions && extensions.length > 0 ? extensions : [...DEFAULT_EXTENSIONS],
    chunkSize,
    chunkOverlap,
    topK: intFromEnv(env.DOCMIND_TOP_K, 5, 1),
    memoryMaxExchanges: intFromEnv(env.DOCMIND_MEMORY_MAX_EXCHANGES, 50, 0),
    memoryWindow: intFromEnv(env.DOCMIND_MEMORY_WINDOW, 5, 0),
    indexBatchSize: intFromEnv(env.DOCMIND_INDEX_BATCH_SIZE, DEFAULT_MAX_BATCH_SIZE, 1),
    embeddingBatchSize: intFromEnv(env.DOCMIND_EMBEDDING_BATCH_SIZE, 32, 1),
    verbose: flagFromEnv(env.DOCMIND_VERBOSE)
  };
}
