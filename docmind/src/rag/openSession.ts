import path from "node:path";

import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Settings } from "../config/settings.js";
import { errorMessage } from "../errors.js";
import { OllamaGenerator } from "../integrations/ollama/chat.js";
import { createEmbeddings } from "../integrations/ollama/embeddings.js";
import { OllamaModelCatalog } from "../integrations/ollama/models.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { ConversationMemory } from "../memory/conversationMemory.js";
import { FileVectorIndex } from "../retrieval/indexStore.js";
import { IndexManifest } from "../retrieval/manifest.js";
import { Retriever } from "../retrieval/retriever.js";
import type { Generator, ModelCatalog } from "./generator.js";
import { Indexer } from "./ingest.js";
import { RagSession } from "./session.js";

export const RECORDS_FILE = "records.json";
export const MANIFEST_FILE = "manifest.json";

/**
 * Loads the persisted index. A corrupt store is reported and replaced by an
 * empty one, which the next indexing pass rebuilds.
 */
async function openStorage(
  settings: Settings,
  logger: Logger
): Promise<{ index: FileVectorIndex; manifest: IndexManifest }> {
  const recordsPath = path.join(settings.indexDir, RECORDS_FILE);
  const manifestPath = path.join(settings.indexDir, MANIFEST_FILE);
  try {
    const index = await FileVectorIndex.open({
      filePath: recordsPath,
      maxBatchSize: settings.indexBatchSize
    });
    const manifest = await IndexManifest.open(manifestPath);
    return { index, manifest };
  } catch (err: unknown) {
    logger.warn(`${errorMessage(err)}\nStarting from an empty index.`);
    return {
      index: new FileVectorIndex({ filePath: recordsPath, maxBatchSize: settings.indexBatchSize }),
      manifest: new IndexManifest(manifestPath)
    };
  }
}

export async function openSession(
  settings: Settings,
  overrides: {
    embeddings?: EmbeddingsInterface;
    generator?: Generator;
    models?: ModelCatalog;
    memory?: ConversationMemory;
    logger?: Logger;
  } = {}
): Promise<RagSession> {
  const logger = overrides.logger ?? createLogger({ verbose: settings.verbose });
  const embeddings = overrides.embeddings ?? createEmbeddings(settings);
  const { index, manifest } = await openStorage(settings, logger);

  const indexer = new Indexer({
    embeddings,
    index,
    manifest,
    embeddingModel: settings.embeddingModel,
    chunkSize: settings.chunkSize,
    chunkOverlap: settings.chunkOverlap,
    extensions: settings.extensions,
    embeddingBatchSize: settings.embeddingBatchSize,
    logger
  });

  return new RagSession({
    indexer,
    retriever: new Retriever({ embeddings, index, manifest }),
    generator: overrides.generator ?? new OllamaGenerator(settings),
    models: overrides.models ?? new OllamaModelCatalog(settings),
    index,
    manifest,
    memory: overrides.memory ?? new ConversationMemory({ maxExchanges: settings.memoryMaxExchanges }),
    documentsDir: settings.documentsDir,
    model: settings.chatModel,
    topK: settings.topK,
    windowSize: settings.memoryWindow,
    logger
  });
}
