export { chunkFromDocument, chunkText, SlidingWindowTextSplitter } from "./chunking/chunker.js";
export type { ChunkOptions, TextChunk } from "./chunking/chunker.js";
export { loadSettings } from "./config/settings.js";
export type { Settings } from "./config/settings.js";
export {
  DocumentReadError,
  EmbeddingError,
  IndexWriteError,
  InferenceError,
  ModelUnavailableError
} from "./errors.js";
export { OllamaGenerator } from "./integrations/ollama/chat.js";
export { createEmbeddings } from "./integrations/ollama/embeddings.js";
export { OllamaModelCatalog } from "./integrations/ollama/models.js";
export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
export { ConversationMemory } from "./memory/conversationMemory.js";
export type { Exchange } from "./memory/conversationMemory.js";
export { assemblePrompt, NO_CONTEXT_MARKER } from "./rag/context.js";
export { hasModel } from "./rag/generator.js";
export type { Generator, ModelCatalog, ModelInfo } from "./rag/generator.js";
export { Indexer } from "./rag/ingest.js";
export type { IndexIssue, IndexStats } from "./rag/ingest.js";
export { openSession } from "./rag/openSession.js";
export { RagSession } from "./rag/session.js";
export type { CorpusStats, QueryResult } from "./rag/session.js";
export { FileVectorIndex } from "./retrieval/indexStore.js";
export { IndexManifest } from "./retrieval/manifest.js";
export { Retriever } from "./retrieval/retriever.js";
export type { Chunk, RetrievedChunk } from "./retrieval/retriever.js";
export type { IndexRecord, RecordMetadata, VectorIndex } from "./retrieval/types.js";
