import { ConversationMemory, DEFAULT_WINDOW_SIZE, type Exchange } from "../memory/conversationMemory.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { IndexManifest } from "../retrieval/manifest.js";
import { DEFAULT_TOP_K, type RetrievedChunk, type Retriever } from "../retrieval/retriever.js";
import type { VectorIndex } from "../retrieval/types.js";
import { assemblePrompt } from "./context.js";
import { hasModel, type Generator, type ModelCatalog, type ModelInfo } from "./generator.js";
import type { IndexStats, Indexer } from "./ingest.js";

export type QueryResult = {
  answer: string;
  sources: RetrievedChunk[];
  prompt: string;
};

export type CorpusStats = {
  documentCount: number;
  chunkCount: number;
  /** Supported files currently in the documents directory. */
  filesFound: number;
};

export type RagSessionOptions = {
  indexer: Indexer;
  retriever: Retriever;
  generator: Generator;
  models: ModelCatalog;
  index: VectorIndex;
  manifest: IndexManifest;
  memory: ConversationMemory;
  documentsDir: string;
  model: string;
  topK?: number;
  windowSize?: number;
  logger?: Logger;
};

/**
 * One conversation over the indexed corpus. Queries run one at a time in
 * call order; a failed query leaves the memory untouched.
 */
export class RagSession {
  private readonly indexer: Indexer;
  private readonly retriever: Retriever;
  private readonly generator: Generator;
  private readonly models: ModelCatalog;
  private readonly store: VectorIndex;
  private readonly manifest: IndexManifest;
  private readonly memory: ConversationMemory;
  private readonly documentsDir: string;
  private readonly topK: number;
  private readonly windowSize: number;
  private readonly logger: Logger;
  private currentModel: string;
  private queryTail: Promise<void> = Promise.resolve();
  private indexing: Promise<IndexStats> | null = null;

  constructor(opts: RagSessionOptions) {
    this.indexer = opts.indexer;
    this.retriever = opts.retriever;
    this.generator = opts.generator;
    this.models = opts.models;
    this.store = opts.index;
    this.manifest = opts.manifest;
    this.memory = opts.memory;
    this.documentsDir = opts.documentsDir;
    this.currentModel = opts.model;
    this.topK = opts.topK ?? DEFAULT_TOP_K;
    this.windowSize = opts.windowSize ?? DEFAULT_WINDOW_SIZE;
    this.logger = opts.logger ?? silentLogger;
  }

  get model(): string {
    return this.currentModel;
  }

  setModel(model: string): void {
    this.currentModel = model;
  }

  listModels(): Promise<ModelInfo[]> {
    return this.models.listModels();
  }

  /** False when the model is not installed or the backend cannot be reached. */
  async isModelAvailable(model: string = this.currentModel): Promise<boolean> {
    try {
      return hasModel(await this.models.listModels(), model);
    } catch (err: unknown) {
      this.logger.debug(errorMessage(err));
      return false;
    }
  }

  /** Concurrent calls share the pass already running. */
  index(documentsDir: string = this.documentsDir): Promise<IndexStats> {
    if (!this.indexing) {
      this.indexing = this.indexer.index(documentsDir).finally(() => {
        this.indexing = null;
      });
    }
    return this.indexing;
  }

  async query(text: string): Promise<string> {
    return (await this.ask(text, { withHistory: false })).answer;
  }

  async queryWithHistory(text: string): Promise<string> {
    return (await this.ask(text, { withHistory: true })).answer;
  }

  ask(text: string, options: { withHistory: boolean }): Promise<QueryResult> {
    const run = this.queryTail.then(() => this.runQuery(text, options.withHistory));
    this.queryTail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Drops every indexed record and manifest entry and persists the empty
   * index. Waits for a running indexing pass first. Returns what was removed.
   */
  async resetIndex(): Promise<{ documentCount: number; chunkCount: number }> {
    if (this.indexing) {
      await this.indexing.catch(() => undefined);
    }
    const removed = { documentCount: this.manifest.size, chunkCount: await this.store.count() };
    await this.store.clear();
    this.manifest.clear();
    await this.store.flush();
    await this.manifest.save();
    this.logger.info(`Index cleared (${removed.documentCount} documents, ${removed.chunkCount} chunks)`);
    return removed;
  }

  clearHistory(): number {
    return this.memory.clear();
  }

  /** Most recent `n` exchanges oldest-first, or all of them. */
  getHistory(n?: number): Exchange[] {
    return n === undefined ? this.memory.all() : this.memory.recentWindow(n);
  }

  async getStats(): Promise<CorpusStats> {
    const chunkCount = await this.store.count((m) =>
      this.manifest.isCommitted(m.documentPath, m.contentHash)
    );
    const files = await this.indexer.listDocuments(this.documentsDir);
    return { documentCount: this.manifest.size, chunkCount, filesFound: files.length };
  }

  private async runQuery(text: string, withHistory: boolean): Promise<QueryResult> {
    const sources = await this.retriever.retrieve(text, this.topK);
    if (sources.length === 0) {
      this.logger.debug("No relevant context found for query");
    }

    const window = withHistory ? this.memory.recentWindow(this.windowSize) : [];
    const prompt = assemblePrompt(text, sources, window);
    const answer = await this.generator.generate(prompt, this.currentModel);

    if (withHistory) this.memory.append(text, answer);
    return { answer, sources, prompt };
  }
}
