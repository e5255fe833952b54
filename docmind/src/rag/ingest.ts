import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import {
  chunkFromDocument,
  SlidingWindowTextSplitter,
  type TextChunk
} from "../chunking/chunker.js";
import { DocumentReadError, EmbeddingError, IndexWriteError, errorMessage } from "../errors.js";
import {
  listSourceFiles,
  loadSourceDocument,
  type SourceDocument,
  type SourceFile
} from "../loaders/sourceDirectory.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { IndexManifest } from "../retrieval/manifest.js";
import type { IndexRecord, VectorIndex } from "../retrieval/types.js";

export type IndexIssue = {
  path: string;
  kind: "DocumentReadError" | "EmbeddingError" | "IndexWriteError";
  message: string;
  chunkIndex?: number;
};

export type IndexStats = {
  documentsScanned: number;
  documentsIndexed: number;
  documentsSkipped: number;
  documentsRemoved: number;
  chunksAdded: number;
  chunksSkipped: number;
  chunksRemoved: number;
  chunksFailed: number;
  warnings: IndexIssue[];
  errors: IndexIssue[];
};

export type IndexerOptions = {
  embeddings: EmbeddingsInterface;
  index: VectorIndex;
  manifest: IndexManifest;
  embeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
  extensions?: string[];
  excludedFolders?: string[];
  embeddingBatchSize?: number;
  logger?: Logger;
};

export const DEFAULT_EMBEDDING_BATCH_SIZE = 32;

function emptyStats(): IndexStats {
  return {
    documentsScanned: 0,
    documentsIndexed: 0,
    documentsSkipped: 0,
    documentsRemoved: 0,
    chunksAdded: 0,
    chunksSkipped: 0,
    chunksRemoved: 0,
    chunksFailed: 0,
    warnings: [],
    errors: []
  };
}

export function recordId(documentPath: string, contentHash: string, chunkIndex: number): string {
  return `${documentPath}#${contentHash.slice(0, 16)}:${chunkIndex}`;
}

function batches<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Builds and refreshes the vector index from a documents directory.
 *
 * Unchanged documents (same content hash as the committed manifest entry)
 * are skipped without embedding. A changed document is written under new
 * record ids, then committed in the manifest, then its stale records are
 * deleted; retrieval filters on the manifest, so it never sees a document
 * half-replaced.
 */
export class Indexer {
  private readonly embeddings: EmbeddingsInterface;
  private readonly store: VectorIndex;
  private readonly manifest: IndexManifest;
  private readonly splitter: SlidingWindowTextSplitter;
  private readonly embeddingModel: string;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly extensions?: string[];
  private readonly excludedFolders?: string[];
  private readonly embeddingBatchSize: number;
  private readonly logger: Logger;

  constructor(opts: IndexerOptions) {
    this.embeddings = opts.embeddings;
    this.store = opts.index;
    this.manifest = opts.manifest;
    this.embeddingModel = opts.embeddingModel;
    this.chunkSize = opts.chunkSize;
    this.chunkOverlap = opts.chunkOverlap;
    this.splitter = new SlidingWindowTextSplitter({
      chunkSize: opts.chunkSize,
      chunkOverlap: opts.chunkOverlap
    });
    this.extensions = opts.extensions;
    this.excludedFolders = opts.excludedFolders;
    this.embeddingBatchSize = Math.max(1, opts.embeddingBatchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE);
    this.logger = opts.logger ?? silentLogger;
  }

  /** Supported files under `documentsDir`, whether indexed or not. */
  listDocuments(documentsDir: string): Promise<SourceFile[]> {
    return listSourceFiles(documentsDir, {
      extensions: this.extensions,
      excludedFolders: this.excludedFolders
    });
  }

  async index(documentsDir: string): Promise<IndexStats> {
    const stats = emptyStats();
    await this.ensureCompatible();

    const files = await this.listDocuments(documentsDir);
    stats.documentsScanned = files.length;
    this.logger.info(`Scanning ${files.length} documents in ${documentsDir}`);

    const seen = new Set<string>();
    for (const file of files) {
      seen.add(file.path);

      let doc: SourceDocument;
      try {
        doc = await loadSourceDocument(file);
      } catch (err: unknown) {
        if (!(err instanceof DocumentReadError)) throw err;
        this.logger.warn(err.message);
        stats.warnings.push({ path: file.path, kind: "DocumentReadError", message: err.message });
        continue;
      }

      const committed = this.manifest.get(doc.path);
      if (committed && committed.contentHash === doc.contentHash && committed.failedChunks === 0) {
        stats.documentsSkipped += 1;
        stats.chunksSkipped += committed.chunkCount;
        this.logger.debug(`Unchanged: ${doc.path}`);
        continue;
      }

      await this.indexDocument(doc, stats);
    }

    for (const docPath of this.manifest.paths()) {
      if (seen.has(docPath)) continue;
      this.manifest.delete(docPath);
      const stale = await this.store.listIds((m) => m.documentPath === docPath);
      await this.deleteRecords(stale);
      stats.documentsRemoved += 1;
      stats.chunksRemoved += stale.length;
      this.logger.info(`Removed ${docPath} (${stale.length} chunks)`);
    }

    // Records left behind by an interrupted run or a lost manifest.
    const orphans = await this.store.listIds((m) => this.manifest.get(m.documentPath) === undefined);
    if (orphans.length > 0) {
      await this.deleteRecords(orphans);
      stats.chunksRemoved += orphans.length;
      this.logger.debug(`Deleted ${orphans.length} orphaned records`);
    }

    await this.store.flush();
    await this.manifest.save();

    this.logger.info(
      `Indexing complete: ${stats.chunksAdded} chunks added, ${stats.chunksSkipped} unchanged, ${stats.chunksRemoved} removed, ${stats.errors.length} errors`
    );
    return stats;
  }

  private async ensureCompatible(): Promise<void> {
    const params = {
      embeddingModel: this.embeddingModel,
      chunkSize: this.chunkSize,
      chunkOverlap: this.chunkOverlap
    };
    if (!this.manifest.isCompatible(params)) {
      this.logger.warn(
        "Stored index was built with a different embedding model or chunk settings. Rebuilding from scratch."
      );
      this.manifest.clear();
      await this.store.clear();
    }
    this.manifest.setParams(params);
  }

  private async indexDocument(doc: SourceDocument, stats: IndexStats): Promise<void> {
    const chunks = (
      await this.splitter.createDocuments([doc.text], [{ source: doc.path }])
    ).map(chunkFromDocument);
    this.logger.debug(`Indexing ${doc.path}: ${chunks.length} chunks`);

    const vectors = await this.embedChunks(doc.path, chunks, stats);
    const records: IndexRecord[] = [];
    chunks.forEach((chunk, i) => {
      const embedding = vectors[i];
      if (!embedding) return;
      records.push({
        id: recordId(doc.path, doc.contentHash, chunk.index),
        text: chunk.text,
        embedding,
        metadata: {
          documentPath: doc.path,
          chunkIndex: chunk.index,
          contentHash: doc.contentHash,
          start: chunk.start,
          end: chunk.end
        }
      });
    });
    const failedChunks = chunks.length - records.length;

    // Retrying a partially embedded version reuses its ids; those must survive a failed write.
    const existing = new Set(
      await this.store.listIds(
        (m) => m.documentPath === doc.path && m.contentHash === doc.contentHash
      )
    );

    try {
      await this.writeRecords(records);
    } catch (err: unknown) {
      if (!(err instanceof IndexWriteError)) throw err;
      await this.deleteRecords(records.map((r) => r.id).filter((id) => !existing.has(id)));
      const message = `Failed to write ${doc.path}: ${err.message}`;
      this.logger.error(message);
      stats.errors.push({ path: doc.path, kind: "IndexWriteError", message });
      return;
    }

    this.manifest.set(doc.path, {
      contentHash: doc.contentHash,
      modifiedAt: doc.modifiedAt,
      type: doc.type,
      chunkCount: records.length,
      failedChunks,
      indexedAt: new Date().toISOString()
    });

    const stale = await this.store.listIds(
      (m) => m.documentPath === doc.path && m.contentHash !== doc.contentHash
    );
    await this.deleteRecords(stale);

    stats.documentsIndexed += 1;
    stats.chunksAdded += records.length;
    stats.chunksRemoved += stale.length;
  }

  /**
   * Returns one vector per chunk, `undefined` where embedding failed. A failed
   * group is retried chunk by chunk so one bad chunk costs only itself.
   */
  private async embedChunks(
    docPath: string,
    chunks: TextChunk[],
    stats: IndexStats
  ): Promise<Array<number[] | undefined>> {
    const vectors: Array<number[] | undefined> = [];
    for (const group of batches(chunks, this.embeddingBatchSize)) {
      try {
        const out = await this.embeddings.embedDocuments(group.map((c) => c.text));
        if (out.length !== group.length) {
          throw new Error(`Embedding count mismatch: texts=${group.length} embeddings=${out.length}`);
        }
        vectors.push(...out);
        continue;
      } catch (err: unknown) {
        this.logger.debug(`Embedding batch failed for ${docPath}, retrying per chunk: ${errorMessage(err)}`);
      }

      for (const chunk of group) {
        try {
          const [vector] = await this.embeddings.embedDocuments([chunk.text]);
          if (!vector || vector.length === 0) throw new Error("empty embedding");
          vectors.push(vector);
        } catch (err: unknown) {
          const failure = new EmbeddingError(
            `Failed to embed chunk ${chunk.index} of ${docPath}: ${errorMessage(err)}`,
            { path: docPath, chunkIndex: chunk.index, cause: err }
          );
          this.logger.error(failure.message);
          stats.errors.push({
            path: docPath,
            kind: "EmbeddingError",
            message: failure.message,
            chunkIndex: chunk.index
          });
          stats.chunksFailed += 1;
          vectors.push(undefined);
        }
      }
    }
    return vectors;
  }

  /**
   * Upserts within the index's batch cap; a rejected batch is halved and
   * retried once. Any store failure surfaces as {@link IndexWriteError}.
   */
  private async writeRecords(records: IndexRecord[]): Promise<void> {
    for (const batch of batches(records, this.store.maxBatchSize)) {
      try {
        await this.upsert(batch);
      } catch (err: unknown) {
        if (batch.length < 2) throw err;
        this.logger.debug(`Upsert of ${batch.length} records rejected, retrying in halves`);
        const mid = Math.ceil(batch.length / 2);
        await this.upsert(batch.slice(0, mid));
        await this.upsert(batch.slice(mid));
      }
    }
  }

  private async upsert(batch: IndexRecord[]): Promise<void> {
    try {
      await this.store.upsert(batch);
    } catch (err: unknown) {
      if (err instanceof IndexWriteError) throw err;
      throw new IndexWriteError(errorMessage(err), batch.length, { cause: err });
    }
  }

  private async deleteRecords(ids: string[]): Promise<void> {
    for (const batch of batches(ids, this.store.maxBatchSize)) {
      await this.store.delete(batch);
    }
  }
}
