import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { EmbeddingError, errorMessage } from "../errors.js";
import type { IndexManifest } from "./manifest.js";
import type { VectorIndex } from "./types.js";

export type Chunk = {
  id: string;
  documentPath: string;
  index: number;
  text: string;
  start: number;
  end: number;
};

export type RetrievedChunk = {
  chunk: Chunk;
  score: number;
};

export const DEFAULT_TOP_K = 5;

export class Retriever {
  private readonly embeddings: EmbeddingsInterface;
  private readonly index: VectorIndex;
  private readonly manifest: IndexManifest;

  constructor(deps: {
    embeddings: EmbeddingsInterface;
    index: VectorIndex;
    manifest: IndexManifest;
  }) {
    this.embeddings = deps.embeddings;
    this.index = deps.index;
    this.manifest = deps.manifest;
  }

  /**
   * Top `k` chunks by descending similarity, restricted to the committed
   * version of each document. An empty index yields `[]`.
   */
  async retrieve(query: string, k: number = DEFAULT_TOP_K): Promise<RetrievedChunk[]> {
    if (k <= 0 || this.manifest.size === 0) return [];

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddings.embedQuery(query);
    } catch (err: unknown) {
      throw new EmbeddingError(`Failed to embed query: ${errorMessage(err)}`, { cause: err });
    }

    const hits = await this.index.query(queryEmbedding, k, (m) =>
      this.manifest.isCommitted(m.documentPath, m.contentHash)
    );

    return hits.map(({ record, score }) => ({
      chunk: {
        id: record.id,
        documentPath: record.metadata.documentPath,
        index: record.metadata.chunkIndex,
        text: record.text,
        start: record.metadata.start,
        end: record.metadata.end
      },
      score
    }));
  }
}
