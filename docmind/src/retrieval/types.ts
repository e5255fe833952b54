export type RecordMetadata = {
  documentPath: string;
  chunkIndex: number;
  /** Hash of the document version this chunk was cut from. */
  contentHash: string;
  start: number;
  end: number;
};

export type IndexRecord = {
  id: string;
  text: string;
  embedding: number[];
  metadata: RecordMetadata;
};

export type ScoredRecord = {
  record: IndexRecord;
  score: number;
};

export type RecordFilter = (metadata: RecordMetadata) => boolean;

export type StoredIndex = {
  version: 1;
  records: IndexRecord[];
};

/**
 * Nearest-neighbour store. Each call is atomic on its own; callers must keep
 * `upsert` batches within `maxBatchSize`.
 */
export interface VectorIndex {
  readonly maxBatchSize: number;
  upsert(records: IndexRecord[]): Promise<void>;
  delete(ids: string[]): Promise<void>;
  listIds(filter?: RecordFilter): Promise<string[]>;
  query(embedding: number[], k: number, filter?: RecordFilter): Promise<ScoredRecord[]>;
  count(filter?: RecordFilter): Promise<number>;
  clear(): Promise<void>;
  /** Persists pending writes. */
  flush(): Promise<void>;
}
