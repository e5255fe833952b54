import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { IndexWriteError } from "../errors.js";
import { topKSimilarRecords } from "./search.js";
import type {
  IndexRecord,
  RecordFilter,
  ScoredRecord,
  StoredIndex,
  VectorIndex
} from "./types.js";

export const DEFAULT_MAX_BATCH_SIZE = 1000;

const RecordSchema = z.object({
  id: z.string(),
  text: z.string(),
  embedding: z.array(z.number()),
  metadata: z.object({
    documentPath: z.string(),
    chunkIndex: z.number().int().min(0),
    contentHash: z.string(),
    start: z.number().int().min(0),
    end: z.number().int().min(0)
  })
});

const StoredIndexSchema = z.object({
  version: z.literal(1),
  records: z.array(RecordSchema)
});

/** Writes through a temporary file so readers never see a half-written index. */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(value), "utf-8");
  await fs.rename(tmp, filePath);
}

export async function saveIndex(filePath: string, index: StoredIndex): Promise<void> {
  await writeJsonAtomic(filePath, index);
}

/** Returns `null` when no index has been written yet. */
export async function loadIndex(filePath: string): Promise<StoredIndex | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
  const parsed = StoredIndexSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(
      `Invalid vector index at ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown"}\nDelete the index directory and re-run: docmind index`
    );
  }
  return parsed.data;
}

/**
 * Vector index kept in memory and persisted as one JSON file on `flush()`.
 * Without a `filePath` it never touches the disk.
 */
export class FileVectorIndex implements VectorIndex {
  readonly maxBatchSize: number;
  private readonly filePath?: string;
  private readonly records = new Map<string, IndexRecord>();
  private dirty = false;

  constructor(options: { filePath?: string; maxBatchSize?: number } = {}) {
    this.filePath = options.filePath;
    this.maxBatchSize = Math.max(1, options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE);
  }

  static async open(options: { filePath: string; maxBatchSize?: number }): Promise<FileVectorIndex> {
    const index = new FileVectorIndex(options);
    const stored = await loadIndex(options.filePath);
    for (const record of stored?.records ?? []) {
      index.records.set(record.id, record);
    }
    return index;
  }

  async upsert(records: IndexRecord[]): Promise<void> {
    if (records.length > this.maxBatchSize) {
      throw new IndexWriteError(
        `Batch of ${records.length} records exceeds the index limit of ${this.maxBatchSize}`,
        records.length
      );
    }
    for (const record of records) {
      this.records.set(record.id, record);
    }
    if (records.length > 0) this.dirty = true;
  }

  async delete(ids: string[]): Promise<void> {
    for (const id of ids) {
      if (this.records.delete(id)) this.dirty = true;
    }
  }

  async listIds(filter?: RecordFilter): Promise<string[]> {
    const ids: string[] = [];
    for (const record of this.records.values()) {
      if (!filter || filter(record.metadata)) ids.push(record.id);
    }
    return ids;
  }

  async query(embedding: number[], k: number, filter?: RecordFilter): Promise<ScoredRecord[]> {
    return topKSimilarRecords({
      queryEmbedding: embedding,
      records: this.records.values(),
      k,
      filter
    });
  }

  async count(filter?: RecordFilter): Promise<number> {
    if (!filter) return this.records.size;
    return (await this.listIds(filter)).length;
  }

  /** Also marks the index dirty, so the next flush overwrites an unreadable file. */
  async clear(): Promise<void> {
    this.dirty = true;
    this.records.clear();
  }

  async flush(): Promise<void> {
    if (!this.filePath || !this.dirty) return;
    await saveIndex(this.filePath, { version: 1, records: [...this.records.values()] });
    this.dirty = false;
  }
}
