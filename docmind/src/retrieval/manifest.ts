import { promises as fs } from "node:fs";

import { z } from "zod";

import { writeJsonAtomic } from "./indexStore.js";

export type ManifestEntry = {
  contentHash: string;
  modifiedAt: number;
  type: string;
  chunkCount: number;
  /** Chunks dropped because embedding failed; non-zero forces a re-index. */
  failedChunks: number;
  indexedAt: string;
};

/** Parameters that make stored embeddings incomparable when they change. */
export type IndexParams = {
  embeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
};

const ManifestSchema = z.object({
  version: z.literal(1),
  params: z
    .object({
      embeddingModel: z.string(),
      chunkSize: z.number().int(),
      chunkOverlap: z.number().int()
    })
    .nullable(),
  documents: z.record(
    z.object({
      contentHash: z.string(),
      modifiedAt: z.number(),
      type: z.string(),
      chunkCount: z.number().int().min(0),
      failedChunks: z.number().int().min(0),
      indexedAt: z.string()
    })
  )
});

/**
 * Committed version of every indexed document. Setting an entry is the point
 * at which a re-indexed document becomes visible to retrieval.
 */
export class IndexManifest {
  private readonly filePath?: string;
  private readonly entries = new Map<string, ManifestEntry>();
  private indexParams: IndexParams | null = null;

  constructor(filePath?: string) {
    this.filePath = filePath;
  }

  static async open(filePath: string): Promise<IndexManifest> {
    const manifest = new IndexManifest(filePath);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err: unknown) {
      if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
        return manifest;
      }
      throw err;
    }
    const parsed = ManifestSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(
        `Invalid index manifest at ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown"}`
      );
    }
    manifest.indexParams = parsed.data.params;
    for (const [docPath, entry] of Object.entries(parsed.data.documents)) {
      manifest.entries.set(docPath, entry);
    }
    return manifest;
  }

  get params(): IndexParams | null {
    return this.indexParams;
  }

  /** True when nothing was indexed yet or the stored params match. */
  isCompatible(params: IndexParams): boolean {
    const current = this.indexParams;
    if (!current) return true;
    return (
      current.embeddingModel === params.embeddingModel &&
      current.chunkSize === params.chunkSize &&
      current.chunkOverlap === params.chunkOverlap
    );
  }

  setParams(params: IndexParams): void {
    this.indexParams = { ...params };
  }

  get(docPath: string): ManifestEntry | undefined {
    return this.entries.get(docPath);
  }

  set(docPath: string, entry: ManifestEntry): void {
    this.entries.set(docPath, entry);
  }

  delete(docPath: string): boolean {
    return this.entries.delete(docPath);
  }

  paths(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  chunkCount(): number {
    let total = 0;
    for (const entry of this.entries.values()) total += entry.chunkCount;
    return total;
  }

  /** Whether a record belongs to the committed version of its document. */
  isCommitted(docPath: string, contentHash: string): boolean {
    return this.entries.get(docPath)?.contentHash === contentHash;
  }

  clear(): void {
    this.entries.clear();
    this.indexParams = null;
  }

  async save(): Promise<void> {
    if (!this.filePath) return;
    await writeJsonAtomic(this.filePath, {
      version: 1,
      params: this.indexParams,
      documents: Object.fromEntries(this.entries)
    });
  }
}
