import { Document, type DocumentInterface } from "@langchain/core/documents";
import { TextSplitter } from "@langchain/textsplitters";

export type TextChunk = {
  text: string;
  /** 0-based position within the document. */
  index: number;
  start: number;
  /** Exclusive. */
  end: number;
};

export type ChunkOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

export function assertChunkOptions(options: ChunkOptions): void {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap must be an integer in [0, chunkSize) (got ${chunkOverlap}, chunkSize=${chunkSize})`
    );
  }
}

/**
 * Fixed-size windows over Unicode code points, so a surrogate pair is never
 * cut in half. Consecutive chunks share exactly `chunkOverlap` code points and
 * the last window always reaches the end of the text. `start`/`end` are
 * string offsets.
 */
export function chunkText(text: string, options: ChunkOptions): TextChunk[] {
  assertChunkOptions(options);
  const { chunkSize, chunkOverlap } = options;
  const step = chunkSize - chunkOverlap;

  const points = Array.from(text);
  const offsets = [0];
  for (const point of points) {
    offsets.push((offsets[offsets.length - 1] ?? 0) + point.length);
  }
  const offsetAt = (i: number): number => offsets[i] ?? text.length;

  const chunks: TextChunk[] = [];
  for (let start = 0; start < points.length; start += step) {
    const end = Math.min(start + chunkSize, points.length);
    chunks.push({
      text: points.slice(start, end).join(""),
      index: chunks.length,
      start: offsetAt(start),
      end: offsetAt(end)
    });
    if (end >= points.length) break;
  }
  return chunks;
}

/** Reads back the chunk position {@link SlidingWindowTextSplitter.createDocuments} stores. */
export function chunkFromDocument(doc: DocumentInterface): TextChunk {
  const { chunkIndex, start, end } = doc.metadata;
  if (typeof chunkIndex !== "number" || typeof start !== "number" || typeof end !== "number") {
    throw new Error("Chunk document carries no chunkIndex/start/end metadata");
  }
  return { text: doc.pageContent, index: chunkIndex, start, end };
}

/**
 * {@link chunkText} behind LangChain's splitter API. Documents created here
 * carry `chunkIndex`, `start` and `end` in their metadata.
 */
export class SlidingWindowTextSplitter extends TextSplitter {
  static lc_name(): string {
    return "SlidingWindowTextSplitter";
  }

  constructor(fields: ChunkOptions) {
    assertChunkOptions(fields);
    super(fields);
  }

  private windows(text: string): TextChunk[] {
    return chunkText(text, { chunkSize: this.chunkSize, chunkOverlap: this.chunkOverlap });
  }

  async splitText(text: string): Promise<string[]> {
    return this.windows(text).map((c) => c.text);
  }

  async createDocuments(
    texts: string[],
    metadatas: Record<string, unknown>[] = []
  ): Promise<Document[]> {
    return texts.flatMap((text, i) =>
      this.windows(text).map(
        (chunk) =>
          new Document({
            pageContent: chunk.text,
            metadata: { ...metadatas[i], chunkIndex: chunk.index, start: chunk.start, end: chunk.end }
          })
      )
    );
  }
}
