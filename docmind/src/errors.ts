/** A source file could not be read or is not text. Non-fatal during indexing. */
export class DocumentReadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentReadError";
    this.path = path;
  }
}

/** The embedding provider failed for a chunk (or a query). */
export class EmbeddingError extends Error {
  readonly path?: string;
  readonly chunkIndex?: number;

  constructor(
    message: string,
    options?: { path?: string; chunkIndex?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "EmbeddingError";
    this.path = options?.path;
    this.chunkIndex = options?.chunkIndex;
  }
}

/** The vector index rejected a write, e.g. a batch above its cap. */
export class IndexWriteError extends Error {
  readonly recordCount: number;

  constructor(message: string, recordCount: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexWriteError";
    this.recordCount = recordCount;
  }
}

export class ModelUnavailableError extends Error {
  readonly model: string;

  constructor(model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelUnavailableError";
    this.model = model;
  }
}

export class InferenceError extends Error {
  readonly model: string;

  constructor(model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InferenceError";
    this.model = model;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
