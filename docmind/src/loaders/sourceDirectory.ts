import crypto from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { TextLoader } from "@langchain/classic/document_loaders/fs/text";
import fg from "fast-glob";

import { DocumentReadError, errorMessage } from "../errors.js";

export type SourceFile = {
  /** Relative to the documents directory, `/`-separated. Doubles as the document id. */
  path: string;
  absolutePath: string;
  /** Lower-case extension without the dot. */
  type: string;
};

export type SourceDocument = SourceFile & {
  text: string;
  modifiedAt: number;
  contentHash: string;
};

export const DEFAULT_EXTENSIONS = ["txt", "md", "markdown", "py", "js", "ts", "json", "csv"];
export const DEFAULT_EXCLUDED_FOLDERS = ["node_modules", ".git"];

export function hashContent(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\./, "").toLowerCase();
}

/**
 * Lists supported files under `sourceDir`, sorted by path. Creates the
 * directory when it does not exist yet.
 */
export async function listSourceFiles(
  sourceDir: string,
  options: { extensions?: string[]; excludedFolders?: string[] } = {}
): Promise<SourceFile[]> {
  const root = path.resolve(sourceDir);
  await fs.mkdir(root, { recursive: true });

  const allowed = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map(normalizeExtension));
  const ignore = (options.excludedFolders ?? DEFAULT_EXCLUDED_FOLDERS).map((f) => `**/${f}/**`);

  const entries = await fg("**/*", {
    cwd: root,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore
  });

  const files: SourceFile[] = [];
  for (const rel of entries) {
    const type = normalizeExtension(path.posix.extname(rel));
    if (!allowed.has(type)) continue;
    files.push({ path: rel, absolutePath: path.join(root, rel), type });
  }
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return files;
}

/** @throws {DocumentReadError} when the file is unreadable or binary. */
export async function loadSourceDocument(file: SourceFile): Promise<SourceDocument> {
  let text: string;
  let modifiedAt: number;
  try {
    const stat = await fs.stat(file.absolutePath);
    modifiedAt = stat.mtimeMs;
    const docs = await new TextLoader(file.absolutePath).load();
    text = docs.map((d) => d.pageContent).join("");
  } catch (err: unknown) {
    throw new DocumentReadError(file.path, `Cannot read ${file.path}: ${errorMessage(err)}`, {
      cause: err
    });
  }

  if (text.includes("\u0000")) {
    throw new DocumentReadError(file.path, `Skipping ${file.path}: binary content`);
  }

  return { ...file, text, modifiedAt, contentHash: hashContent(text) };
}
