import { readFile } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { chunkText } from "../chunking/index.js";
import { ConfigurationError } from "../errors.js";
import { makeDocId, sha256Hex } from "./doc-id.js";
import type { Metadata } from "./metadata.js";
import type { BuildDocumentsOptions, IngestDocument, SourceText } from "./types.js";

const DEFAULT_TEXT_NAME = "pasted-text";

/**
 * Chunk a source and attach per-chunk IDs and metadata.
 * Metadata layering: base fields < user metadata < index_name < chunk position.
 */
export function buildDocuments(source: SourceText, options: BuildDocumentsOptions): IngestDocument[] {
  const { indexName, chunking, metadata, now = () => new Date() } = options;
  const chunks = chunkText(source.text, chunking);

  const base: Metadata = {
    source_type: source.sourceType,
    filename: source.filename,
    path: source.path,
    ingested_at: now().toISOString(),
    ...metadata,
    index_name: indexName,
  };

  return chunks.map((chunk) => ({
    docId: makeDocId(source.path, chunk.index),
    text: chunk.text,
    hashValue: sha256Hex(chunk.text),
    metadata: {
      ...base,
      chunk_index: chunk.index,
      chunk_count: chunks.length,
    },
  }));
}

/** Read a UTF-8 file into a source keyed on its absolute path. */
export async function readSourceFile(filePath: string): Promise<SourceText> {
  const absolutePath = resolve(filePath);
  let text: string;
  try {
    text = await readFile(absolutePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`File not found or unreadable: ${filePath} (${reason})`);
  }

  const ext = extname(absolutePath).toLowerCase();
  return {
    text,
    filename: basename(absolutePath),
    path: absolutePath,
    sourceType: ext ? ext.slice(1) : "txt",
  };
}

/** Name used for pasted text; gets `.md` when it has no extension. */
export function normalizeTextName(nameHint: string | undefined): string {
  const name = nameHint?.trim() || DEFAULT_TEXT_NAME;
  return extname(name) ? name : `${name}.md`;
}

/** Wrap raw text as a source with a virtual path, so IDs stay stable per name. */
export function textSource(text: string, nameHint?: string): SourceText {
  const content = text.trim();
  if (!content) {
    throw new ConfigurationError("Text content is empty");
  }
  const filename = normalizeTextName(nameHint);
  const ext = extname(filename).toLowerCase();
  return {
    text: content,
    filename,
    path: `virtual://cli/${filename}`,
    sourceType: ext.slice(1),
  };
}
