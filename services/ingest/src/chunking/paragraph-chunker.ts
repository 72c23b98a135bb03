import { ConfigurationError } from "../errors.js";
import type { ChunkingOptions, TextChunk } from "./types.js";

export const PARAGRAPH_SEPARATOR = "\n\n";

export const DEFAULT_CHUNKING: ChunkingOptions = { maxChars: 3000, overlapChars: 200 };

/**
 * Split text into trimmed, non-empty paragraphs.
 * Paragraphs are separated by one or more blank (or whitespace-only) lines.
 */
export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split(/\n[^\S\n]*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/** Paragraphs re-joined with a single blank line: what chunks reconstruct to. */
export function normalizeText(text: string): string {
  return splitParagraphs(text).join(PARAGRAPH_SEPARATOR);
}

function validateOptions({ maxChars, overlapChars }: ChunkingOptions): void {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new ConfigurationError(`maxChars must be a positive integer, got ${maxChars}`);
  }
  if (!Number.isInteger(overlapChars) || overlapChars < 0 || overlapChars >= maxChars) {
    throw new ConfigurationError(
      `overlapChars must be an integer in [0, maxChars), got ${overlapChars}`,
    );
  }
}

interface OpenChunk {
  text: string;
  overlapLength: number;
}

/**
 * Chunk text on paragraph boundaries.
 *
 * Paragraphs are packed into a chunk until the next one would push it past
 * `maxChars`. Every chunk after the first opens with the last `overlapChars`
 * characters of its predecessor. The prefix counts only when deciding whether
 * further paragraphs fit: the opening paragraph is always taken, so prefix plus
 * paragraph may exceed `maxChars`. A paragraph is never split.
 *
 * Empty input yields no chunks.
 */
export function chunkText(text: string, options: ChunkingOptions = DEFAULT_CHUNKING): TextChunk[] {
  validateOptions(options);
  const { maxChars, overlapChars } = options;

  const chunks: TextChunk[] = [];
  let current: OpenChunk | null = null;

  for (const paragraph of splitParagraphs(text)) {
    if (current === null) {
      current = { text: paragraph, overlapLength: 0 };
      continue;
    }

    if (current.text.length + PARAGRAPH_SEPARATOR.length + paragraph.length <= maxChars) {
      current.text += PARAGRAPH_SEPARATOR + paragraph;
      continue;
    }

    chunks.push({ index: chunks.length, ...current });
    const prefix: string = overlapChars > 0 ? current.text.slice(-overlapChars) + PARAGRAPH_SEPARATOR : "";
    current = { text: prefix + paragraph, overlapLength: prefix.length };
  }

  if (current !== null) {
    chunks.push({ index: chunks.length, ...current });
  }

  return chunks;
}

/** The part of a chunk that is not repeated from the chunk before it. */
export function chunkBody(chunk: TextChunk): string {
  return chunk.text.slice(chunk.overlapLength);
}
