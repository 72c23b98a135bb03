export { chunkText, chunkBody, normalizeText, splitParagraphs, DEFAULT_CHUNKING } from "./paragraph-chunker.js";
export type { ChunkingOptions, TextChunk } from "./types.js";
