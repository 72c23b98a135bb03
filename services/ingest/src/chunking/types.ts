export interface TextChunk {
  index: number; // 0-based position in the document
  text: string;
  overlapLength: number; // Leading chars repeated from the previous chunk, separator included
}

export interface ChunkingOptions {
  maxChars: number;
  overlapChars: number;
}
