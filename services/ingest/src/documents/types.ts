import type { ChunkingOptions } from "../chunking/types.js";
import type { Metadata } from "./metadata.js";

export interface IngestDocument {
  docId: string;
  text: string;
  hashValue: string; // sha256 of text
  metadata: Metadata;
}

export interface BuildDocumentsOptions {
  indexName: string;
  chunking: ChunkingOptions;
  metadata?: Metadata;
  /** Timestamp source for `ingested_at`. */
  now?: () => Date;
}

export interface SourceText {
  text: string;
  filename: string;
  path: string; // Absolute file path or virtual:// path; keys the doc IDs
  sourceType: string;
}
