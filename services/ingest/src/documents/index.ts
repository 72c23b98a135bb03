export { buildDocuments, readSourceFile, textSource, normalizeTextName } from "./builder.js";
export { makeDocId, sha256Hex } from "./doc-id.js";
export {
  mergeMetadata,
  metadataFromFlags,
  parseKeyValuePairs,
  parseMetadataJson,
  MetadataSchema,
} from "./metadata.js";
export type { Metadata, MetadataValue } from "./metadata.js";
export type { BuildDocumentsOptions, IngestDocument, SourceText } from "./types.js";
