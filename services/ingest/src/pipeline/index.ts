export { ingestDocuments, extractDocuments, notFoundDocIds } from "./ingest.js";
export type { IngestMode, IngestOptions } from "./ingest.js";
