import type { IngestDocument } from "../documents/types.js";
import { ConfigurationError, HttpError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { RagEngineClient } from "../ragengine/client.js";
import { DocIdSchema, NotFoundDocumentsSchema } from "../ragengine/types.js";
import type { JsonObject, JsonValue } from "../ragengine/types.js";

export type IngestMode = "create" | "update";

export interface IngestOptions {
  indexName: string;
  mode: IngestMode;
  /** Skip the filename existence check in create mode. */
  allowDuplicates?: boolean;
  logger?: Logger;
}

const LIST_KEYS = ["documents", "items", "data", "results"] as const;

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asObject(value: JsonValue, key: string): JsonObject {
  return isJsonObject(value) ? { ...value } : { [key]: value };
}

/** Documents in a list response, whichever key the engine used. */
export function extractDocuments(result: JsonValue): JsonValue[] {
  if (!isJsonObject(result)) return [];
  for (const key of LIST_KEYS) {
    const value = result[key];
    if (Array.isArray(value)) return value.filter(isJsonObject);
  }
  return [];
}

/** IDs the engine reported as unknown during an update. */
export function notFoundDocIds(result: JsonValue): Set<string> {
  const parsed = NotFoundDocumentsSchema.safeParse(result);
  const ids = new Set<string>();
  if (!parsed.success) return ids;
  for (const item of parsed.data.not_found_documents) {
    const entry = DocIdSchema.safeParse(item);
    if (entry.success) ids.add(entry.data.doc_id);
  }
  return ids;
}

async function filenameExists(
  client: RagEngineClient,
  indexName: string,
  filename: string,
): Promise<boolean> {
  try {
    const result = await client.listDocuments(indexName, {
      limit: 1,
      offset: 0,
      maxTextLength: 1,
      metadataFilter: { filename },
    });
    return extractDocuments(result).length > 0;
  } catch (error) {
    // The index does not exist yet; create will make it.
    if (error instanceof HttpError && error.status === 404) return false;
    throw error;
  }
}

async function createDocuments(
  client: RagEngineClient,
  documents: IngestDocument[],
  options: IngestOptions,
): Promise<JsonValue> {
  const { indexName, logger } = options;
  const filename = documents[0]?.metadata.filename;

  if (!options.allowDuplicates && typeof filename === "string" && filename.trim()) {
    if (await filenameExists(client, indexName, filename)) {
      logger?.warn("Document already ingested, skipping create", { filename, indexName });
      return {
        skipped: true,
        reason: "filename_exists",
        filename,
        index_name: indexName,
        message:
          `A document with filename '${filename}' already exists in index '${indexName}'. ` +
          "Create mode skipped without adding new documents.",
      };
    }
  }

  logger?.info("Creating documents", { indexName, count: documents.length });
  const result = asObject(await client.createIndex(indexName, documents), "create_result");
  return { ingestion_status: "created", ...result };
}

/**
 * Update by ID; any chunk the engine does not know yet is added through create.
 */
async function upsertDocuments(
  client: RagEngineClient,
  documents: IngestDocument[],
  options: IngestOptions,
): Promise<JsonValue> {
  const { indexName, logger } = options;

  logger?.info("Updating documents", { indexName, count: documents.length });
  const updateResult = await client.updateDocuments(indexName, documents);

  const missingIds = notFoundDocIds(updateResult);
  const missing = documents.filter((d) => missingIds.has(d.docId));
  if (missing.length === 0) {
    return { ...asObject(updateResult, "update_result"), ingestion_status: "updated" };
  }

  logger?.info("Creating documents unknown to the index", { indexName, count: missing.length });
  const createResult = await client.createIndex(indexName, missing);

  return {
    ingestion_status: "created",
    upsert_fallback_used: true,
    upsert_created_documents: missing.length,
    update_result: updateResult,
    create_fallback_result: createResult,
    index_name: indexName,
    base_url: client.baseUrl,
  };
}

/**
 * Send prepared documents to the engine in create or update mode.
 * An empty document set is refused before any request is made.
 */
export async function ingestDocuments(
  client: RagEngineClient,
  documents: IngestDocument[],
  options: IngestOptions,
): Promise<JsonValue> {
  if (documents.length === 0) {
    throw new ConfigurationError("No content to ingest: the document is empty");
  }

  return options.mode === "create"
    ? createDocuments(client, documents, options)
    : upsertDocuments(client, documents, options);
}
