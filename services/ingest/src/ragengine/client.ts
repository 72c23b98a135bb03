import { Agent, fetch } from "undici";
import type { IngestDocument } from "../documents/types.js";
import { HttpError, NetworkError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { withSpan } from "../tracing.js";
import { withRetry } from "../utils/retry.js";
import {
  JsonValueSchema,
  type ChatRequest,
  type JsonValue,
  type ListDocumentsOptions,
  type RagEngineClientConfig,
} from "./types.js";

type Method = "GET" | "POST";
type Query = Record<string, string | number>;

function errorCode(error: unknown): string {
  if (typeof error !== "object" || error === null) return "UNKNOWN";

  if ("name" in error && error.name === "TimeoutError") return "TIMEOUT";
  if ("name" in error && error.name === "AbortError") return "ABORTED";

  // undici wraps socket failures as TypeError("fetch failed", { cause })
  const cause = "cause" in error ? error.cause : undefined;
  for (const candidate of [cause, error]) {
    if (typeof candidate === "object" && candidate !== null && "code" in candidate) {
      const code = candidate.code;
      if (code === "UND_ERR_CONNECT_TIMEOUT") return "CONNECT_TIMEOUT";
      if (typeof code === "string") return code;
    }
  }
  return "name" in error && typeof error.name === "string" ? error.name : "UNKNOWN";
}

function parseBody(text: string): JsonValue {
  try {
    const parsed = JsonValueSchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data;
  } catch {
    // fall through: not JSON
  }
  return { raw: text };
}

/** The create endpoint lives at `rag/index`, or at `index` when the base URL already ends in /rag. */
export function createEndpointPath(baseUrl: string): string {
  const path = new URL(baseUrl).pathname.replace(/\/+$/, "");
  return path.endsWith("/rag") ? "index" : "rag/index";
}

/**
 * HTTP client for the RAG engine.
 *
 * Every request gets a connect timeout (socket establishment) and a total
 * timeout (whole exchange, body included). Transient failures are retried
 * up to `retries` attempts in total; the last error is rethrown.
 */
export class RagEngineClient {
  readonly baseUrl: string;
  private readonly dispatcher: Agent;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly minRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly apiKey?: string;
  private readonly logger: Logger;

  constructor(config: RagEngineClientConfig, logger: Logger = silentLogger) {
    this.baseUrl = config.baseUrl.endsWith("/") ? config.baseUrl : `${config.baseUrl}/`;
    this.dispatcher = new Agent({ connect: { timeout: config.connectTimeoutMs } });
    this.timeoutMs = config.timeoutMs;
    this.retries = config.retries;
    this.minRetryDelayMs = config.minRetryDelayMs ?? 1000;
    this.maxRetryDelayMs = config.maxRetryDelayMs ?? 30000;
    this.apiKey = config.apiKey;
    this.logger = logger;
  }

  endpoint(path: string, query?: Query): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async attempt(method: Method, url: string, body: string | undefined): Promise<JsonValue> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      throw new NetworkError(errorCode(error), url, { cause: error });
    }

    if (!ok) {
      throw new HttpError(status, url, text);
    }
    return parseBody(text);
  }

  private async request(
    method: Method,
    path: string,
    options: { body?: unknown; query?: Query } = {},
  ): Promise<JsonValue> {
    const url = this.endpoint(path, options.query);
    const body = options.body === undefined ? undefined : JSON.stringify(options.body);

    return withRetry(
      (attempt) => {
        this.logger.debug("RAG engine request", { method, url, attempt });
        return this.attempt(method, url, body);
      },
      {
        maxAttempts: this.retries,
        minDelayMs: this.minRetryDelayMs,
        maxDelayMs: this.maxRetryDelayMs,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("RAG engine request failed, retrying", {
            method,
            url,
            attempt,
            maxAttempts: this.retries,
            delayMs: Math.round(delayMs),
            error: error instanceof Error ? error.message : String(error),
          });
        },
      },
    );
  }

  /**
   * Create an index (if needed) and add documents to it. IDs are assigned by the engine.
   */
  async createIndex(indexName: string, documents: IngestDocument[]): Promise<JsonValue> {
    return withSpan(
      "ragengine.create_index",
      { index_name: indexName, documents: documents.length },
      () =>
        this.request("POST", createEndpointPath(this.baseUrl), {
          body: {
            index_name: indexName,
            documents: documents.map((d) => ({ text: d.text, metadata: d.metadata })),
          },
        }),
    );
  }

  /**
   * Update documents by ID. Unknown IDs come back in `not_found_documents`.
   */
  async updateDocuments(indexName: string, documents: IngestDocument[]): Promise<JsonValue> {
    return withSpan(
      "ragengine.update_documents",
      { index_name: indexName, documents: documents.length },
      () =>
        this.request("POST", `indexes/${encodeURIComponent(indexName)}/documents`, {
          body: {
            documents: documents.map((d) => ({
              doc_id: d.docId,
              text: d.text,
              hash_value: d.hashValue,
              metadata: d.metadata,
            })),
          },
        }),
    );
  }

  async listDocuments(indexName: string, options: ListDocumentsOptions = {}): Promise<JsonValue> {
    const { limit = 10, offset = 0, maxTextLength = 1000, metadataFilter } = options;
    const query: Query = { limit, offset, max_text_length: maxTextLength };
    if (metadataFilter && Object.keys(metadataFilter).length > 0) {
      query.metadata_filter = JSON.stringify(metadataFilter);
    }

    return withSpan("ragengine.list_documents", { index_name: indexName, limit, offset }, () =>
      this.request("GET", `indexes/${encodeURIComponent(indexName)}/documents`, { query }),
    );
  }

  async listIndexes(): Promise<JsonValue> {
    return withSpan("ragengine.list_indexes", {}, () => this.request("GET", "indexes"));
  }

  /**
   * OpenAI-compatible chat completion, scoped to an index for retrieval.
   */
  async chatCompletions(request: ChatRequest): Promise<JsonValue> {
    return withSpan(
      "ragengine.chat_completions",
      { index_name: request.indexName, model: request.model },
      () =>
        this.request("POST", "v1/chat/completions", {
          body: {
            index_name: request.indexName,
            model: request.model,
            messages: request.messages,
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            context_token_ratio: request.contextTokenRatio,
          },
        }),
    );
  }

  /** Release pooled sockets so the process can exit. */
  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
