import { z } from "zod";
import { MetadataValueSchema } from "../documents/metadata.js";
import type { Metadata, MetadataValue } from "../documents/metadata.js";

/** Any JSON the engine returns. Non-JSON bodies arrive as `{ raw }`. */
export type JsonValue = MetadataValue;
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema = MetadataValueSchema;

export interface RagEngineClientConfig {
  baseUrl: string; // Resolved, with trailing slash
  connectTimeoutMs: number;
  timeoutMs: number;
  retries: number; // Total attempts per request
  apiKey?: string;
  minRetryDelayMs?: number;
  maxRetryDelayMs?: number;
}

export interface ListDocumentsOptions {
  limit?: number;
  offset?: number;
  maxTextLength?: number;
  metadataFilter?: Metadata;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  indexName: string;
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  contextTokenRatio: number;
}

export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).passthrough(),
      }).passthrough(),
    )
    .min(1),
});

export const NotFoundDocumentsSchema = z.object({
  not_found_documents: z.array(z.unknown()),
});

export const DocIdSchema = z.object({ doc_id: z.string().min(1) });
