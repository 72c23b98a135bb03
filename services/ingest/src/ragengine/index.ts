export { RagEngineClient, createEndpointPath } from "./client.js";
export type {
  ChatMessage,
  ChatRequest,
  JsonObject,
  JsonValue,
  ListDocumentsOptions,
  RagEngineClientConfig,
} from "./types.js";
