import { ChatCompletionSchema } from "../ragengine/types.js";
import type { JsonValue } from "../ragengine/types.js";

/** Recursively sort object keys so output is stable across runs. */
export function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value !== "object" || value === null) return value;
  const sorted: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
}

export function formatJson(value: JsonValue): string {
  return JSON.stringify(sortKeys(value), null, 2);
}

/** Assistant text of an OpenAI-style completion; empty when the shape is unexpected. */
export function extractAssistantText(result: JsonValue): string {
  const parsed = ChatCompletionSchema.safeParse(result);
  if (!parsed.success) return "";
  return parsed.data.choices[0]?.message.content ?? "";
}

function isPresent(value: JsonValue): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object" && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
}

export interface ChatOutputOptions {
  json: boolean;
  showSources: boolean;
}

export function formatChatResult(result: JsonValue, options: ChatOutputOptions): string {
  if (options.json) return formatJson(result);

  const text = extractAssistantText(result);
  const lines = [text || formatJson(result)];

  if (options.showSources && typeof result === "object" && result !== null && !Array.isArray(result)) {
    const sources = result.source_nodes;
    if (sources !== undefined && isPresent(sources)) {
      lines.push("\n---\nsource_nodes:", formatJson(sources));
    }
  }
  return lines.join("\n");
}
