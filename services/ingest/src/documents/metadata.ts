import { z } from "zod";
import { MetadataParseError } from "../errors.js";

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type Metadata = Record<string, MetadataValue>;

export const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(MetadataValueSchema),
  ]),
);

export const MetadataSchema = z.record(MetadataValueSchema);

/**
 * Parse repeated `key=value` flags. Values stay strings; only the first `=` splits.
 */
export function parseKeyValuePairs(pairs: readonly string[], source = "--metadata"): Metadata {
  const result: Metadata = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq === -1) {
      throw new MetadataParseError(source, `expected key=value, got "${pair}"`);
    }
    const key = pair.slice(0, eq).trim();
    if (!key) {
      throw new MetadataParseError(source, `empty key in "${pair}"`);
    }
    result[key] = pair.slice(eq + 1);
  }
  return result;
}

/** Parse a JSON object blob, keeping each value's JSON type. */
export function parseMetadataJson(raw: string, source = "--metadata-json"): Metadata {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MetadataParseError(source, reason);
  }

  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new MetadataParseError(source, "must be a JSON object (key-value pairs)");
  }

  const parsed = MetadataSchema.safeParse(value);
  if (!parsed.success) {
    throw new MetadataParseError(source, parsed.error.issues[0]?.message ?? "unsupported value");
  }
  return parsed.data;
}

/**
 * Merge `key=value` pairs with a JSON object. On a shared key the JSON value wins.
 */
export function mergeMetadata(pairs: Metadata, json: Metadata | undefined): Metadata {
  return { ...pairs, ...json };
}

/** Parse and merge both metadata flags; undefined when neither was given. */
export function metadataFromFlags(
  pairs: readonly string[],
  json: string | undefined,
  jsonSource = "--metadata-json",
): Metadata | undefined {
  if (pairs.length === 0 && json === undefined) return undefined;
  return mergeMetadata(
    parseKeyValuePairs(pairs),
    json === undefined ? undefined : parseMetadataJson(json, jsonSource),
  );
}
