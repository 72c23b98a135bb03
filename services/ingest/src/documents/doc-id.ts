import { createHash } from "node:crypto";
import { v5 as uuidv5 } from "uuid";

/**
 * Stable chunk ID keyed on (path, chunk index), never on content,
 * so update runs overwrite the same remote records.
 */
export function makeDocId(absolutePath: string, chunkIndex: number): string {
  return uuidv5(`file://${absolutePath}#chunk=${chunkIndex}`, uuidv5.URL);
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}
