// src/compliance/extractors/plainText.ts

import { EncodingError } from "../errors";
import type { TextBlock } from "../types";

/**
 * Strict UTF-8 decode into a single whole-document block. A leading BOM is dropped.
 */
export async function extractPlainText(bytes: Uint8Array): Promise<TextBlock[]> {
  let content: string;
  try {
    content = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new EncodingError(err instanceof Error ? err.message : undefined);
  }
  return [{ content, location: { kind: "offset", base: 0 } }];
}
