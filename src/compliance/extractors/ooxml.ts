// src/compliance/extractors/ooxml.ts
// Shared helpers for the zip-based Office formats (docx, pptx).

import JSZip from "jszip";
import { CorruptDocumentError } from "../errors";
import type { DocumentFormat } from "../types";

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

/**
 * Decode the XML entities that appear in OOXML text runs.
 */
export function xmlDecode(s: string): string {
  return s.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (whole, body: string) => {
    if (body.startsWith("#x")) {
      const code = parseInt(body.slice(2), 16);
      return code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    if (body.startsWith("#")) {
      const code = parseInt(body.slice(1), 10);
      return code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES[body] ?? whole;
  });
}

export async function openZip(bytes: Uint8Array, format: DocumentFormat): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(bytes);
  } catch (err) {
    throw new CorruptDocumentError(format, err instanceof Error ? err.message : String(err));
  }
}

/** Text content of a zip entry, or null when the entry does not exist */
export async function readEntry(zip: JSZip, name: string): Promise<string | null> {
  const entry = zip.file(name);
  return entry ? entry.async("string") : null;
}

/** Trailing number of a part name: "ppt/slides/slide12.xml" → 12 */
export function partNumber(name: string): number {
  const m = name.match(/(\d+)\.xml$/);
  return m ? parseInt(m[1], 10) : Number.MAX_SAFE_INTEGER;
}
