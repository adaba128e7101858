// src/compliance/extractors/index.ts
// Document extractor registry
//
// Maps DocumentFormat -> Extractor. The format set is closed: a declared
// format outside the registry is rejected before any bytes are read.

import { UnsupportedFormatError } from "../errors";
import { DOCUMENT_FORMATS, type DocumentFormat, type TextBlock } from "../types";

import { extractPlainText } from "./plainText";
import { extractWordDocument } from "./wordDocument";
import { extractPdf } from "./pdf";
import { extractSlideDeck } from "./slideDeck";

export type Extractor = (bytes: Uint8Array) => Promise<TextBlock[]>;

/**
 * Registry of extractor functions keyed by DocumentFormat.
 *
 * To add a new format:
 * 1. Add it to DOCUMENT_FORMATS in ../types
 * 2. Create the extractor file in this directory
 * 3. Add it to this registry and to EXTENSION_FORMATS
 */
export const extractorRegistry: Record<DocumentFormat, Extractor> = {
  plain_text: extractPlainText,
  word_document: extractWordDocument,
  pdf: extractPdf,
  slide_deck: extractSlideDeck,
};

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  txt: "plain_text",
  text: "plain_text",
  md: "plain_text",
  docx: "word_document",
  pdf: "pdf",
  pptx: "slide_deck",
};

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((f) => f === value);
}

/**
 * Declared format from an upload's file name. Legacy binary Office files
 * (.doc, .ppt) and everything else are unsupported.
 */
export function formatFromFilename(filename: string): DocumentFormat {
  const dot = filename.lastIndexOf(".");
  const ext = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : "";
  const format = EXTENSION_FORMATS[ext];
  if (!format) {
    throw new UnsupportedFormatError(ext ? `.${ext}` : filename);
  }
  return format;
}

/**
 * Accepts a DocumentFormat name or a bare file extension ("docx", ".pptx").
 */
export function resolveFormat(value: string): DocumentFormat {
  const v = value.trim().toLowerCase();
  if (isDocumentFormat(v)) return v;
  const format = EXTENSION_FORMATS[v.replace(/^\./, "")];
  if (!format) throw new UnsupportedFormatError(value);
  return format;
}

/**
 * Ordered text blocks of a document. All-or-nothing: any failure throws and
 * no partial block list is returned.
 */
export async function extract(bytes: Uint8Array, declaredFormat: string): Promise<TextBlock[]> {
  if (!isDocumentFormat(declaredFormat)) {
    throw new UnsupportedFormatError(declaredFormat);
  }
  return extractorRegistry[declaredFormat](bytes);
}
