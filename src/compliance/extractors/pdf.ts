// src/compliance/extractors/pdf.ts
// PDF → one block per page.
//
// unpdf (serverless PDF.js build) extracts each page independently; a term
// split across a page break is not stitched back together.

import { extractText, getDocumentProxy } from "unpdf";
import { CorruptDocumentError } from "../errors";
import type { TextBlock } from "../types";

type PdfDocument = Awaited<ReturnType<typeof getDocumentProxy>>;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function openPdf(bytes: Uint8Array): Promise<PdfDocument> {
  try {
    // PDF.js may detach the buffer it is given, so hand it a copy
    return await getDocumentProxy(new Uint8Array(bytes));
  } catch (err) {
    throw new CorruptDocumentError("pdf", describe(err));
  }
}

export async function extractPdf(bytes: Uint8Array): Promise<TextBlock[]> {
  const pdf = await openPdf(bytes);
  try {
    const { text: pages } = await extractText(pdf, { mergePages: false });
    return pages.map((content, i): TextBlock => ({
      content,
      location: { kind: "page", page: i + 1 },
    }));
  } catch (err) {
    throw new CorruptDocumentError("pdf", describe(err));
  } finally {
    await pdf.destroy();
  }
}
