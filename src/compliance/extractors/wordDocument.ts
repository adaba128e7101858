// src/compliance/extractors/wordDocument.ts
// DOCX → one whole-document block.
//
// Walks word/document.xml tag by tag: paragraphs (empty ones and table-cell
// paragraphs included) in document order, joined with "\n". Paragraph
// boundaries carry no location a reviewer needs, unlike pages or slides.
//
// Text boxes nest whole paragraphs inside a run of their host paragraph, and
// Word writes them twice: once under mc:Choice and again under mc:Fallback.
// Only the mc:Choice copy is read. A nested paragraph is emitted when it
// closes, so text-box paragraphs precede the paragraph that anchors them and
// the host keeps the runs on both sides of the box.

import { CorruptDocumentError } from "../errors";
import type { TextBlock } from "../types";
import { openZip, readEntry, xmlDecode } from "./ooxml";

// Open/close/self-closing tag | character data
const TOKEN_RE = /<(\/?)([\w:.-]+)(?:\s[^>]*?)?(\/?)>|([^<]+)/g;

/* ============= Document Walk ============= */

/**
 * Paragraph texts of a WordprocessingML document part, in order.
 */
export function documentParagraphs(documentXml: string): string[] {
  const paragraphs: string[] = [];
  const open: string[] = []; // text of each paragraph still open, innermost last
  let fallbackDepth = 0;
  let propsDepth = 0; // paragraph properties hold tab-stop definitions, not text
  let inText = false;

  const append = (s: string) => {
    if (open.length > 0) open[open.length - 1] += s;
  };

  for (const m of documentXml.matchAll(TOKEN_RE)) {
    const [, closing, name, selfClosing, chars] = m;

    if (chars !== undefined) {
      if (inText && fallbackDepth === 0) append(xmlDecode(chars));
      continue;
    }

    if (name === "mc:Fallback") {
      if (selfClosing) continue;
      fallbackDepth += closing ? -1 : 1;
      continue;
    }
    if (fallbackDepth > 0) continue;

    if (name === "w:pPr") {
      if (!selfClosing) propsDepth += closing ? -1 : 1;
      continue;
    }
    if (propsDepth > 0) continue;

    switch (name) {
      case "w:p":
        if (selfClosing) {
          paragraphs.push("");
        } else if (closing) {
          paragraphs.push(open.pop() ?? "");
        } else {
          open.push("");
        }
        break;
      case "w:t":
        inText = !closing && !selfClosing;
        break;
      case "w:tab":
        append("\t");
        break;
      case "w:br":
      case "w:cr":
        append("\n");
        break;
    }
  }

  return paragraphs;
}

export async function extractWordDocument(bytes: Uint8Array): Promise<TextBlock[]> {
  const zip = await openZip(bytes, "word_document");
  const documentXml = await readEntry(zip, "word/document.xml");
  if (documentXml === null) {
    throw new CorruptDocumentError("word_document", "missing word/document.xml");
  }

  return [
    {
      content: documentParagraphs(documentXml).join("\n"),
      location: { kind: "offset", base: 0 },
    },
  ];
}
