// src/compliance/extractors/slideDeck.ts
// PPTX → one block per slide.
//
// Slide order comes from ppt/presentation.xml (sldIdLst) resolved through
// ppt/_rels/presentation.xml.rels; decks without those parts fall back to
// the numeric order of ppt/slides/slideN.xml. Each block holds the text of
// every paragraph of every shape on the slide, one paragraph per line.

import type JSZip from "jszip";
import { CorruptDocumentError } from "../errors";
import type { TextBlock } from "../types";
import { openZip, partNumber, readEntry, xmlDecode } from "./ooxml";

const SLIDE_PART_RE = /^ppt\/slides\/slide\d+\.xml$/;
const SLIDE_ID_RE = /<p:sldId\b[^>]*?\br:id="([^"]+)"/g;
const RELATIONSHIP_RE = /<Relationship\b([^>]*?)\/?>/g;

// DrawingML paragraph; <a:pPr> is excluded by requiring whitespace or '>'
const PARAGRAPH_RE = /<a:p(?:\s[^>]*)?>([\s\S]*?)<\/a:p>/g;
const RUN_CONTENT_RE = /<a:t(?:\s[^>]*)?>([\s\S]*?)<\/a:t>|<a:br(?:\s[^>]*)?\/>/g;

function attribute(attrs: string, name: string): string | undefined {
  const m = attrs.match(new RegExp(`\\b${name}="([^"]*)"`));
  return m?.[1];
}

/** "slides/slide1.xml" relative to ppt/, or an absolute "/ppt/..." target */
function resolveTarget(target: string): string {
  return target.startsWith("/") ? target.slice(1) : `ppt/${target.replace(/^\.\//, "")}`;
}

/**
 * Slide part names in presentation order, or null when the presentation
 * part or its relationships are missing.
 */
async function slidesFromPresentation(zip: JSZip): Promise<string[] | null> {
  const presentation = await readEntry(zip, "ppt/presentation.xml");
  const rels = await readEntry(zip, "ppt/_rels/presentation.xml.rels");
  if (presentation === null || rels === null) return null;

  const targets = new Map<string, string>();
  for (const m of rels.matchAll(RELATIONSHIP_RE)) {
    const id = attribute(m[1], "Id");
    const target = attribute(m[1], "Target");
    if (id && target) targets.set(id, resolveTarget(target));
  }

  const ordered: string[] = [];
  for (const m of presentation.matchAll(SLIDE_ID_RE)) {
    const part = targets.get(m[1]);
    if (part && zip.file(part)) ordered.push(part);
  }
  return ordered;
}

function slidesByPartNumber(zip: JSZip): string[] {
  return zip
    .file(SLIDE_PART_RE)
    .map((f) => f.name)
    .sort((a, b) => partNumber(a) - partNumber(b));
}

/**
 * Non-empty paragraph texts of one slide part, in document order.
 */
export function slideParagraphs(slideXml: string): string[] {
  const paragraphs: string[] = [];
  for (const p of slideXml.matchAll(PARAGRAPH_RE)) {
    let text = "";
    for (const r of p[1].matchAll(RUN_CONTENT_RE)) {
      text += r[1] !== undefined ? xmlDecode(r[1]) : "\n";
    }
    if (text.trim()) paragraphs.push(text);
  }
  return paragraphs;
}

export async function extractSlideDeck(bytes: Uint8Array): Promise<TextBlock[]> {
  const zip = await openZip(bytes, "slide_deck");

  const fromPresentation = await slidesFromPresentation(zip);
  const parts =
    fromPresentation && fromPresentation.length > 0 ? fromPresentation : slidesByPartNumber(zip);

  if (parts.length === 0 && fromPresentation === null) {
    throw new CorruptDocumentError("slide_deck", "no presentation part or slides found");
  }

  const blocks: TextBlock[] = [];
  for (const [i, part] of parts.entries()) {
    const xml = (await readEntry(zip, part)) ?? "";
    const slide = i + 1;
    blocks.push({
      content: slideParagraphs(xml).join("\n"),
      location: { kind: "slide", slide },
      marker: `Slide ${slide}`,
    });
  }
  return blocks;
}
