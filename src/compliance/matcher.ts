// src/compliance/matcher.ts
// Restricted-term matcher
//
// Pure function - no side effects, no network.
// Every dictionary term is scanned independently, so overlapping terms
// ("gender" inside "gender mainstreaming") are each reported.

import type { TermDictionary } from "./dictionary";
import {
  DEFAULT_MATCHER_OPTIONS,
  type Match,
  type MatcherOptions,
  type TextBlock,
} from "./types";

/* ============= Patterns ============= */

// A match may not touch a letter or digit on either side
const WORD_CHAR = "[\\p{L}\\p{N}]";

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * Case-insensitive, word-bounded pattern for a term. Words of a multi-word
 * phrase keep their authored order; any whitespace run may separate them.
 */
export function buildTermPattern(term: string): RegExp {
  const words = term.trim().split(/\s+/).map(escapeRegExp);
  return new RegExp(`(?<!${WORD_CHAR})${words.join("\\s+")}(?!${WORD_CHAR})`, "giu");
}

// Compiled once per dictionary instance
const patternCache = new WeakMap<TermDictionary, RegExp[]>();

function patternsFor(dictionary: TermDictionary): RegExp[] {
  let patterns = patternCache.get(dictionary);
  if (!patterns) {
    patterns = dictionary.entries().map((e) => buildTermPattern(e.term));
    patternCache.set(dictionary, patterns);
  }
  return patterns;
}

/* ============= Snippets ============= */

/**
 * Context window around [start, end), flattened to one display line.
 */
export function buildSnippet(
  content: string,
  start: number,
  end: number,
  before: number,
  after: number
): string {
  const from = Math.max(0, start - Math.max(0, before));
  const to = Math.min(content.length, end + Math.max(0, after));
  return content.slice(from, to).replace(/[\r\n]+/g, " ");
}

/**
 * Approximate page of an offset in whole-document text. Display only.
 */
export function estimatePage(offset: number, pageSizeChars: number): number {
  return Math.floor(offset / pageSizeChars) + 1;
}

/* ============= Matcher ============= */

/**
 * Every match of every term in one block, ordered by offset (ties keep
 * dictionary order).
 */
export function findMatches(
  block: TextBlock,
  dictionary: TermDictionary,
  options: MatcherOptions = DEFAULT_MATCHER_OPTIONS
): Match[] {
  const { content, location } = block;
  if (!content) return [];

  const patterns = patternsFor(dictionary);
  const withPageEstimate = location.kind === "offset" && options.pageSizeChars > 0;
  const matches: Match[] = [];

  dictionary.entries().forEach((entry, i) => {
    for (const m of content.matchAll(patterns[i])) {
      const offset = m.index ?? 0;
      const surfaceForm = m[0];
      const match: Match = {
        term: entry.term,
        surfaceForm,
        location,
        offset,
        snippet: buildSnippet(
          content,
          offset,
          offset + surfaceForm.length,
          options.snippetBefore,
          options.snippetAfter
        ),
      };
      if (withPageEstimate) {
        match.estimatedPage = estimatePage(offset, options.pageSizeChars);
      }
      matches.push(match);
    }
  });

  // Array.prototype.sort is stable, so equal offsets stay in dictionary order
  return matches.sort((a, b) => a.offset - b.offset);
}

/**
 * Matches across a whole document, block order first.
 */
export function findAllMatches(
  blocks: readonly TextBlock[],
  dictionary: TermDictionary,
  options: MatcherOptions = DEFAULT_MATCHER_OPTIONS
): Match[] {
  return blocks.flatMap((block) => findMatches(block, dictionary, options));
}
