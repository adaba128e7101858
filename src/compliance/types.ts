// src/compliance/types.ts
// Restricted-term scanner: shared data model
//
// Extraction yields TextBlocks, the matcher turns blocks into Matches, the
// context classifier attaches a ContextVerdict, and the aggregator wraps each
// match into a Finding.

/* ============= Formats & Locations ============= */

export const DOCUMENT_FORMATS = ["plain_text", "word_document", "pdf", "slide_deck"] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

/**
 * Where a block of text came from. Offsets inside a block are always relative
 * to the block itself, so a PDF page or a slide is its own coordinate space.
 */
export type LocationTag =
  | { kind: "offset"; base: number }
  | { kind: "page"; page: number }
  | { kind: "slide"; slide: number };

export interface TextBlock {
  content: string;
  location: LocationTag;
  /** Human-readable origin marker, e.g. "Slide 3" */
  marker?: string;
}

/* ============= Dictionary ============= */

export interface RestrictedTerm {
  /** Canonical phrase, display casing preserved */
  term: string;
  /** Suggested replacements, never empty */
  replacements: string[];
}

/* ============= Matching ============= */

export interface Match {
  /** Canonical phrase from the dictionary */
  term: string;
  /** Text as it appeared in the source */
  surfaceForm: string;
  location: LocationTag;
  /** Block-relative character offset of the match start */
  offset: number;
  /** Single-line context window around the match */
  snippet: string;
  /**
   * Approximate page for whole-document blocks only:
   * floor(offset / pageSizeChars) + 1. Never authoritative.
   */
  estimatedPage?: number;
}

export interface MatcherOptions {
  snippetBefore: number;
  snippetAfter: number;
  /** 0 disables the page estimate */
  pageSizeChars: number;
}

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  snippetBefore: 40,
  snippetAfter: 60,
  pageSizeChars: 0,
};

/* ============= Classification ============= */

export type ContextVerdict =
  | "accept"
  | "skip_allow_list_phrase"
  | "skip_named_entity"
  | "skip_classifier_judgment";

export const CONTEXT_VERDICTS: readonly ContextVerdict[] = [
  "accept",
  "skip_allow_list_phrase",
  "skip_named_entity",
  "skip_classifier_judgment",
];

export type EntityCategory = "Organization" | "GeopoliticalEntity" | "Facility" | "Other";

export interface RecognizedEntity {
  text: string;
  category: EntityCategory;
  /** Snippet-relative span */
  start: number;
  end: number;
}

/** Local, synchronous named-entity recognition over a snippet. */
export interface EntityRecognizer {
  recognize(snippet: string): RecognizedEntity[];
}

export interface DelegateAnswer {
  /** true = word used descriptively, false = part of a formal institution name */
  descriptive: boolean;
}

/** Remote yes/no judgment: is the term used descriptively or institutionally? */
export interface ClassifierDelegate {
  ask(snippet: string, term: string): Promise<DelegateAnswer>;
}

/* ============= Findings ============= */

export interface Finding {
  match: Match;
  verdict: ContextVerdict;
  suggestedReplacements: string[];
}

/** term → count over accepted findings, keys in dictionary order */
export type TermFrequencySummary = Record<string, number>;

export interface ScanResult {
  accepted: Finding[];
  skipped: Finding[];
  summary: TermFrequencySummary;
}
