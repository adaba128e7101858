// src/compliance/lexicon.ts
// Loads config/lexicon.json: the term dictionary plus the allow-lists of
// context-sensitive terms.
//
// File shape:
//   {
//     "terms": [{ "term": "diversity", "replacements": ["variety"] }, ...],
//     "contextSensitive": { "national": ["national university", ...] }
//   }

import { readFileSync } from "node:fs";
import { TermDictionary, termKey } from "./dictionary";
import { InvalidLexiconError } from "./errors";
import type { RestrictedTerm } from "./types";

/**
 * Context-sensitive terms (lower-cased key) mapped to their lower-cased
 * institutional collocations. A term may have an empty allow-list, in which
 * case only the delegate tier can excuse it.
 */
export type ContextPolicy = ReadonlyMap<string, readonly string[]>;

export interface Lexicon {
  dictionary: TermDictionary;
  policy: ContextPolicy;
}

/* ============= Validation ============= */

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRestrictedTerm(value: unknown): value is RestrictedTerm {
  if (!value || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.term === "string" && isStringArray(v.replacements);
}

function isAllowListRecord(value: unknown): value is Record<string, string[]> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every(isStringArray);
}

/* ============= Parsing ============= */

export function buildContextPolicy(
  dictionary: TermDictionary,
  allowLists: Record<string, string[]>
): ContextPolicy {
  const policy = new Map<string, readonly string[]>();
  for (const [term, phrases] of Object.entries(allowLists)) {
    if (!dictionary.has(term)) {
      throw new InvalidLexiconError(`context-sensitive term '${term}' is not in the dictionary`);
    }
    const normalized = phrases.map((p) => p.trim().toLowerCase()).filter((p) => p.length > 0);
    policy.set(termKey(term), Object.freeze(normalized));
  }
  return policy;
}

/**
 * Validate an already-parsed lexicon document.
 */
export function parseLexicon(raw: unknown): Lexicon {
  if (!raw || typeof raw !== "object") {
    throw new InvalidLexiconError("expected a JSON object");
  }
  const doc = raw as Record<string, unknown>;

  if (!Array.isArray(doc.terms) || doc.terms.length === 0) {
    throw new InvalidLexiconError("'terms' must be a non-empty array");
  }
  const terms: RestrictedTerm[] = [];
  for (const [i, entry] of doc.terms.entries()) {
    if (!isRestrictedTerm(entry)) {
      throw new InvalidLexiconError(`terms[${i}] needs a 'term' string and a 'replacements' string array`);
    }
    terms.push(entry);
  }
  const dictionary = TermDictionary.fromEntries(terms);

  const contextSensitive = doc.contextSensitive ?? {};
  if (!isAllowListRecord(contextSensitive)) {
    throw new InvalidLexiconError("'contextSensitive' must map terms to string arrays");
  }

  return { dictionary, policy: buildContextPolicy(dictionary, contextSensitive) };
}

export function loadLexicon(filePath: string): Lexicon {
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch (err) {
    throw new InvalidLexiconError(
      `cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidLexiconError(
      `${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseLexicon(raw);
}
