// src/compliance/classifier/tiers.ts
// Context classifier: the local tiers and the single place the tier order lives.
//
//   1. allow-list phrase   (context-sensitive terms only)
//   2. named entity        (every term)
//   3. delegate judgment   (context-sensitive terms only; performed by the caller)
//
// Everything here is pure. The delegate call is the classifier's only side
// effect and happens in ./index when this module answers "ask_delegate".

import { termKey } from "../dictionary";
import type { ContextPolicy } from "../lexicon";
import type { ContextVerdict, EntityCategory, RecognizedEntity } from "../types";

export type TierDecision =
  | { kind: "verdict"; verdict: ContextVerdict }
  | { kind: "ask_delegate" };

/** Entity categories that mark a term as part of a proper name */
export const NAME_CATEGORIES: ReadonlySet<EntityCategory> = new Set([
  "Organization",
  "GeopoliticalEntity",
  "Facility",
]);

export function isContextSensitive(term: string, policy: ContextPolicy): boolean {
  return policy.has(termKey(term));
}

/**
 * First allow-listed collocation found in the lower-cased snippet, if any.
 */
export function matchAllowList(
  snippet: string,
  term: string,
  policy: ContextPolicy
): string | undefined {
  const phrases = policy.get(termKey(term));
  if (!phrases || phrases.length === 0) return undefined;
  const haystack = snippet.toLowerCase();
  return phrases.find((phrase) => haystack.includes(phrase));
}

/**
 * First recognized name that contains the term, if any.
 */
export function findNamingEntity(
  entities: readonly RecognizedEntity[],
  term: string
): RecognizedEntity | undefined {
  const needle = termKey(term);
  return entities.find(
    (e) => NAME_CATEGORIES.has(e.category) && e.text.toLowerCase().includes(needle)
  );
}

/**
 * Tier 1 and tier 2. `entities` is only invoked when tier 1 did not decide.
 */
export function applyLocalTiers(
  snippet: string,
  term: string,
  policy: ContextPolicy,
  entities: () => readonly RecognizedEntity[]
): TierDecision {
  const sensitive = isContextSensitive(term, policy);

  if (sensitive && matchAllowList(snippet, term, policy) !== undefined) {
    return { kind: "verdict", verdict: "skip_allow_list_phrase" };
  }

  if (findNamingEntity(entities(), term)) {
    return { kind: "verdict", verdict: "skip_named_entity" };
  }

  return sensitive ? { kind: "ask_delegate" } : { kind: "verdict", verdict: "accept" };
}
