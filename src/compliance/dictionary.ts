// src/compliance/dictionary.ts
// Term dictionary: ordered canonical term → suggested replacements.
//
// Lookup is case-insensitive; the canonical casing is what gets reported.
// Instances are immutable once built.

import type { RestrictedTerm } from "./types";
import { InvalidLexiconError } from "./errors";

export function termKey(term: string): string {
  return term.normalize("NFC").trim().toLowerCase();
}

export class TermDictionary {
  private readonly ordered: readonly RestrictedTerm[];
  private readonly byKey: ReadonlyMap<string, RestrictedTerm>;

  private constructor(entries: RestrictedTerm[]) {
    const byKey = new Map<string, RestrictedTerm>();
    const ordered: RestrictedTerm[] = [];

    for (const raw of entries) {
      const term = raw.term.trim();
      if (!term) {
        throw new InvalidLexiconError("term must be a non-empty string");
      }
      const replacements = raw.replacements.map((r) => r.trim()).filter((r) => r.length > 0);
      if (replacements.length === 0) {
        throw new InvalidLexiconError(`term '${term}' needs at least one replacement`);
      }
      const key = termKey(term);
      if (byKey.has(key)) {
        throw new InvalidLexiconError(`duplicate term '${term}'`);
      }
      const entry: RestrictedTerm = Object.freeze({ term, replacements });
      byKey.set(key, entry);
      ordered.push(entry);
    }

    this.ordered = Object.freeze(ordered);
    this.byKey = byKey;
  }

  static fromEntries(entries: RestrictedTerm[]): TermDictionary {
    return new TermDictionary(entries);
  }

  /** Convenience for tests and ad-hoc scans: { term: [replacements] } */
  static fromRecord(record: Record<string, string[]>): TermDictionary {
    return new TermDictionary(
      Object.entries(record).map(([term, replacements]) => ({ term, replacements }))
    );
  }

  get size(): number {
    return this.ordered.length;
  }

  /** Entries in display (insertion) order */
  entries(): readonly RestrictedTerm[] {
    return this.ordered;
  }

  get(term: string): RestrictedTerm | undefined {
    return this.byKey.get(termKey(term));
  }

  has(term: string): boolean {
    return this.byKey.has(termKey(term));
  }

  replacementsFor(term: string): string[] {
    const entry = this.get(term);
    return entry ? [...entry.replacements] : [];
  }
}
