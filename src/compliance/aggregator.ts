// src/compliance/aggregator.ts
// Finding aggregator: classifies every match once and partitions the results.
//
// Accepted and skipped findings keep the relative order of their matches.
// With concurrency > 1 classifications overlap, but results are written back
// by index so the output order does not depend on completion order.

import type { ClassifyFn } from "./classifier";
import type { TermDictionary } from "./dictionary";
import { ScanAbortedError } from "./errors";
import type { Finding, Match, TermFrequencySummary } from "./types";

export interface AggregateOptions {
  /** Parallel classifier calls; 1 = strictly sequential */
  concurrency?: number;
  /** Checked before each classification */
  signal?: AbortSignal;
}

export interface AggregateResult {
  accepted: Finding[];
  skipped: Finding[];
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight; results
 * come back in input order.
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

export async function aggregate(
  matches: readonly Match[],
  classify: ClassifyFn,
  dictionary: TermDictionary,
  options: AggregateOptions = {}
): Promise<AggregateResult> {
  const findings = await mapInOrder(matches, options.concurrency ?? 1, async (match) => {
    if (options.signal?.aborted) throw new ScanAbortedError();
    const verdict = await classify(match.snippet, match.term);
    const finding: Finding = Object.freeze({
      match,
      verdict,
      suggestedReplacements: dictionary.replacementsFor(match.term),
    });
    return finding;
  });

  return {
    accepted: findings.filter((f) => f.verdict === "accept"),
    skipped: findings.filter((f) => f.verdict !== "accept"),
  };
}

/**
 * Count of accepted findings per term, keys in dictionary order, zero counts omitted.
 */
export function summarize(
  accepted: readonly Finding[],
  dictionary: TermDictionary
): TermFrequencySummary {
  const counts = new Map<string, number>();
  for (const finding of accepted) {
    counts.set(finding.match.term, (counts.get(finding.match.term) ?? 0) + 1);
  }

  const summary: TermFrequencySummary = {};
  for (const { term } of dictionary.entries()) {
    const count = counts.get(term);
    if (count) summary[term] = count;
  }
  return summary;
}
