// src/compliance/engine.ts
// Restricted-term scanner: engine orchestrator
//
// Main entry point for scanning a document. Everything a scan needs that
// outlives it (dictionary, allow-lists, recognizer, delegate) sits in a
// ScanContext built once at startup and passed in explicitly.

import { config as appConfig, type AppConfig } from "../config";
import { isModelConfigured } from "../ai/modelRouter";
import { createLogger, recordFindings, recordScan, type ScanOutcome } from "../observability";
import { aggregate, summarize } from "./aggregator";
import {
  createClassifier,
  loadGazetteer,
  ModelClassifierDelegate,
  WinkEntityRecognizer,
  type ClassifyFn,
} from "./classifier";
import type { TermDictionary } from "./dictionary";
import { ScanAbortedError, ScanError } from "./errors";
import { extract, isDocumentFormat } from "./extractors";
import { loadLexicon, type ContextPolicy, type Lexicon } from "./lexicon";
import { findMatches } from "./matcher";
import {
  CONTEXT_VERDICTS,
  DEFAULT_MATCHER_OPTIONS,
  type ClassifierDelegate,
  type EntityRecognizer,
  type Match,
  type MatcherOptions,
  type ScanResult,
  type TextBlock,
} from "./types";

const log = createLogger("compliance/engine");

/* ============= Scan Context ============= */

export interface ScanContext {
  readonly dictionary: TermDictionary;
  readonly policy: ContextPolicy;
  readonly matcher: MatcherOptions;
  readonly concurrency: number;
  /** True when tier 3 has a delegate to ask */
  readonly delegateAvailable: boolean;
  readonly classify: ClassifyFn;
}

export interface ScanContextOptions {
  lexicon: Lexicon;
  recognizer: EntityRecognizer;
  delegate?: ClassifierDelegate | null;
  matcher?: Partial<MatcherOptions>;
  timeoutMs?: number;
  concurrency?: number;
}

const DEFAULT_TIMEOUT_MS = 5_000;

export function createScanContext(options: ScanContextOptions): ScanContext {
  const { lexicon, recognizer } = options;
  const delegate = options.delegate ?? null;

  return Object.freeze({
    dictionary: lexicon.dictionary,
    policy: lexicon.policy,
    matcher: { ...DEFAULT_MATCHER_OPTIONS, ...options.matcher },
    concurrency: Math.max(1, options.concurrency ?? 1),
    delegateAvailable: delegate !== null,
    classify: createClassifier({
      policy: lexicon.policy,
      recognizer,
      delegate,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    }),
  });
}

/**
 * Build the process-wide context from configuration files. Throws
 * InvalidLexiconError when the term configuration is malformed.
 */
export function loadScanContext(cfg: AppConfig = appConfig): ScanContext {
  const lexicon = loadLexicon(cfg.lexicon.path);
  const recognizer = new WinkEntityRecognizer(loadGazetteer(cfg.lexicon.gazetteerPath));
  const delegate = isModelConfigured(cfg.ai.provider)
    ? new ModelClassifierDelegate({ provider: cfg.ai.provider })
    : null;

  log.info(
    {
      terms: lexicon.dictionary.size,
      contextSensitive: lexicon.policy.size,
      delegate: delegate ? cfg.ai.provider : "none",
    },
    "scan context loaded"
  );

  return createScanContext({
    lexicon,
    recognizer,
    delegate,
    matcher: cfg.matcher,
    timeoutMs: cfg.classifier.timeoutMs,
    concurrency: cfg.classifier.concurrency,
  });
}

/* ============= Engine Orchestrator ============= */

export interface ScanOptions {
  /** Cancels the scan between blocks and between classifications */
  signal?: AbortSignal;
}

function outcomeOf(err: unknown): ScanOutcome {
  if (!(err instanceof ScanError)) return "error";
  switch (err.code) {
    case "unsupported_format":
    case "corrupt_document":
    case "encoding_error":
      return err.code;
    case "scan_aborted":
      return "aborted";
    default:
      return "error";
  }
}

function countByVerdict(result: ScanResult): Record<string, number> {
  const counts: Record<string, number> = Object.fromEntries(CONTEXT_VERDICTS.map((v) => [v, 0]));
  for (const f of [...result.accepted, ...result.skipped]) counts[f.verdict]++;
  return counts;
}

export interface DetailedScan {
  result: ScanResult;
  /** Extracted blocks, in document order */
  blocks: TextBlock[];
}

/** Block contents joined for whole-document consumers such as contextual review */
export function documentText(blocks: readonly TextBlock[]): string {
  return blocks.map((b) => b.content).join("\n\n");
}

/**
 * Scan a document and keep the extracted blocks.
 *
 * Flow:
 * 1. Extract ordered text blocks for the declared format (all-or-nothing)
 * 2. Match every dictionary term in each block, block order first
 * 3. Classify each match and partition into accepted / skipped
 * 4. Summarize accepted findings per term
 */
export async function scanDetailed(
  ctx: ScanContext,
  bytes: Uint8Array,
  format: string,
  options: ScanOptions = {}
): Promise<DetailedScan> {
  const { signal } = options;
  const started = performance.now();
  // metric label; a rejected format string is caller input
  const formatLabel = isDocumentFormat(format) ? format : "unknown";

  try {
    const blocks = await extract(bytes, format);

    const matches: Match[] = [];
    for (const block of blocks) {
      if (signal?.aborted) throw new ScanAbortedError();
      matches.push(...findMatches(block, ctx.dictionary, ctx.matcher));
    }

    const { accepted, skipped } = await aggregate(matches, ctx.classify, ctx.dictionary, {
      concurrency: ctx.concurrency,
      signal,
    });
    const result: ScanResult = { accepted, skipped, summary: summarize(accepted, ctx.dictionary) };

    const seconds = (performance.now() - started) / 1000;
    recordScan(formatLabel, "ok", seconds);
    recordFindings(countByVerdict(result));
    log.info(
      { format, blocks: blocks.length, matches: matches.length, accepted: accepted.length, skipped: skipped.length },
      "scan complete"
    );
    return { result, blocks };
  } catch (err) {
    const outcome = outcomeOf(err);
    recordScan(formatLabel, outcome, (performance.now() - started) / 1000);
    if (outcome === "error") {
      log.error({ format, err }, "scan failed");
    } else {
      log.info({ format, outcome }, "scan rejected");
    }
    throw err;
  }
}

export async function scan(
  ctx: ScanContext,
  bytes: Uint8Array,
  format: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const { result } = await scanDetailed(ctx, bytes, format, options);
  return result;
}

/**
 * Scan pasted text as a plain-text document.
 */
export async function scanText(
  ctx: ScanContext,
  text: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  return scan(ctx, new TextEncoder().encode(text), "plain_text", options);
}
