// src/compliance/classifier/index.ts
// Context classifier: snippet + term → ContextVerdict.
//
// The local tiers decide first (./tiers). Only a context-sensitive term that
// survives them reaches the delegate. Both the recognizer and the delegate
// fail open: a recognizer error counts as "no entities" and a delegate error,
// timeout or absence counts as "accept".

import { withTimeout } from "../../ai/withTimeout";
import { createLogger, recordDelegateCall } from "../../observability";
import type { ContextPolicy } from "../lexicon";
import type {
  ClassifierDelegate,
  ContextVerdict,
  EntityRecognizer,
  RecognizedEntity,
} from "../types";
import { applyLocalTiers } from "./tiers";

const log = createLogger("compliance/classifier");

export type ClassifyFn = (snippet: string, term: string) => Promise<ContextVerdict>;

export interface ClassifierDeps {
  policy: ContextPolicy;
  recognizer: EntityRecognizer;
  /** null = no delegate configured; tier 3 then accepts */
  delegate: ClassifierDelegate | null;
  timeoutMs: number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function safeRecognize(recognizer: EntityRecognizer, snippet: string): RecognizedEntity[] {
  try {
    return recognizer.recognize(snippet);
  } catch (err) {
    log.warn({ err: describe(err) }, "entity recognizer failed; treating snippet as having no entities");
    return [];
  }
}

async function askDelegate(
  deps: ClassifierDeps,
  snippet: string,
  term: string
): Promise<ContextVerdict> {
  if (!deps.delegate) {
    recordDelegateCall("unavailable");
    return "accept";
  }

  try {
    const answer = await withTimeout(
      deps.delegate.ask(snippet, term),
      deps.timeoutMs,
      `Classifier delegate timed out after ${deps.timeoutMs}ms`
    );
    recordDelegateCall(answer.descriptive ? "descriptive" : "institutional");
    return answer.descriptive ? "accept" : "skip_classifier_judgment";
  } catch (err) {
    recordDelegateCall("failed");
    log.warn({ term, err: describe(err) }, "classifier delegate failed; accepting match");
    return "accept";
  }
}

/**
 * Classify one match. Never throws for recognizer or delegate failures.
 */
export async function classify(
  snippet: string,
  term: string,
  deps: ClassifierDeps
): Promise<ContextVerdict> {
  const decision = applyLocalTiers(snippet, term, deps.policy, () =>
    safeRecognize(deps.recognizer, snippet)
  );
  if (decision.kind === "verdict") return decision.verdict;
  return askDelegate(deps, snippet, term);
}

export function createClassifier(deps: ClassifierDeps): ClassifyFn {
  return (snippet, term) => classify(snippet, term, deps);
}

export { applyLocalTiers, isContextSensitive, matchAllowList, findNamingEntity } from "./tiers";
export type { TierDecision } from "./tiers";
export { ModelClassifierDelegate, parseDelegateResponse } from "./delegate";
export { WinkEntityRecognizer, loadGazetteer, parseGazetteer, type Gazetteer } from "./entityRecognizer";
