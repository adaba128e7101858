// src/compliance/classifier/delegate.ts
// Classifier delegate backed by the model router.
//
// Asks whether a context-sensitive term is part of a formal institution name
// or used descriptively. The model answers INSTITUTIONAL or DESCRIPTIVE on
// the first line; anything else is a DelegateResponseError, which the
// classifier turns into "accept".

import { composeText, type ComposeOptions } from "../../ai/modelRouter";
import { DelegateResponseError } from "../errors";
import type { ClassifierDelegate, DelegateAnswer } from "../types";

/* ============= Constants ============= */

const MAX_TOKENS = 50; // one word plus a short reason

const SYSTEM_PROMPT =
  "You review documents for restricted language. " +
  "Decide whether the quoted term is part of the formal name of an institution, " +
  "place or organization, or whether it is used descriptively. " +
  "Answer with INSTITUTIONAL or DESCRIPTIVE on the first line.";

/* ============= Response Parsing ============= */

// Leading label on the first line, after any list or emphasis markup
const LABEL_RE = /^[\s*#>"'`_-]*(INSTITUTIONAL|DESCRIPTIVE)\b/;

/**
 * Parse the delegate's answer. Only a label leading the first line counts;
 * anything else returns null.
 */
export function parseDelegateResponse(response: string): DelegateAnswer | null {
  const firstLine = response.trim().split("\n")[0].toUpperCase();
  const m = firstLine.match(LABEL_RE);
  if (!m) return null;
  return { descriptive: m[1] === "DESCRIPTIVE" };
}

export function buildDelegatePrompt(snippet: string, term: string): string {
  return `Term: "${term}"\n\nContext:\n---\n${snippet}\n---`;
}

/* ============= Delegate ============= */

export class ModelClassifierDelegate implements ClassifierDelegate {
  constructor(private readonly options: Pick<ComposeOptions, "provider" | "model"> = {}) {}

  async ask(snippet: string, term: string): Promise<DelegateAnswer> {
    const result = await composeText(buildDelegatePrompt(snippet, term), {
      ...this.options,
      systemPrompt: SYSTEM_PROMPT,
      maxTokens: MAX_TOKENS,
      temperature: 0,
    });

    const parsed = parseDelegateResponse(result.text);
    if (!parsed) {
      throw new DelegateResponseError(result.text);
    }
    return parsed;
  }
}
