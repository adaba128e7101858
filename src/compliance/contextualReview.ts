// src/compliance/contextualReview.ts
// Contextual review: asks the model to flag paraphrased or implied references
// to the restricted themes, which literal matching cannot catch.
//
// Opt-in per request. Never throws; failures come back as { status: "error" },
// and so does a missing model (the dev stub only echoes its prompt).

import { composeText, isModelConfigured } from "../ai/modelRouter";
import { withTimeout } from "../ai/withTimeout";
import { createLogger } from "../observability";

const log = createLogger("compliance/contextualReview");

/* ============= Constants ============= */

const REVIEW_TIMEOUT_MS = 20_000;
const MAX_DOCUMENT_CHARS = 6_000;
const MAX_TOKENS = 800;

const SYSTEM_PROMPT =
  "You are a compliance checker. Flag explicit terms as well as paraphrased or " +
  "implied references (for example \"inclusive policies\" instead of \"inclusion\"). " +
  "Give a short reason for each issue and return a bullet list of all flagged issues.";

export type ContextualReview =
  | { status: "completed"; provider: string; model: string; text: string; truncated: boolean }
  | { status: "error"; message: string };

/* ============= Document Truncation ============= */

export function truncateForReview(text: string): { text: string; truncated: boolean } {
  if (text.length <= MAX_DOCUMENT_CHARS) return { text, truncated: false };
  return { text: text.slice(0, MAX_DOCUMENT_CHARS) + "\n\n...[truncated]", truncated: true };
}

export function buildReviewPrompt(text: string, terms: readonly string[]): string {
  return (
    `Restricted themes: ${terms.join(", ")}\n\n` +
    `Review the following text and flag any language that directly or indirectly relates to these themes.\n\n` +
    `Text:\n---\n${text}\n---`
  );
}

/* ============= Review ============= */

export async function reviewContext(
  text: string,
  terms: readonly string[],
  timeoutMs: number = REVIEW_TIMEOUT_MS
): Promise<ContextualReview> {
  if (!text.trim()) {
    return { status: "error", message: "Cannot perform contextual review: document is empty" };
  }

  if (!isModelConfigured()) {
    return { status: "error", message: "Contextual review unavailable: no model configured" };
  }

  const { text: body, truncated } = truncateForReview(text);

  try {
    const result = await withTimeout(
      composeText(buildReviewPrompt(body, terms), {
        systemPrompt: SYSTEM_PROMPT,
        maxTokens: MAX_TOKENS,
        temperature: 0,
      }),
      timeoutMs,
      `Contextual review timed out after ${timeoutMs / 1000}s`
    );
    return {
      status: "completed",
      provider: result.provider,
      model: result.model,
      text: result.text,
      truncated,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn({ err: message }, "contextual review failed");
    return { status: "error", message: `Contextual review error: ${message}` };
  }
}
