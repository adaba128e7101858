// src/routes/terms.ts
// GET /terms - the loaded dictionary in display order

import type { FastifyInstance } from "fastify";
import type { ScanContext } from "../compliance/engine";
import { isContextSensitive } from "../compliance/classifier";
import type { RestrictedTerm } from "../compliance/types";

export interface TermsResponse {
  terms: RestrictedTerm[];
  /** Terms eligible for the allow-list and delegate tiers */
  contextSensitive: string[];
}

export function listTerms(ctx: ScanContext): TermsResponse {
  const entries = ctx.dictionary.entries();
  return {
    terms: entries.map((e) => ({ term: e.term, replacements: [...e.replacements] })),
    contextSensitive: entries
      .filter((e) => isContextSensitive(e.term, ctx.policy))
      .map((e) => e.term),
  };
}

export function createTermRoutes(ctx: ScanContext) {
  return async function termRoutes(app: FastifyInstance) {
    app.get("/terms", async () => listTerms(ctx));
  };
}
