// src/routes/scan.ts
// Scan endpoints
//
// - POST /scan       multipart upload (field "file"); format from ?format= or the extension
// - POST /scan/text  JSON { text, review? }
//
// Both answer with a ScanResult. With review enabled, a contextual model
// review is attached under "review"; a failed review never fails the scan.

import type { FastifyInstance, FastifyReply } from "fastify";
import { reviewContext, type ContextualReview } from "../compliance/contextualReview";
import { documentText, scanDetailed, scanText, type ScanContext } from "../compliance/engine";
import { formatFromFilename, resolveFormat } from "../compliance/extractors";
import type { ScanResult } from "../compliance/types";
import { getRateLimitConfig } from "../middleware/rateLimit";

export interface ScanResponse extends ScanResult {
  review?: ContextualReview;
}

interface ScanQuery {
  format?: string;
  review?: string;
}

interface ScanTextBody {
  text: string;
  review?: boolean;
}

/* ---------- Helpers ---------- */

function isScanTextBody(body: unknown): body is ScanTextBody {
  if (!body || typeof body !== "object") return false;
  const b = body as Record<string, unknown>;
  if (typeof b.text !== "string") return false;
  return b.review === undefined || typeof b.review === "boolean";
}

function isEnabled(flag: string | undefined): boolean {
  return flag === "1" || flag === "true";
}

/**
 * Abort signal that fires when the client goes away before the response is written.
 */
function abortOnDisconnect(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on("close", () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

function termNames(ctx: ScanContext): string[] {
  return ctx.dictionary.entries().map((e) => e.term);
}

/* ---------- Route Registration ---------- */
export function createScanRoutes(ctx: ScanContext) {
  return async function scanRoutes(app: FastifyInstance) {
    /**
     * POST /scan
     */
    app.post<{ Querystring: ScanQuery }>(
      "/scan",
      getRateLimitConfig("scanDocument"),
      async (req, reply) => {
        const file = await req.file();
        if (!file) {
          return reply.code(400).send({ error: "file_required", message: 'No file uploaded (field "file")' });
        }

        const bytes = await file.toBuffer();
        const format = req.query.format ? resolveFormat(req.query.format) : formatFromFilename(file.filename);

        const { result, blocks } = await scanDetailed(ctx, bytes, format, {
          signal: abortOnDisconnect(reply),
        });

        const response: ScanResponse = { ...result };
        if (isEnabled(req.query.review)) {
          response.review = await reviewContext(documentText(blocks), termNames(ctx));
        }
        return response;
      }
    );

    /**
     * POST /scan/text
     */
    app.post("/scan/text", getRateLimitConfig("scanText"), async (req, reply) => {
      const body = req.body;
      if (!isScanTextBody(body) || !body.text.trim()) {
        return reply.code(400).send({ error: "text_required", message: "Body must include non-empty 'text'" });
      }

      const result = await scanText(ctx, body.text, { signal: abortOnDisconnect(reply) });

      const response: ScanResponse = { ...result };
      if (body.review) {
        response.review = await reviewContext(body.text, termNames(ctx));
      }
      return response;
    });
  };
}
