// src/observability/metrics.ts
// Prometheus metrics (prom-client), exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "compliance_scanner";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "compliance-scanner",
});

if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/* ---------- Scan Metrics ---------- */

export const scansTotal = new Counter({
  name: `${METRICS_PREFIX}_scans_total`,
  help: "Document scans by declared format and outcome",
  labelNames: ["format", "outcome"] as const,
  registers: [registry],
});

export const scanDuration = new Histogram({
  name: `${METRICS_PREFIX}_scan_duration_seconds`,
  help: "End-to-end scan duration in seconds",
  labelNames: ["format"] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const findingsTotal = new Counter({
  name: `${METRICS_PREFIX}_findings_total`,
  help: "Findings produced, by context verdict",
  labelNames: ["verdict"] as const,
  registers: [registry],
});

export const delegateCallsTotal = new Counter({
  name: `${METRICS_PREFIX}_classifier_delegate_calls_total`,
  help: "Context classifier delegate calls by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

/* ---------- Helpers ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number
): void {
  if (!METRICS_ENABLED) return;
  httpRequestsTotal.inc({ method, route, status_code: String(statusCode) });
  httpRequestDuration.observe({ method, route }, durationSeconds);
}

export type ScanOutcome = "ok" | "unsupported_format" | "corrupt_document" | "encoding_error" | "aborted" | "error";

export function recordScan(format: string, outcome: ScanOutcome, durationSeconds: number): void {
  if (!METRICS_ENABLED) return;
  scansTotal.inc({ format, outcome });
  scanDuration.observe({ format }, durationSeconds);
}

export function recordFindings(countsByVerdict: Record<string, number>): void {
  if (!METRICS_ENABLED) return;
  for (const [verdict, count] of Object.entries(countsByVerdict)) {
    if (count > 0) findingsTotal.inc({ verdict }, count);
  }
}

export type DelegateOutcome = "institutional" | "descriptive" | "failed" | "unavailable";

export function recordDelegateCall(outcome: DelegateOutcome): void {
  if (!METRICS_ENABLED) return;
  delegateCallsTotal.inc({ outcome });
}
