// src/observability/index.ts
// Central export point for logging, request correlation and metrics.

/* ---------- Logger ---------- */
export { createLogger } from "./logger";

/* ---------- Request logging ---------- */
export {
  registerRequestLogger,
  getRequestLogger,
  requestIdGenerator,
  REQUEST_ID_HEADER,
} from "./requestLogger";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordScan,
  recordFindings,
  recordDelegateCall,
  type ScanOutcome,
} from "./metrics";
