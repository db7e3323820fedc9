/**
 * Shared metric names and buckets for Prometheus instrumentation.
 */

/** Standard label names */
export const MetricLabels = {
  METHOD: "method",
  ROUTE: "route",
  STATUS_CODE: "status_code",

  STATUS: "status",
} as const;

export const MetricNames = {
  HTTP_REQUEST_DURATION: "http_request_duration_seconds",
  HTTP_REQUESTS_TOTAL: "http_requests_total",
  HTTP_ACTIVE_CONNECTIONS: "http_active_connections",

  NOVELTY_EVALUATIONS_TOTAL: "novelty_evaluations_total",
  NOVELTY_EVALUATION_DURATION: "novelty_evaluation_duration_seconds",
} as const;

/** Histogram buckets for HTTP request duration (seconds) */
export const HTTP_DURATION_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/** An evaluation makes ~20 sequential provider calls, so buckets run long */
export const NOVELTY_DURATION_BUCKETS = [1, 5, 10, 30, 60, 120, 300, 600];
