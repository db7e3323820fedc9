import {
  HTTP_DURATION_BUCKETS,
  MetricLabels,
  MetricNames,
  NOVELTY_DURATION_BUCKETS,
} from "@pitchcheck/shared";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from "prom-client";

/** Global registry for API metrics */
export const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: registry });

export const httpRequestDuration = new Histogram({
  name: MetricNames.HTTP_REQUEST_DURATION,
  help: "Duration of HTTP requests in seconds",
  labelNames: [MetricLabels.METHOD, MetricLabels.ROUTE, MetricLabels.STATUS_CODE],
  buckets: HTTP_DURATION_BUCKETS,
  registers: [registry],
});

export const httpRequestsTotal = new Counter({
  name: MetricNames.HTTP_REQUESTS_TOTAL,
  help: "Total number of HTTP requests",
  labelNames: [MetricLabels.METHOD, MetricLabels.ROUTE, MetricLabels.STATUS_CODE],
  registers: [registry],
});

export const httpActiveConnections = new Gauge({
  name: MetricNames.HTTP_ACTIVE_CONNECTIONS,
  help: "Number of active HTTP connections",
  registers: [registry],
});

/** Novelty evaluations by outcome (status = ok | error) */
export const noveltyEvaluationsTotal = new Counter({
  name: MetricNames.NOVELTY_EVALUATIONS_TOTAL,
  help: "Total number of novelty evaluations",
  labelNames: [MetricLabels.STATUS],
  registers: [registry],
});

export const noveltyEvaluationDuration = new Histogram({
  name: MetricNames.NOVELTY_EVALUATION_DURATION,
  help: "Duration of novelty evaluations in seconds",
  labelNames: [MetricLabels.STATUS],
  buckets: NOVELTY_DURATION_BUCKETS,
  registers: [registry],
});

export function recordNoveltyEvaluation(status: "ok" | "error", durationSec: number): void {
  const labels = { [MetricLabels.STATUS]: status };
  noveltyEvaluationsTotal.inc(labels);
  noveltyEvaluationDuration.observe(labels, durationSec);
}

const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

function normalizeRoute(url: string): string {
  return url.split("?")[0] ?? url;
}

export function registerMetricsHooks(fastify: FastifyInstance): void {
  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    httpActiveConnections.inc();
    requestStartTimes.set(request, process.hrtime.bigint());
  });

  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    httpActiveConnections.dec();

    const startTime = requestStartTimes.get(request);
    if (startTime === undefined) return;
    requestStartTimes.delete(request);

    const durationSec = Number(process.hrtime.bigint() - startTime) / 1e9;
    const labels = {
      [MetricLabels.METHOD]: request.method,
      [MetricLabels.ROUTE]: normalizeRoute(request.url),
      [MetricLabels.STATUS_CODE]: String(reply.statusCode),
    };

    httpRequestDuration.observe(labels, durationSec);
    httpRequestsTotal.inc(labels);
  });
}

/**
 * Get metrics in Prometheus text format.
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getMetricsContentType(): string {
  return registry.contentType;
}
