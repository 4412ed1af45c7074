import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { SemanticStatus } from "../modules/search/types.js";

const LATENCY_METRICS = ["request", "retrieval", "provider"] as const;

type LatencyMetric = (typeof LATENCY_METRICS)[number];

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

export interface SearchSample {
  latencyMs: number;
  resultCount: number;
  semantic: SemanticStatus;
}

interface SearchCounters {
  total: number;
  empty: number;
  hybrid: number;
  semantic_degraded: number;
}

const emptySummary = (): LatencySummary => ({ count: 0, totalMs: 0, minMs: Number.POSITIVE_INFINITY, maxMs: 0 });

const emptyCounters = (): SearchCounters => ({ total: 0, empty: 0, hybrid: 0, semantic_degraded: 0 });

const latencies: Record<LatencyMetric, LatencySummary> = {
  request: emptySummary(),
  retrieval: emptySummary(),
  provider: emptySummary()
};
let searches = emptyCounters();
let errorRates = new Map<string, number>();

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const observe = (metric: LatencyMetric, durationMs: number): void => {
  const duration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  const summary = latencies[metric];
  summary.count += 1;
  summary.totalMs += duration;
  summary.minMs = Math.min(summary.minMs, duration);
  summary.maxMs = Math.max(summary.maxMs, duration);
};

const round2 = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const summarize = ({ count, totalMs, minMs, maxMs }: LatencySummary) =>
  count === 0
    ? { count: 0, avgMs: 0, minMs: 0, maxMs: 0 }
    : { count, avgMs: round2(totalMs / count), minMs: round2(minMs), maxMs: round2(maxMs) };

export const recordRequestLatency = (durationMs: number): void => observe("request", durationMs);

export const recordProviderLatency = (durationMs: number): void => observe("provider", durationMs);

export const recordSearch = (sample: SearchSample): void => {
  observe("retrieval", sample.latencyMs);
  searches.total += 1;
  if (sample.resultCount === 0) {
    searches.empty += 1;
  }
  if (sample.semantic === "used") {
    searches.hybrid += 1;
  } else if (sample.semantic === "unavailable") {
    searches.semantic_degraded += 1;
  }
};

export const recordErrorRate = (key: string): void => {
  errorRates.set(key, (errorRates.get(key) ?? 0) + 1);
};

export const getMetricsSnapshot = () => ({
  request_latency: summarize(latencies.request),
  retrieval_latency: summarize(latencies.retrieval),
  provider_latency: summarize(latencies.provider),
  searches: { ...searches },
  error_rates: Object.fromEntries(errorRates)
});

export const resetMetrics = (): void => {
  for (const metric of LATENCY_METRICS) {
    latencies[metric] = emptySummary();
  }
  searches = emptyCounters();
  errorRates = new Map();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    recordRequestLatency(Date.now() - (requestStartTimes.get(request) ?? Date.now()));
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
