import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";

const registry = new Registry();

collectDefaultMetrics({
  prefix: "newsdesk_worker_",
  register: registry
});

const ingestedArticles = new Counter({
  name: "newsdesk_ingested_articles_total",
  help: "Number of articles ingested, grouped by status",
  registers: [registry],
  labelNames: ["status"]
});

const dedupDuration = new Histogram({
  name: "newsdesk_dedup_duration_seconds",
  help: "Duration of deduplication runs in seconds",
  registers: [registry],
  labelNames: ["status"]
});

const dedupStories = new Gauge({
  name: "newsdesk_dedup_stories",
  help: "Number of stories produced by the last deduplication run",
  registers: [registry]
});

const embeddingRequests = new Counter({
  name: "newsdesk_embedding_requests_total",
  help: "Number of embedding requests",
  registers: [registry],
  labelNames: ["provider", "status"]
});

const embeddingDuration = new Histogram({
  name: "newsdesk_embedding_duration_seconds",
  help: "Duration of embedding computation in seconds",
  registers: [registry],
  labelNames: ["provider"]
});

const embeddingRetries = new Counter({
  name: "newsdesk_embedding_retries_total",
  help: "Number of embedding request retries",
  registers: [registry],
  labelNames: ["provider"]
});

const embeddingFallbacks = new Counter({
  name: "newsdesk_embedding_fallbacks_total",
  help: "Number of times the pretrained backend was replaced by the lexical fallback",
  registers: [registry],
  labelNames: ["reason"]
});

const embeddingRecoveries = new Counter({
  name: "newsdesk_embedding_recoveries_total",
  help: "Number of times the pretrained backend took over again from the lexical fallback",
  registers: [registry]
});

const embeddingBackfilled = new Counter({
  name: "newsdesk_embedding_backfilled_total",
  help: "Number of articles re-embedded to fill the active namespace",
  registers: [registry],
  labelNames: ["namespace"]
});

const embeddingCircuitBreakerState = new Gauge({
  name: "newsdesk_embedding_circuit_breaker_state",
  help: "Circuit breaker state (0=closed, 1=half-open, 2=open)",
  registers: [registry],
  labelNames: ["provider"]
});

export const workerMetrics = {
  registry,
  ingestedArticles,
  dedupDuration,
  dedupStories,
  embeddingRequests,
  embeddingDuration,
  embeddingRetries,
  embeddingFallbacks,
  embeddingRecoveries,
  embeddingBackfilled,
  embeddingCircuitBreakerState
};
