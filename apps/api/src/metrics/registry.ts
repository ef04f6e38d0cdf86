import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

const registry = new Registry();

collectDefaultMetrics({
  prefix: "newsdesk_api_",
  register: registry
});

const queryDuration = new Histogram({
  name: "newsdesk_api_query_duration_seconds",
  help: "Retrieval query duration in seconds",
  registers: [registry],
  labelNames: ["query_type"],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2]
});

const queryCounter = new Counter({
  name: "newsdesk_api_queries_total",
  help: "Total number of retrieval queries, grouped by interpreted query type",
  registers: [registry],
  labelNames: ["query_type"]
});

const queryZeroResults = new Counter({
  name: "newsdesk_api_query_zero_results_total",
  help: "Total number of queries returning zero results",
  registers: [registry],
  labelNames: ["query_type"]
});

const candidatesDropped = new Counter({
  name: "newsdesk_api_query_candidates_dropped_total",
  help: "Search candidates dropped before ranking, grouped by reason",
  registers: [registry],
  labelNames: ["reason"]
});

export const metrics = {
  registry,
  queryDuration,
  queryCounter,
  queryZeroResults,
  candidatesDropped
};
