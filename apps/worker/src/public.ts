export {
  articleText,
  createWorkerContext,
  type ExtractEntities,
  type WorkerContext,
  type WorkerContextOptions
} from "./context.js";
export { ensureEmbeddings } from "./jobs/ensure-embeddings.js";
export { ingestArticles } from "./jobs/ingest-articles.js";
export { deduplicateStories, startDeduplicationScheduler } from "./jobs/deduplicate-stories.js";
export { analyzeImpact } from "./lib/impact.js";
export {
  embedArticles,
  backfillEmbeddings,
  fillActiveNamespace
} from "./lib/embed-articles.js";
export {
  buildSimilarityMatrix,
  chooseSimilarityMethod,
  connectedComponents,
  deduplicate,
  groupStories,
  selectRepresentative,
  SimilarityClusterer,
  type ClusterItem
} from "./lib/search/clustering.js";
export { textOverlapSimilarity } from "./lib/search/similarity.js";
export * from "./lib/embeddings/index.js";
export { workerMetrics } from "./metrics/registry.js";
