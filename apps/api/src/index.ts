export { createNewsEngine, NewsEngine } from "./engine.js";
export {
  RetrievalCoordinator,
  type QueryResult,
  type QueryResultItem,
  type RetrievalDeps
} from "./modules/search/service.js";
export {
  InvalidQueryError,
  MAX_SEARCH_K,
  parseQueryInput,
  queryInputSchema,
  type QueryInput
} from "./modules/search/schemas.js";
export { getArticleDetail, findStoryOf, type ArticleDetail } from "./modules/articles/service.js";
export { metrics as apiMetrics } from "./metrics/registry.js";
