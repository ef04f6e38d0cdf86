export { VectorStore } from "./vector-store.js";
export { cosineSimilarity, dot, norm } from "./vectors.js";
export { DimensionMismatchError } from "./errors.js";
export {
  createEntityLexicon,
  loadLexicon,
  parseLexicon,
  type EntityLexicon,
  type ImpactLexicon,
  type Lexicon
} from "./lexicon.js";
export { QueryInterpreter } from "./query/interpreter.js";
export {
  matchEntities,
  passesStructuredFilter,
  explainMatch,
  NO_ENTITIES,
  type CandidateEntities,
  type EntityMatch
} from "./query/filter.js";
export type { StoredVector, ScoredArticle, QueryIntent, QueryType } from "./types.js";
