export interface StoredVector {
  articleId: number;
  vector: number[];
}

export interface ScoredArticle {
  articleId: number;
  score: number;
}

export type QueryType = "company" | "sector" | "regulator" | "theme";

export interface QueryIntent {
  queryType: QueryType;
  companies: string[];
  sectors: string[];
  regulators: string[];
}
