export interface Article {
  id: number;
  title: string;
  content: string;
  date: string;
  source: string;
}

/** Article as handed over by ingestion; `id` is assigned on insert when absent. */
export type NewArticle = Omit<Article, "id"> & { id?: number };

export interface Story {
  storyId: number;
  representativeArticleId: number;
  memberArticleIds: number[];
}

export interface EntityTags {
  articleId: number;
  companies: string[];
  sectors: string[];
  regulators: string[];
}

export type ImpactType = "direct" | "sector" | "regulatory";

export interface ImpactedStock {
  symbol: string;
  confidence: number;
  type: ImpactType;
  company?: string;
  sector?: string;
  regulator?: string;
}

export interface ArticleImpact {
  articleId: number;
  impactedStocks: ImpactedStock[];
}

/** Fitted state of a lexical embedder, kept per vector namespace. */
export interface LexicalModel {
  dimensions: number;
  /** Terms in index order. */
  vocabulary: string[];
  idf: number[];
}
