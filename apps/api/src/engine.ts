import { closeDatabase, type NewArticle, type Story } from "@newsdesk/db";
import { QueryInterpreter, type ScoredArticle } from "@newsdesk/search";
import {
  createWorkerContext,
  deduplicateStories,
  ensureEmbeddings,
  ingestArticles,
  type WorkerContext,
  type WorkerContextOptions
} from "@newsdesk/worker";

import { getArticleDetail, type ArticleDetail } from "./modules/articles/service.js";
import { RetrievalCoordinator, type QueryResult } from "./modules/search/service.js";

/**
 * Boundary operations the engine offers its host. Writes are serialized on
 * the context's write queue; reads go straight to storage.
 */
export class NewsEngine {
  private readonly retrieval: RetrievalCoordinator;
  private closed = false;

  constructor(readonly context: WorkerContext) {
    this.retrieval = new RetrievalCoordinator({
      articles: context.articles,
      vectors: context.vectors,
      embedder: context.embedder,
      interpreter: new QueryInterpreter(context.lexicon.entities),
      themeScoreThreshold: context.config.retrieval.themeScoreThreshold,
      ensureEmbeddings: () => ensureEmbeddings(context),
      logger: context.logger.child({ component: "retrieval" })
    });
  }

  async ingest(article: NewArticle): Promise<number> {
    const [id] = await ingestArticles(this.context, [article]);
    if (id === undefined) {
      throw new Error("Ingestion returned no article id");
    }
    return id;
  }

  ingestMany(articles: readonly NewArticle[]): Promise<number[]> {
    return ingestArticles(this.context, articles);
  }

  deduplicateAll(): Promise<Story[]> {
    return deduplicateStories(this.context);
  }

  query(text: string, k = this.context.config.retrieval.searchK): Promise<QueryResult> {
    return this.retrieval.query(text, k);
  }

  searchSemantic(
    text: string,
    k = this.context.config.retrieval.searchK
  ): Promise<ScoredArticle[]> {
    return this.retrieval.searchSemantic(text, k);
  }

  getArticle(id: number): ArticleDetail | null {
    return getArticleDetail(this.context.articles, id);
  }

  listStories(): Story[] {
    return this.context.articles.listStories();
  }

  /** Waits for queued writes, then closes the database. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.context.writeQueue.onIdle();
    closeDatabase(this.context.db);
  }
}

export function createNewsEngine(options: WorkerContextOptions = {}): NewsEngine {
  return new NewsEngine(createWorkerContext(options));
}
