import type { Article, ArticleStore } from "@newsdesk/db";
import { createLogger, type Logger } from "@newsdesk/logger";
import {
  explainMatch,
  matchEntities,
  NO_ENTITIES,
  passesStructuredFilter,
  type EntityMatch,
  type QueryIntent,
  type QueryInterpreter,
  type ScoredArticle,
  type VectorStore
} from "@newsdesk/search";
import type { EmbeddingProvider } from "@newsdesk/worker";

import { metrics } from "../../metrics/registry.js";
import { parseQueryInput } from "./schemas.js";

export interface QueryResultItem {
  article: Article;
  score: number;
  explanation: string;
  matched: EntityMatch;
}

export interface QueryResult {
  interpretation: QueryIntent;
  results: QueryResultItem[];
}

export interface RetrievalDeps {
  articles: ArticleStore;
  vectors: VectorStore;
  embedder: EmbeddingProvider;
  interpreter: QueryInterpreter;
  themeScoreThreshold: number;
  /** Fills gaps in the active namespace before it is searched. */
  ensureEmbeddings?: () => Promise<unknown>;
  logger?: Logger;
}

/**
 * Query pipeline: interpret → embed → vector search → entity filter →
 * rank → explain. An empty result is a normal outcome; storage and
 * embedding failures propagate.
 */
export class RetrievalCoordinator {
  private readonly logger: Logger;

  constructor(private readonly deps: RetrievalDeps) {
    this.logger = deps.logger ?? createLogger({ name: "retrieval" });
  }

  /** Raw nearest neighbours of the query text in the active namespace. */
  async searchSemantic(text: string, k: number): Promise<ScoredArticle[]> {
    const input = parseQueryInput({ text, k });
    return this.nearest(input.text, input.k);
  }

  async query(text: string, k: number): Promise<QueryResult> {
    const input = parseQueryInput({ text, k });
    const interpretation = this.deps.interpreter.interpret(input.text);
    const stopTimer = metrics.queryDuration.startTimer({
      query_type: interpretation.queryType
    });

    try {
      const candidates = await this.nearest(input.text, input.k);
      const results: QueryResultItem[] = [];

      for (const candidate of candidates) {
        const article = this.deps.articles.getArticle(candidate.articleId);
        if (!article) {
          metrics.candidatesDropped.inc({ reason: "missing_article" });
          this.logger.warn(
            { articleId: candidate.articleId },
            "Search candidate has no stored article, dropping it"
          );
          continue;
        }

        const tags = this.deps.articles.getEntityTags(candidate.articleId) ?? NO_ENTITIES;
        const matched = matchEntities(interpretation, tags);
        if (
          !passesStructuredFilter(
            interpretation,
            matched,
            candidate.score,
            this.deps.themeScoreThreshold
          )
        ) {
          continue;
        }

        results.push({
          article,
          score: candidate.score,
          explanation: explainMatch(matched, candidate.score),
          matched
        });
      }

      results.sort((a, b) => b.score - a.score || a.article.id - b.article.id);

      metrics.queryCounter.inc({ query_type: interpretation.queryType });
      if (results.length === 0) {
        metrics.queryZeroResults.inc({ query_type: interpretation.queryType });
      }
      this.logger.debug(
        {
          queryType: interpretation.queryType,
          candidates: candidates.length,
          results: results.length
        },
        "Query answered"
      );
      return { interpretation, results };
    } finally {
      stopTimer();
    }
  }

  private async nearest(text: string, k: number): Promise<ScoredArticle[]> {
    const { embedder } = this.deps;
    let [vector] = await embedder.embed([text]);
    let namespace = embedder.namespace;

    if (this.deps.ensureEmbeddings) {
      await this.deps.ensureEmbeddings();
      // Filling can move the embedder to another strategy.
      if (embedder.namespace !== namespace) {
        [vector] = await embedder.embed([text]);
        namespace = embedder.namespace;
      }
    }

    if (!vector) {
      return [];
    }
    return this.deps.vectors.search(vector, k, namespace);
  }
}
