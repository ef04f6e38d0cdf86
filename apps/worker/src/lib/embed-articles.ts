import type { Article, ArticleStore } from "@newsdesk/db";
import type { VectorStore } from "@newsdesk/search";

import { articleText } from "../context.js";
import { workerMetrics } from "../metrics/registry.js";
import type { EmbeddingProvider } from "./embeddings/provider.js";

const MAX_BACKFILL_PASSES = 3;

export interface EmbedArticlesDeps {
  embedder: EmbeddingProvider;
  vectors: VectorStore;
}

/**
 * Embeds the articles and stores the vectors under the namespace of the
 * strategy that actually produced them. Returns that namespace.
 */
export async function embedArticles(
  deps: EmbedArticlesDeps,
  articles: readonly Article[]
): Promise<string> {
  const vectors = await deps.embedder.embed(articles.map(articleText));
  const namespace = deps.embedder.namespace;

  if (vectors.length !== articles.length) {
    throw new Error(
      `Embedding provider "${deps.embedder.name}" returned ${vectors.length} vectors for ${articles.length} articles`
    );
  }

  deps.vectors.putMany(
    articles.flatMap((article, index) => {
      const vector = vectors[index];
      return vector ? [{ articleId: article.id, vector }] : [];
    }),
    namespace
  );
  return namespace;
}

/**
 * Makes sure every article has a vector in the active namespace. Embedding
 * can switch the active strategy or refit the lexical vocabulary, which
 * empties the namespace, so the gaps are recomputed after every pass.
 */
export async function backfillEmbeddings(
  deps: EmbedArticlesDeps,
  articles: readonly Article[]
): Promise<number> {
  let embedded = 0;

  for (let pass = 0; pass < MAX_BACKFILL_PASSES; pass++) {
    const present = new Set(
      deps.vectors.getAll(deps.embedder.namespace).map((stored) => stored.articleId)
    );
    const missing = articles.filter((article) => !present.has(article.id));
    if (missing.length === 0) {
      break;
    }

    const namespace = await embedArticles(deps, missing);
    workerMetrics.embeddingBackfilled.inc({ namespace }, missing.length);
    embedded += missing.length;
  }

  return embedded;
}

/** Backfills the active namespace when it holds fewer vectors than there are articles. */
export async function fillActiveNamespace(
  deps: EmbedArticlesDeps & { articles: ArticleStore }
): Promise<number> {
  if (!hasGaps(deps)) {
    return 0;
  }
  return backfillEmbeddings(deps, deps.articles.listArticles());
}

export function hasGaps(deps: EmbedArticlesDeps & { articles: ArticleStore }): boolean {
  return deps.vectors.count(deps.embedder.namespace) < deps.articles.countArticles();
}
