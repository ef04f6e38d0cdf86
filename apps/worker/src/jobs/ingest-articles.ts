import type { Article, NewArticle } from "@newsdesk/db";

import type { WorkerContext } from "../context.js";
import { embedArticles, fillActiveNamespace } from "../lib/embed-articles.js";
import { analyzeImpact } from "../lib/impact.js";
import { workerMetrics } from "../metrics/registry.js";

/**
 * Stores the articles, embeds them, and tags them with entities and stock
 * impact when an entity extractor is configured. Runs on the write queue.
 * When any step fails the batch's articles are removed again, so a retry
 * does not store them twice.
 */
export async function ingestArticles(
  context: WorkerContext,
  batch: readonly NewArticle[]
): Promise<number[]> {
  return context.writeQueue.add(() => ingestBatch(context, batch), {
    throwOnTimeout: true
  });
}

async function ingestBatch(
  context: WorkerContext,
  batch: readonly NewArticle[]
): Promise<number[]> {
  if (batch.length === 0) {
    return [];
  }

  const created: number[] = [];
  const replaced: Article[] = [];
  const touched = new Set<number>();

  try {
    const stored: Article[] = batch.map((article) => {
      const previous =
        article.id !== undefined && !touched.has(article.id)
          ? context.articles.getArticle(article.id)
          : null;
      const id = context.articles.insertArticle(article);
      if (previous) {
        replaced.push(previous);
      } else if (!touched.has(id)) {
        created.push(id);
      }
      touched.add(id);
      return {
        id,
        title: article.title,
        content: article.content,
        date: article.date,
        source: article.source
      };
    });

    const namespace = await embedArticles(context, stored);
    const backfilled = await fillActiveNamespace(context);

    if (context.extractEntities) {
      for (const article of stored) {
        const entities = await context.extractEntities(article);
        const tags = { articleId: article.id, ...entities };
        context.articles.saveEntityTags(tags);
        context.articles.saveImpact(analyzeImpact(tags, context.lexicon.impact));
      }
    }

    workerMetrics.ingestedArticles.inc({ status: "success" }, stored.length);
    context.logger.info(
      { count: stored.length, namespace, backfilled, tagged: context.extractEntities !== null },
      "Ingested articles"
    );
    return stored.map((article) => article.id);
  } catch (error) {
    workerMetrics.ingestedArticles.inc({ status: "error" }, batch.length);
    context.logger.error({ error, count: batch.length }, "Article ingestion failed");
    rollBack(context, created, replaced);
    throw error;
  }
}

/** Removes what a failed batch created and puts replaced articles back. */
function rollBack(
  context: WorkerContext,
  created: readonly number[],
  replaced: readonly Article[]
): void {
  try {
    context.articles.deleteArticles(created);
    for (const article of replaced) {
      context.articles.upsertArticle(article);
    }
  } catch (error) {
    context.logger.error(
      { error, articleIds: created },
      "Could not roll back articles of a failed ingestion"
    );
  }
}
