import type { Story } from "@newsdesk/db";

import type { WorkerContext } from "../context.js";
import { backfillEmbeddings } from "../lib/embed-articles.js";
import { workerMetrics } from "../metrics/registry.js";

/**
 * Re-partitions every stored article into stories and replaces the previous
 * run's stories. Queued behind pending ingestion so it clusters a
 * consistent snapshot.
 */
export async function deduplicateStories(context: WorkerContext): Promise<Story[]> {
  return context.writeQueue.add(() => runDeduplication(context), {
    throwOnTimeout: true
  });
}

async function runDeduplication(context: WorkerContext): Promise<Story[]> {
  const timer = workerMetrics.dedupDuration.startTimer();

  try {
    const articles = context.articles.listArticles();
    const backfilled = await backfillEmbeddings(context, articles);

    const namespace = context.embedder.namespace;
    const vectors = new Map(
      context.vectors.getAll(namespace).map((stored) => [stored.articleId, stored.vector])
    );
    const stories = context.clusterer.deduplicate(
      articles.map((article) => ({
        id: article.id,
        title: article.title,
        content: article.content,
        vector: vectors.get(article.id) ?? null
      }))
    );

    context.articles.replaceStories(stories);

    timer({ status: "success" });
    workerMetrics.dedupStories.set(stories.length);
    context.logger.info(
      {
        articles: articles.length,
        stories: stories.length,
        backfilled,
        namespace,
        threshold: context.clusterer.getThreshold()
      },
      "Deduplication run completed"
    );
    return stories;
  } catch (error) {
    timer({ status: "error" });
    context.logger.error({ error }, "Deduplication run failed");
    throw error;
  }
}

export function startDeduplicationScheduler(context: WorkerContext): { stop: () => void } {
  if (!context.config.clustering.enabled) {
    context.logger.info("Clustering disabled, not starting deduplication scheduler");
    return { stop: () => {} };
  }

  let isRunning = false;
  const intervalMs = context.config.clustering.intervalMs;

  const execute = async () => {
    if (isRunning) {
      context.logger.debug("Deduplication already running, skipping tick");
      return;
    }

    isRunning = true;
    try {
      await deduplicateStories(context);
    } catch (error) {
      context.logger.error({ error }, "Deduplication tick failed");
    } finally {
      isRunning = false;
    }
  };

  void execute();
  const timer = setInterval(() => {
    void execute();
  }, intervalMs);

  context.logger.info({ intervalMs }, "Deduplication scheduler started");

  return {
    stop: () => {
      clearInterval(timer);
    }
  };
}
