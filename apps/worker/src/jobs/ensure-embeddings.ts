import type { WorkerContext } from "../context.js";
import { fillActiveNamespace, hasGaps } from "../lib/embed-articles.js";

/**
 * Fills the active namespace before a search reads it. Queued behind
 * pending writes, and skipped without queueing when nothing is missing.
 */
export async function ensureEmbeddings(context: WorkerContext): Promise<number> {
  if (!hasGaps(context)) {
    return 0;
  }

  const embedded = await context.writeQueue.add(() => fillActiveNamespace(context), {
    throwOnTimeout: true
  });
  if (embedded > 0) {
    context.logger.info(
      { embedded, namespace: context.embedder.namespace },
      "Filled active embedding namespace before search"
    );
  }
  return embedded;
}
