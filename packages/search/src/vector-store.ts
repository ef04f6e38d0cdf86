import { z } from "zod";

import {
  decodeVector,
  encodeVector,
  withStorage,
  type SqliteDatabase
} from "@newsdesk/db";
import { createLogger } from "@newsdesk/logger";

import { DimensionMismatchError } from "./errors.js";
import type { ScoredArticle, StoredVector } from "./types.js";
import { cosineSimilarity } from "./vectors.js";

const logger = createLogger({ name: "vector-store" });

const embeddingRowSchema = z.object({
  article_id: z.number().int(),
  vector: z.unknown(),
  dim: z.unknown()
});

const dimRowSchema = z.object({ dim: z.number().int() });

function assertUsableVector(vector: ArrayLike<number>): void {
  if (vector.length === 0) {
    throw new RangeError("Cannot store or search with an empty vector");
  }
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) {
      throw new RangeError(`Vector component ${i} is not a finite number`);
    }
  }
}

/**
 * Durable (article_id, namespace) → vector map over the `embeddings` table,
 * with brute-force cosine search. Reads always go to the database, since
 * other processes and stores write the same table.
 */
export class VectorStore {
  constructor(private readonly db: SqliteDatabase) {}

  put(articleId: number, vector: ArrayLike<number>, namespace: string): void {
    this.putMany([{ articleId, vector }], namespace);
  }

  /** Writes a batch in one transaction; every vector must share the namespace's dimension. */
  putMany(
    entries: ReadonlyArray<{ articleId: number; vector: ArrayLike<number> }>,
    namespace: string
  ): void {
    const first = entries[0];
    if (!first) {
      return;
    }

    for (const entry of entries) {
      assertUsableVector(entry.vector);
      if (entry.vector.length !== first.vector.length) {
        throw new DimensionMismatchError(namespace, first.vector.length, entry.vector.length);
      }
    }

    const dim = first.vector.length;
    const replacing = new Set(entries.map((entry) => entry.articleId));
    const established = this.findEstablishedDimension(namespace, replacing);
    if (established !== null && established !== dim) {
      throw new DimensionMismatchError(namespace, established, dim);
    }

    withStorage("write embeddings", () => {
      const upsert = this.db.prepare(
        `INSERT INTO embeddings (article_id, namespace, vector, dim) VALUES (?, ?, ?, ?)
         ON CONFLICT(article_id, namespace) DO UPDATE SET
           vector = excluded.vector,
           dim = excluded.dim`
      );
      this.db.transaction(() => {
        for (const entry of entries) {
          upsert.run(entry.articleId, namespace, encodeVector(entry.vector), dim);
        }
      })();
    });

    logger.debug({ namespace, count: entries.length, dim }, "Stored embeddings");
  }

  remove(articleId: number, namespace: string): boolean {
    const result = withStorage("delete embedding", () =>
      this.db
        .prepare("DELETE FROM embeddings WHERE article_id = ? AND namespace = ?")
        .run(articleId, namespace)
    );
    return result.changes > 0;
  }

  /** The dimension the namespace is fixed to, or null while it is empty. */
  getDimension(namespace: string): number | null {
    return this.findEstablishedDimension(namespace, new Set());
  }

  count(namespace: string): number {
    const row = withStorage("count embeddings", () =>
      this.db
        .prepare("SELECT COUNT(*) AS count FROM embeddings WHERE namespace = ?")
        .get(namespace)
    );
    return z.object({ count: z.number() }).parse(row).count;
  }

  getAll(namespace: string): StoredVector[] {
    const rows = withStorage("load embeddings", () =>
      this.db
        .prepare(
          "SELECT article_id, vector, dim FROM embeddings WHERE namespace = ? ORDER BY article_id"
        )
        .all(namespace)
    );

    const vectors: StoredVector[] = [];
    let dimension: number | null = null;

    for (const row of rows) {
      const parsed = embeddingRowSchema.safeParse(row);
      if (!parsed.success) {
        logger.warn({ namespace }, "Skipping malformed embedding row");
        continue;
      }
      const decoded = decodeVector(parsed.data.vector, parsed.data.dim);
      if (!decoded.ok) {
        logger.warn(
          { namespace, articleId: parsed.data.article_id, reason: decoded.reason },
          "Skipping malformed embedding"
        );
        continue;
      }
      if (dimension === null) {
        dimension = decoded.value.length;
      } else if (decoded.value.length !== dimension) {
        throw new DimensionMismatchError(namespace, dimension, decoded.value.length);
      }
      vectors.push({ articleId: parsed.data.article_id, vector: decoded.value });
    }

    return vectors;
  }

  /**
   * Top `topK` articles by cosine similarity to `query`, highest first.
   * Equal scores are ordered by ascending article id.
   */
  search(query: ArrayLike<number>, topK: number, namespace: string): ScoredArticle[] {
    assertUsableVector(query);
    if (topK <= 0) {
      return [];
    }

    const stored = this.getAll(namespace);
    const first = stored[0];
    if (!first) {
      return [];
    }
    if (first.vector.length !== query.length) {
      throw new DimensionMismatchError(namespace, first.vector.length, query.length);
    }

    const scored = stored.map(({ articleId, vector }) => ({
      articleId,
      score: cosineSimilarity(query, vector)
    }));
    scored.sort((a, b) => b.score - a.score || a.articleId - b.articleId);
    return scored.slice(0, topK);
  }

  private findEstablishedDimension(namespace: string, excluding: ReadonlySet<number>): number | null {
    const ids = [...excluding];
    const exclusion =
      ids.length > 0 ? ` AND article_id NOT IN (${ids.map(() => "?").join(", ")})` : "";
    const row = withStorage("read namespace dimension", () =>
      this.db
        .prepare(`SELECT dim FROM embeddings WHERE namespace = ?${exclusion} LIMIT 1`)
        .get(namespace, ...ids)
    );
    if (row === undefined) {
      return null;
    }
    const parsed = dimRowSchema.safeParse(row);
    return parsed.success ? parsed.data.dim : null;
  }
}
