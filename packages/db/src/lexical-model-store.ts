import { z } from "zod";

import type { SqliteDatabase } from "./client.js";
import { decodeNumberList, decodeStringList, encodeList, type DecodeResult } from "./codecs.js";
import { MalformedPersistedRecordError, withStorage } from "./errors.js";
import type { LexicalModel } from "./types.js";

const modelRowSchema = z.object({
  namespace: z.string(),
  dimensions: z.number().int().positive(),
  vocabulary: z.unknown(),
  idf: z.unknown()
});

function decodeModel(row: unknown): DecodeResult<LexicalModel> {
  const result = modelRowSchema.safeParse(row);
  if (!result.success) {
    return { ok: false, reason: result.error.issues[0]?.message ?? "invalid row" };
  }
  const vocabulary = decodeStringList(result.data.vocabulary);
  if (!vocabulary.ok) return vocabulary;
  const idf = decodeNumberList(result.data.idf);
  if (!idf.ok) return idf;

  if (vocabulary.value.length !== idf.value.length) {
    return {
      ok: false,
      reason: `${vocabulary.value.length} terms but ${idf.value.length} idf weights`
    };
  }
  if (vocabulary.value.length > result.data.dimensions) {
    return {
      ok: false,
      reason: `${vocabulary.value.length} terms exceed ${result.data.dimensions} dimensions`
    };
  }
  return {
    ok: true,
    value: {
      dimensions: result.data.dimensions,
      vocabulary: vocabulary.value,
      idf: idf.value
    }
  };
}

/**
 * Fitted lexical vocabularies, one per vector namespace, so every process
 * encodes with the vocabulary that wrote the stored vectors.
 */
export class LexicalModelStore {
  constructor(private readonly db: SqliteDatabase) {}

  load(namespace: string): LexicalModel | null {
    const row = withStorage("read lexical model", () =>
      this.db
        .prepare(
          "SELECT namespace, dimensions, vocabulary, idf FROM lexical_models WHERE namespace = ?"
        )
        .get(namespace)
    );
    if (row === undefined) {
      return null;
    }
    const decoded = decodeModel(row);
    if (!decoded.ok) {
      throw new MalformedPersistedRecordError("lexical_models", namespace, decoded.reason);
    }
    return decoded.value;
  }

  /**
   * Stores a newly fitted model. Vectors already in the namespace were
   * encoded with another vocabulary and are deleted in the same transaction.
   */
  replace(namespace: string, model: LexicalModel): void {
    withStorage("replace lexical model", () => {
      const upsert = this.db.prepare(
        `INSERT INTO lexical_models (namespace, dimensions, vocabulary, idf) VALUES (?, ?, ?, ?)
         ON CONFLICT(namespace) DO UPDATE SET
           dimensions = excluded.dimensions,
           vocabulary = excluded.vocabulary,
           idf = excluded.idf`
      );
      const clear = this.db.prepare("DELETE FROM embeddings WHERE namespace = ?");
      this.db.transaction(() => {
        upsert.run(namespace, model.dimensions, encodeList(model.vocabulary), encodeList(model.idf));
        clear.run(namespace);
      })();
    });
  }
}
