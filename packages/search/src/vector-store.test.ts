import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  closeDatabase,
  encodeVector,
  openDatabase,
  type SqliteDatabase
} from "@newsdesk/db";

import { DimensionMismatchError } from "./errors.js";
import { VectorStore } from "./vector-store.js";

const NS = "sent-emb";

describe("VectorStore", () => {
  let db: SqliteDatabase;
  let store: VectorStore;

  beforeEach(() => {
    db = openDatabase(":memory:");
    store = new VectorStore(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it("returns the stored vector as its own top match", () => {
    const vector = [0.12, -0.4, 0.33, 0.9];
    store.put(7, vector, NS);

    const results = store.search(vector, 5, NS);

    expect(results).toHaveLength(1);
    expect(results[0]?.articleId).toBe(7);
    expect(results[0]?.score).toBeCloseTo(1.0, 5);
  });

  it("ranks by descending score and breaks ties by article id", () => {
    store.put(3, [1, 0], NS);
    store.put(1, [1, 0], NS);
    store.put(2, [0, 1], NS);
    store.put(4, [1, 1], NS);

    const results = store.search([1, 0], 3, NS);

    expect(results.map((r) => r.articleId)).toEqual([1, 3, 4]);
    expect(results[2]?.score).toBeCloseTo(Math.SQRT1_2, 5);
  });

  it("overwrites the vector for an existing (article, namespace) pair", () => {
    store.put(1, [1, 0], NS);
    store.put(1, [0, 1], NS);

    expect(store.count(NS)).toBe(1);
    expect(store.getAll(NS)).toEqual([{ articleId: 1, vector: [0, 1] }]);
  });

  it("keeps namespaces apart", () => {
    store.put(1, [1, 0], NS);
    store.put(1, [1, 0, 0], "tfidf");

    expect(store.getDimension(NS)).toBe(2);
    expect(store.getDimension("tfidf")).toBe(3);
    expect(store.getDimension("unused")).toBeNull();
  });

  it("rejects a vector whose dimension disagrees with the namespace", () => {
    store.put(1, [1, 0], NS);

    expect(() => store.put(2, [1, 0, 0], NS)).toThrow(DimensionMismatchError);
    expect(store.count(NS)).toBe(1);
  });

  it("rejects a search vector of the wrong dimension", () => {
    store.put(1, [1, 0], NS);

    expect(() => store.search([1, 0, 0], 1, NS)).toThrow(DimensionMismatchError);
  });

  it("allows re-dimensioning a namespace that only holds the replaced article", () => {
    store.put(1, [1, 0], NS);
    store.put(1, [1, 0, 0], NS);

    expect(store.getDimension(NS)).toBe(3);
  });

  it("returns finite scores for an all-zero stored vector", () => {
    store.put(1, [0, 0, 0], NS);
    store.put(2, [1, 1, 0], NS);

    const results = store.search([1, 1, 0], 2, NS);

    expect(results.map((r) => r.articleId)).toEqual([2, 1]);
    expect(results.every((r) => Number.isFinite(r.score))).toBe(true);
    expect(results[1]?.score).toBe(0);
  });

  it("returns finite scores for an all-zero query", () => {
    store.put(1, [1, 2, 3], NS);

    expect(store.search([0, 0, 0], 1, NS)).toEqual([{ articleId: 1, score: 0 }]);
  });

  it("returns nothing for an empty namespace", () => {
    expect(store.search([1, 0], 10, NS)).toEqual([]);
    expect(store.getAll(NS)).toEqual([]);
  });

  it("returns nothing for a non-positive topK", () => {
    store.put(1, [1, 0], NS);

    expect(store.search([1, 0], 0, NS)).toEqual([]);
  });

  it("sees writes made after an earlier getAll", () => {
    store.put(1, [1, 0], NS);
    expect(store.getAll(NS)).toHaveLength(1);

    store.putMany(
      [
        { articleId: 2, vector: [0, 1] },
        { articleId: 3, vector: [1, 1] }
      ],
      NS
    );

    expect(store.getAll(NS).map((v) => v.articleId)).toEqual([1, 2, 3]);
    expect(store.remove(2, NS)).toBe(true);
    expect(store.getAll(NS).map((v) => v.articleId)).toEqual([1, 3]);
  });

  it("sees writes made through another store on the same database", () => {
    const other = new VectorStore(db);
    store.put(1, [1, 0], NS);
    expect(store.getAll(NS)).toHaveLength(1);

    other.put(1, [0, 1], NS);
    other.put(2, [1, 1], NS);

    expect(store.getAll(NS)).toEqual([
      { articleId: 1, vector: [0, 1] },
      { articleId: 2, vector: [1, 1] }
    ]);
  });

  it("hands out results the caller can change without touching stored vectors", () => {
    store.put(1, [1, 0], NS);

    const first = store.getAll(NS);
    first[0]?.vector.fill(0);
    first.pop();

    expect(store.getAll(NS)).toEqual([{ articleId: 1, vector: [1, 0] }]);
  });

  it("skips embeddings whose blob does not match the declared dimension", () => {
    store.put(1, [1, 0], NS);
    db.prepare(
      "INSERT INTO embeddings (article_id, namespace, vector, dim) VALUES (?, ?, ?, ?)"
    ).run(2, NS, encodeVector([1, 0, 0]), 2);

    expect(store.getAll(NS).map((v) => v.articleId)).toEqual([1]);
  });

  it("rejects non-finite components", () => {
    expect(() => store.put(1, [1, Number.NaN], NS)).toThrow(RangeError);
    expect(() => store.put(1, [], NS)).toThrow(RangeError);
  });
});
