import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ArticleStore,
  closeDatabase,
  openDatabase,
  type SqliteDatabase
} from "@newsdesk/db";
import { createEntityLexicon, QueryInterpreter, VectorStore } from "@newsdesk/search";
import type { EmbeddingProvider } from "@newsdesk/worker";

import { InvalidQueryError } from "./schemas.js";
import { RetrievalCoordinator } from "./service.js";

class FixedQueryEmbedder implements EmbeddingProvider {
  readonly name = "fixed";
  readonly namespace = "fixed";

  constructor(private readonly vectors: Record<string, number[]>) {}

  getDimensions(): number {
    return 2;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.vectors[text] ?? [1, 0]);
  }
}

const lexicon = createEntityLexicon({
  companies: { "HDFC Bank": "Banking", "ICICI Bank": "Banking" },
  regulators: ["RBI"]
});

let db: SqliteDatabase;
let articles: ArticleStore;
let vectors: VectorStore;

function createCoordinator() {
  return new RetrievalCoordinator({
    articles,
    vectors,
    embedder: new FixedQueryEmbedder({
      "monsoon farm": [0, 1],
      "RBI policy": [0.6, 0.8]
    }),
    interpreter: new QueryInterpreter(lexicon),
    themeScoreThreshold: 0.5
  });
}

function seed() {
  const rows = [
    { title: "HDFC Bank raises deposit rates", vector: [1, 0] },
    { title: "ICICI Bank expands branches", vector: [0.8, 0.6] },
    { title: "RBI holds repo rate", vector: [0.6, 0.8] },
    { title: "Monsoon lifts farm output", vector: [0, 1] }
  ];
  for (const row of rows) {
    const id = articles.insertArticle({
      title: row.title,
      content: "",
      date: "2024-02-01",
      source: "wire"
    });
    vectors.put(id, row.vector, "fixed");
  }
  articles.saveEntityTags({
    articleId: 1,
    companies: ["HDFC Bank"],
    sectors: ["Banking"],
    regulators: []
  });
  articles.saveEntityTags({
    articleId: 2,
    companies: ["ICICI Bank"],
    sectors: ["Banking"],
    regulators: []
  });
  articles.saveEntityTags({ articleId: 3, companies: [], sectors: [], regulators: ["RBI"] });
}

beforeEach(() => {
  db = openDatabase(":memory:");
  articles = new ArticleStore(db);
  vectors = new VectorStore(db);
});

afterEach(() => {
  closeDatabase(db);
});

describe("RetrievalCoordinator.query", () => {
  it("keeps company and same-sector candidates for a company query", async () => {
    seed();

    const result = await createCoordinator().query("HDFC Bank outlook", 10);

    expect(result.interpretation).toEqual({
      queryType: "company",
      companies: ["HDFC Bank"],
      sectors: ["Banking"],
      regulators: []
    });
    expect(result.results.map((item) => item.article.id)).toEqual([1, 2]);
    expect(result.results.map((item) => item.explanation)).toEqual([
      "Matched companies: HDFC Bank; sectors: Banking",
      "Matched sectors: Banking"
    ]);
    expect(result.results[0]?.score).toBeCloseTo(1, 6);
  });

  it("keeps only regulator matches for a regulator query", async () => {
    seed();

    const result = await createCoordinator().query("RBI policy", 10);

    expect(result.interpretation.queryType).toBe("regulator");
    expect(result.results).toHaveLength(1);
    expect(result.results[0]?.article.title).toBe("RBI holds repo rate");
    expect(result.results[0]?.explanation).toBe("Matched regulators: RBI");
  });

  it("keeps theme candidates scoring above the threshold", async () => {
    seed();

    const result = await createCoordinator().query("monsoon farm", 10);

    expect(result.interpretation.queryType).toBe("theme");
    expect(result.results.map((item) => item.article.id)).toEqual([4, 3, 2]);
    expect(result.results.map((item) => item.explanation)).toEqual([
      "Semantically similar to the query (score 1.000)",
      "Semantically similar to the query (score 0.800)",
      "Semantically similar to the query (score 0.600)"
    ]);
  });

  it("returns an empty result when nothing passes the filter", async () => {
    seed();

    const result = await createCoordinator().query("RBI", 1);

    expect(result).toEqual({
      interpretation: { queryType: "regulator", companies: [], sectors: [], regulators: ["RBI"] },
      results: []
    });
  });

  it("drops candidates whose article is missing", async () => {
    seed();
    vectors.put(99, [0, 1], "fixed");

    const result = await createCoordinator().query("monsoon farm", 10);

    expect(result.results.map((item) => item.article.id)).toEqual([4, 3, 2]);
  });

  it("answers against an empty store", async () => {
    const result = await createCoordinator().query("HDFC Bank outlook", 10);

    expect(result.results).toEqual([]);
  });

  it("rejects empty text and out-of-range k", async () => {
    const coordinator = createCoordinator();

    await expect(coordinator.query("   ", 5)).rejects.toBeInstanceOf(InvalidQueryError);
    await expect(coordinator.query("markets", 0)).rejects.toBeInstanceOf(InvalidQueryError);
    await expect(coordinator.query("markets", 101)).rejects.toThrow(
      /^Invalid query: k: /
    );
  });
});

describe("RetrievalCoordinator.searchSemantic", () => {
  it("returns the raw nearest neighbours", async () => {
    seed();

    const ranked = await createCoordinator().searchSemantic("anything", 2);

    expect(ranked.map((candidate) => candidate.articleId)).toEqual([1, 2]);
  });
});
