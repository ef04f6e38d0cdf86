import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadConfig } from "@newsdesk/config";
import { ArticleStore, LexicalModelStore, openDatabase } from "@newsdesk/db";
import { parseLexicon } from "@newsdesk/search";
import {
  articleText,
  EmbedderUnavailableError,
  LexicalEmbeddingProvider,
  ResilientEmbeddingProvider,
  type EmbeddingProvider
} from "@newsdesk/worker";

import { createNewsEngine, type NewsEngine } from "./engine.js";
import { InvalidQueryError } from "./modules/search/schemas.js";

const lexicon = parseLexicon({
  companies: { "HDFC Bank": "Banking" },
  regulators: ["RBI"],
  impact: {
    symbols: { "HDFC Bank": "HDFCBANK" },
    sectorStocks: { Banking: ["HDFCBANK", "ICICIBANK"] },
    regulatedSymbols: ["HDFCBANK"]
  }
});

class KeywordEmbedder implements EmbeddingProvider {
  readonly name = "keyword";
  readonly namespace = "keyword";

  getDimensions(): number {
    return 2;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => (text.includes("HDFC") ? [1, 0] : [0, 1]));
  }
}

class SwitchableKeywordEmbedder extends KeywordEmbedder {
  down = false;

  override async embed(texts: readonly string[]): Promise<number[][]> {
    if (this.down) {
      throw new EmbedderUnavailableError("backend down");
    }
    return super.embed(texts);
  }
}

const engines: NewsEngine[] = [];
const directories: string[] = [];

function createTestEngine() {
  const engine = createNewsEngine({
    config: loadConfig({ env: { NODE_ENV: "test" } }),
    db: openDatabase(":memory:"),
    lexicon,
    embedder: new KeywordEmbedder(),
    extractEntities: (article) =>
      article.title.includes("HDFC Bank")
        ? { companies: ["HDFC Bank"], sectors: ["Banking"], regulators: [] }
        : { companies: [], sectors: [], regulators: [] }
  });
  engines.push(engine);
  return engine;
}

afterEach(async () => {
  await Promise.all(engines.splice(0).map((engine) => engine.close()));
  for (const directory of directories.splice(0)) {
    rmSync(directory, { recursive: true, force: true });
  }
});

function createFileEngine(path: string) {
  const engine = createNewsEngine({
    config: loadConfig({ env: { NODE_ENV: "test" } }),
    db: openDatabase(path),
    lexicon
  });
  engines.push(engine);
  return engine;
}

describe("NewsEngine", () => {
  it("ingests, deduplicates and answers queries end to end", async () => {
    const engine = createTestEngine();

    const first = await engine.ingest({
      title: "HDFC Bank profit rises",
      content: "",
      date: "2024-03-01",
      source: "wire"
    });
    const rest = await engine.ingestMany([
      { title: "HDFC Bank profit increases", content: "", date: "2024-03-01", source: "desk" },
      { title: "Oil prices fall", content: "", date: "2024-03-02", source: "wire" }
    ]);
    const stories = await engine.deduplicateAll();
    const answer = await engine.query("HDFC Bank results");

    expect([first, ...rest]).toEqual([1, 2, 3]);
    expect(stories).toEqual([
      { storyId: 0, representativeArticleId: 2, memberArticleIds: [1, 2] },
      { storyId: 1, representativeArticleId: 3, memberArticleIds: [3] }
    ]);
    expect(engine.listStories()).toEqual(stories);
    expect(answer.interpretation.queryType).toBe("company");
    expect(answer.results.map((item) => item.article.id)).toEqual([1, 2]);
  });

  it("returns the article with its tags, impact and story", async () => {
    const engine = createTestEngine();
    await engine.ingestMany([
      { title: "HDFC Bank profit rises", content: "", date: "2024-03-01", source: "wire" },
      { title: "HDFC Bank profit increases", content: "", date: "2024-03-01", source: "desk" }
    ]);
    await engine.deduplicateAll();

    expect(engine.getArticle(2)).toEqual({
      article: {
        id: 2,
        title: "HDFC Bank profit increases",
        content: "",
        date: "2024-03-01",
        source: "desk"
      },
      entityTags: { articleId: 2, companies: ["HDFC Bank"], sectors: ["Banking"], regulators: [] },
      impact: {
        articleId: 2,
        impactedStocks: [
          { symbol: "HDFCBANK", confidence: 1, type: "direct", company: "HDFC Bank" },
          { symbol: "ICICIBANK", confidence: 0.7, type: "sector", sector: "Banking" }
        ]
      },
      story: { storyId: 0, representativeArticleId: 2, memberArticleIds: [1, 2] }
    });
    expect(engine.getArticle(42)).toBeNull();
  });

  it("ranks raw semantic neighbours", async () => {
    const engine = createTestEngine();
    await engine.ingestMany([
      { title: "Oil prices fall", content: "", date: "2024-03-02", source: "wire" },
      { title: "HDFC Bank profit rises", content: "", date: "2024-03-01", source: "wire" }
    ]);

    const ranked = await engine.searchSemantic("HDFC Bank", 1);

    expect(ranked.map((candidate) => candidate.articleId)).toEqual([2]);
    expect(ranked[0]?.score).toBeCloseTo(1, 6);
  });

  it("validates query input", async () => {
    const engine = createTestEngine();

    await expect(engine.query("", 3)).rejects.toBeInstanceOf(InvalidQueryError);
  });

  it("can be closed more than once", async () => {
    const engine = createTestEngine();

    await engine.close();
    await expect(engine.close()).resolves.toBeUndefined();
  });

  it("encodes with the stored lexical vocabulary after a restart", async () => {
    const directory = mkdtempSync(join(tmpdir(), "newsdesk-"));
    directories.push(directory);
    const path = join(directory, "news.db");

    const writer = createFileEngine(path);
    await writer.ingestMany([
      { title: "zebra crossing", content: "", date: "2024-03-01", source: "wire" },
      { title: "apple banana", content: "", date: "2024-03-01", source: "wire" }
    ]);
    await writer.ingest({
      title: "apple banana cherry durian",
      content: "",
      date: "2024-03-02",
      source: "desk"
    });
    await writer.close();

    const reader = createFileEngine(path);
    const ranked = await reader.searchSemantic("zebra crossing", 3);

    expect(ranked.map((candidate) => candidate.articleId)).toEqual([1, 2, 3]);
    expect(ranked[0]?.score).toBeCloseTo(1, 6);
    expect(ranked[1]?.score).toBe(0);
    expect(ranked[2]?.score).toBe(0);
  });

  it("answers from the fallback when the backend fails after ingestion", async () => {
    const db = openDatabase(":memory:");
    const store = new ArticleStore(db);
    const primary = new SwitchableKeywordEmbedder();
    const engine = createNewsEngine({
      config: loadConfig({ env: { NODE_ENV: "test" } }),
      db,
      lexicon,
      embedder: new ResilientEmbeddingProvider({
        primary,
        fallback: new LexicalEmbeddingProvider({ namespace: "tfidf", maxFeatures: 16 }),
        corpus: () => store.listArticles().map(articleText),
        models: new LexicalModelStore(db)
      }),
      extractEntities: () => ({ companies: ["HDFC Bank"], sectors: ["Banking"], regulators: [] })
    });
    engines.push(engine);
    await engine.ingest({
      title: "HDFC Bank profit rises",
      content: "",
      date: "2024-03-01",
      source: "wire"
    });

    primary.down = true;
    const ranked = await engine.searchSemantic("HDFC Bank profit", 5);
    const answer = await engine.query("HDFC Bank profit", 5);

    // Query covers three of the article's four equally weighted terms.
    expect(ranked.map((candidate) => candidate.articleId)).toEqual([1]);
    expect(ranked[0]?.score).toBeCloseTo(Math.sqrt(3) / 2, 6);
    expect(answer.results.map((item) => item.article.id)).toEqual([1]);
    expect(engine.context.vectors.count("tfidf")).toBe(1);
  });
});
