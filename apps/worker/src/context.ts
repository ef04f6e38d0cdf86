import PQueue from "p-queue";

import { loadConfig, type AppConfig } from "@newsdesk/config";
import {
  ArticleStore,
  LexicalModelStore,
  openDatabase,
  type Article,
  type EntityTags,
  type SqliteDatabase
} from "@newsdesk/db";
import { createLogger, type Logger } from "@newsdesk/logger";
import { loadLexicon, VectorStore, type Lexicon } from "@newsdesk/search";

import { createEmbeddingProvider } from "./lib/embeddings/index.js";
import type { EmbeddingProvider } from "./lib/embeddings/provider.js";
import { SimilarityClusterer } from "./lib/search/clustering.js";

/** Entity tagging is owned by the host; the engine only stores and reads tags. */
export type ExtractEntities = (
  article: Article
) => Omit<EntityTags, "articleId"> | Promise<Omit<EntityTags, "articleId">>;

export type WorkerContext = {
  config: AppConfig;
  logger: Logger;
  db: SqliteDatabase;
  articles: ArticleStore;
  vectors: VectorStore;
  lexicon: Lexicon;
  embedder: EmbeddingProvider;
  clusterer: SimilarityClusterer;
  /** Every write runs here, one at a time. */
  writeQueue: PQueue;
  extractEntities: ExtractEntities | null;
};

export interface WorkerContextOptions {
  config?: AppConfig;
  db?: SqliteDatabase;
  lexicon?: Lexicon;
  embedder?: EmbeddingProvider;
  extractEntities?: ExtractEntities;
  logger?: Logger;
}

export function articleText(article: Pick<Article, "title" | "content">): string {
  return `${article.title} ${article.content}`;
}

export function createWorkerContext(options: WorkerContextOptions = {}): WorkerContext {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ name: "worker" });
  const db = options.db ?? openDatabase(config.database.path);
  const articles = new ArticleStore(db);

  const embedder =
    options.embedder ??
    createEmbeddingProvider(config, {
      corpus: () => articles.listArticles().map(articleText),
      models: new LexicalModelStore(db)
    });

  return {
    config,
    logger,
    db,
    articles,
    vectors: new VectorStore(db),
    lexicon: options.lexicon ?? loadLexicon(config.lexicon.path),
    embedder,
    clusterer: new SimilarityClusterer(config.clustering.similarityThreshold),
    writeQueue: new PQueue({ concurrency: 1 }),
    extractEntities: options.extractEntities ?? null
  };
}
