import { z } from "zod";

import { createLogger } from "@newsdesk/logger";

import type { SqliteDatabase } from "./client.js";
import {
  decodeIdList,
  decodeStringList,
  encodeList,
  type DecodeResult
} from "./codecs.js";
import { MalformedPersistedRecordError, withStorage } from "./errors.js";
import type {
  Article,
  ArticleImpact,
  EntityTags,
  NewArticle,
  Story
} from "./types.js";

const logger = createLogger({ name: "article-store" });

const articleRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  content: z.string(),
  date: z.string(),
  source: z.string()
});

const storyRowSchema = z.object({
  story_id: z.number().int(),
  representative_article_id: z.number().int(),
  member_article_ids: z.unknown()
});

const entityTagsRowSchema = z.object({
  article_id: z.number().int(),
  companies: z.unknown(),
  sectors: z.unknown(),
  regulators: z.unknown()
});

const impactedStockSchema = z.object({
  symbol: z.string(),
  confidence: z.number(),
  type: z.enum(["direct", "sector", "regulatory"]),
  company: z.string().optional(),
  sector: z.string().optional(),
  regulator: z.string().optional()
});

const impactRowSchema = z.object({
  article_id: z.number().int(),
  impacted_stocks: z.string()
});

type Decoded<T> = DecodeResult<T>;

function decodeArticle(row: unknown): Decoded<Article> {
  const result = articleRowSchema.safeParse(row);
  if (!result.success) {
    return { ok: false, reason: describeIssue(result.error) };
  }
  return { ok: true, value: result.data };
}

function decodeStory(row: unknown): Decoded<Story> {
  const result = storyRowSchema.safeParse(row);
  if (!result.success) {
    return { ok: false, reason: describeIssue(result.error) };
  }
  const members = decodeIdList(result.data.member_article_ids);
  if (!members.ok) {
    return members;
  }
  return {
    ok: true,
    value: {
      storyId: result.data.story_id,
      representativeArticleId: result.data.representative_article_id,
      memberArticleIds: members.value
    }
  };
}

function decodeEntityTags(row: unknown): Decoded<EntityTags> {
  const result = entityTagsRowSchema.safeParse(row);
  if (!result.success) {
    return { ok: false, reason: describeIssue(result.error) };
  }
  const companies = decodeStringList(result.data.companies);
  if (!companies.ok) return companies;
  const sectors = decodeStringList(result.data.sectors);
  if (!sectors.ok) return sectors;
  const regulators = decodeStringList(result.data.regulators);
  if (!regulators.ok) return regulators;

  return {
    ok: true,
    value: {
      articleId: result.data.article_id,
      companies: companies.value,
      sectors: sectors.value,
      regulators: regulators.value
    }
  };
}

function decodeImpact(row: unknown): Decoded<ArticleImpact> {
  const result = impactRowSchema.safeParse(row);
  if (!result.success) {
    return { ok: false, reason: describeIssue(result.error) };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(result.data.impacted_stocks);
  } catch {
    return { ok: false, reason: "impacted_stocks is not valid JSON" };
  }
  const stocks = z.array(impactedStockSchema).safeParse(parsed);
  if (!stocks.success) {
    return { ok: false, reason: describeIssue(stocks.error) };
  }
  return {
    ok: true,
    value: { articleId: result.data.article_id, impactedStocks: stocks.data }
  };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid row";
  }
  return issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;
}

function rowKey(row: unknown, column: string): string {
  if (typeof row === "object" && row !== null && column in row) {
    return String(Reflect.get(row, column));
  }
  return "?";
}

/**
 * Durable article records and their derived artifacts (entity tags, story
 * membership, stock impact). Every row read back is schema-validated: bulk
 * reads skip malformed rows with a warning, single reads raise
 * MalformedPersistedRecordError.
 */
export class ArticleStore {
  constructor(private readonly db: SqliteDatabase) {}

  insertArticle(article: NewArticle): number {
    if (article.id !== undefined) {
      this.upsertArticle({ ...article, id: article.id });
      return article.id;
    }

    return withStorage("insert article", () => {
      const result = this.db
        .prepare(
          "INSERT INTO articles (title, content, date, source) VALUES (?, ?, ?, ?)"
        )
        .run(article.title, article.content, article.date, article.source);
      return Number(result.lastInsertRowid);
    });
  }

  upsertArticle(article: Article): void {
    withStorage("upsert article", () => {
      this.db
        .prepare(
          `INSERT INTO articles (id, title, content, date, source) VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             title = excluded.title,
             content = excluded.content,
             date = excluded.date,
             source = excluded.source`
        )
        .run(article.id, article.title, article.content, article.date, article.source);
    });
  }

  getArticle(id: number): Article | null {
    const row = withStorage("read article", () =>
      this.db
        .prepare("SELECT id, title, content, date, source FROM articles WHERE id = ?")
        .get(id)
    );
    if (row === undefined) {
      return null;
    }
    const decoded = decodeArticle(row);
    if (!decoded.ok) {
      throw new MalformedPersistedRecordError("articles", id, decoded.reason);
    }
    return decoded.value;
  }

  listArticles(): Article[] {
    const rows = withStorage("list articles", () =>
      this.db
        .prepare("SELECT id, title, content, date, source FROM articles ORDER BY id")
        .all()
    );
    return this.decodeAll("articles", "id", rows, decodeArticle);
  }

  countArticles(): number {
    const row = withStorage("count articles", () =>
      this.db.prepare("SELECT COUNT(*) AS count FROM articles").get()
    );
    return z.object({ count: z.number() }).parse(row).count;
  }

  /** Deletes the articles with their vectors, entity tags and impact, in one transaction. */
  deleteArticles(ids: readonly number[]): void {
    if (ids.length === 0) {
      return;
    }
    withStorage("delete articles", () => {
      const statements = [
        this.db.prepare("DELETE FROM embeddings WHERE article_id = ?"),
        this.db.prepare("DELETE FROM entity_tags WHERE article_id = ?"),
        this.db.prepare("DELETE FROM impacts WHERE article_id = ?"),
        this.db.prepare("DELETE FROM articles WHERE id = ?")
      ];
      this.db.transaction(() => {
        for (const id of ids) {
          for (const statement of statements) {
            statement.run(id);
          }
        }
      })();
    });
  }

  /** Replaces the stories of the previous deduplication run in one transaction. */
  replaceStories(stories: readonly Story[]): void {
    withStorage("replace stories", () => {
      const remove = this.db.prepare("DELETE FROM stories");
      const insert = this.db.prepare(
        "INSERT INTO stories (story_id, representative_article_id, member_article_ids) VALUES (?, ?, ?)"
      );
      this.db.transaction(() => {
        remove.run();
        for (const story of stories) {
          insert.run(
            story.storyId,
            story.representativeArticleId,
            encodeList(story.memberArticleIds)
          );
        }
      })();
    });
  }

  listStories(): Story[] {
    const rows = withStorage("list stories", () =>
      this.db
        .prepare(
          "SELECT story_id, representative_article_id, member_article_ids FROM stories ORDER BY story_id"
        )
        .all()
    );
    return this.decodeAll("stories", "story_id", rows, decodeStory);
  }

  getStory(storyId: number): Story | null {
    const row = withStorage("read story", () =>
      this.db
        .prepare(
          "SELECT story_id, representative_article_id, member_article_ids FROM stories WHERE story_id = ?"
        )
        .get(storyId)
    );
    if (row === undefined) {
      return null;
    }
    const decoded = decodeStory(row);
    if (!decoded.ok) {
      throw new MalformedPersistedRecordError("stories", storyId, decoded.reason);
    }
    return decoded.value;
  }

  saveEntityTags(tags: EntityTags): void {
    withStorage("save entity tags", () => {
      this.db
        .prepare(
          `INSERT INTO entity_tags (article_id, companies, sectors, regulators) VALUES (?, ?, ?, ?)
           ON CONFLICT(article_id) DO UPDATE SET
             companies = excluded.companies,
             sectors = excluded.sectors,
             regulators = excluded.regulators`
        )
        .run(
          tags.articleId,
          encodeList(tags.companies),
          encodeList(tags.sectors),
          encodeList(tags.regulators)
        );
    });
  }

  getEntityTags(articleId: number): EntityTags | null {
    const row = withStorage("read entity tags", () =>
      this.db
        .prepare(
          "SELECT article_id, companies, sectors, regulators FROM entity_tags WHERE article_id = ?"
        )
        .get(articleId)
    );
    if (row === undefined) {
      return null;
    }
    const decoded = decodeEntityTags(row);
    if (!decoded.ok) {
      throw new MalformedPersistedRecordError("entity_tags", articleId, decoded.reason);
    }
    return decoded.value;
  }

  saveImpact(impact: ArticleImpact): void {
    withStorage("save impact", () => {
      this.db
        .prepare(
          `INSERT INTO impacts (article_id, impacted_stocks) VALUES (?, ?)
           ON CONFLICT(article_id) DO UPDATE SET impacted_stocks = excluded.impacted_stocks`
        )
        .run(impact.articleId, JSON.stringify(impact.impactedStocks));
    });
  }

  getImpact(articleId: number): ArticleImpact | null {
    const row = withStorage("read impact", () =>
      this.db
        .prepare("SELECT article_id, impacted_stocks FROM impacts WHERE article_id = ?")
        .get(articleId)
    );
    if (row === undefined) {
      return null;
    }
    const decoded = decodeImpact(row);
    if (!decoded.ok) {
      throw new MalformedPersistedRecordError("impacts", articleId, decoded.reason);
    }
    return decoded.value;
  }

  private decodeAll<T>(
    table: string,
    keyColumn: string,
    rows: unknown[],
    decode: (row: unknown) => Decoded<T>
  ): T[] {
    const out: T[] = [];
    for (const row of rows) {
      const decoded = decode(row);
      if (decoded.ok) {
        out.push(decoded.value);
      } else {
        logger.warn(
          { table, key: rowKey(row, keyColumn), reason: decoded.reason },
          "Skipping malformed persisted record"
        );
      }
    }
    return out;
  }
}
