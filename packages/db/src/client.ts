import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import { createLogger } from "@newsdesk/logger";

import { withStorage } from "./errors.js";
import { SCHEMA_STATEMENTS } from "./schema.js";

const logger = createLogger({ name: "db" });

export type SqliteDatabase = Database.Database;

/**
 * Opens (or creates) the SQLite database at `path` and applies the schema.
 * Pass ":memory:" for a throwaway in-process database.
 */
export function openDatabase(path: string): SqliteDatabase {
  return withStorage("open database", () => {
    const inMemory = path === ":memory:";
    if (!inMemory) {
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path);
    if (!inMemory) {
      db.pragma("journal_mode = WAL");
    }
    migrate(db);

    logger.debug({ path }, "Database ready");
    return db;
  });
}

export function migrate(db: SqliteDatabase): void {
  withStorage("migrate schema", () => {
    db.transaction(() => {
      for (const statement of SCHEMA_STATEMENTS) {
        db.exec(statement);
      }
    })();
  });
}

export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
  }
}
