import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import fs from "fs";
import path from "path";
import { logger } from "../../config/logger";
import * as schema from "./schema";

export type CatalogDb = BetterSQLite3Database<typeof schema>;

export interface SqliteHandle {
  sqlite: Database.Database;
  db: CatalogDb;
  close(): void;
}

const IN_MEMORY = ":memory:";

export function openSqlite(url: string): SqliteHandle {
  if (url !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(url)), { recursive: true });
  }
  const sqlite = new Database(url);
  // WAL is meaningless for an in-memory database.
  if (url !== IN_MEMORY) sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("synchronous = FULL");
  sqlite.pragma("foreign_keys = ON");
  logger.info({ url }, "SQLite pragmas applied (WAL, FULL, FK=ON)");

  const db = drizzle(sqlite, { schema });
  return {
    sqlite,
    db,
    close() {
      sqlite.close();
      logger.info({ url }, "SQLite connection closed");
    }
  };
}
