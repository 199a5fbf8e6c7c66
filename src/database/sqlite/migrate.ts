import { migrate } from "drizzle-orm/better-sqlite3/migrator";
import path from "path";
import { logger } from "../../config/logger";
import type { CatalogDb } from "./client";

export const MIGRATIONS_DIR = path.resolve(__dirname, "../../../migrations");

export function runMigrations(db: CatalogDb, migrationsFolder: string = MIGRATIONS_DIR): void {
  logger.info({ migrationsFolder }, "Running database migrations");
  migrate(db, { migrationsFolder });
  logger.info("Database migrations completed");
}
