import { and, asc, count, eq, ne, sql, type SQL } from "drizzle-orm";
import type { CatalogDb } from "../../database/sqlite/client";
import { products } from "../../database/sqlite/schema";
import { logger } from "../../config/logger";
import { DuplicateSkuError } from "../../utils/errors";
import {
  applyPatch,
  categoryToStorage,
  fromRow,
  type NewProduct,
  type Pagination,
  type Product,
  type ProductFilters,
  type ProductPatch
} from "./products.types";

export interface ProductsRepoOptions {
  now?: () => Date;
}

export type ProductsRepo = ReturnType<typeof createProductsRepo>;

// Matches on shape: a SqliteError from another realm (e.g. a separate Jest module registry) fails instanceof Error.
export function isUniqueViolation(err: unknown): boolean {
  let e: unknown = err;
  while (typeof e === "object" && e !== null) {
    if ("code" in e && e.code === "SQLITE_CONSTRAINT_UNIQUE") return true;
    e = "cause" in e ? e.cause : undefined;
  }
  return false;
}

/** Strictly after the previous stamp, even if the clock stalls or steps back. */
function nextStamp(now: Date, previous: string): string {
  return new Date(Math.max(now.getTime(), Date.parse(previous) + 1)).toISOString();
}

function filterClause(filters: ProductFilters): SQL | undefined {
  return and(
    filters.category !== undefined ? eq(products.category, categoryToStorage(filters.category)) : undefined,
    filters.available !== undefined ? eq(products.available, filters.available) : undefined
  );
}

function likePattern(term: string) {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export function createProductsRepo(db: CatalogDb, options: ProductsRepoOptions = {}) {
  const now = options.now ?? (() => new Date());

  function skuTaken(sku: string, excludeId?: number) {
    const row = db
      .select({ id: products.id })
      .from(products)
      .where(and(eq(products.sku, sku.toUpperCase()), excludeId !== undefined ? ne(products.id, excludeId) : undefined))
      .get();
    return row !== undefined;
  }

  function findById(id: number): Product | null {
    const row = db.select().from(products).where(eq(products.id, id)).get();
    return row ? fromRow(row) : null;
  }

  // The unique index is authoritative; the pre-checks only give the common case an early exit.
  function guardUnique<T>(sku: string, write: () => T): T {
    try {
      return write();
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateSkuError(sku);
      throw err;
    }
  }

  return {
    /** Runs `work` in one store transaction; a throw rolls every write back. */
    transaction<T>(work: () => T): T {
      return db.transaction(() => work());
    },

    create(record: NewProduct): Product {
      const sku = record.sku.toUpperCase();
      if (skuTaken(sku)) throw new DuplicateSkuError(sku);
      const timestamp = now().toISOString();
      const row = guardUnique(sku, () =>
        db
          .insert(products)
          .values({
            name: record.name,
            sku,
            category: categoryToStorage(record.category),
            unitPrice: record.unitPrice,
            stock: record.stock,
            available: record.available,
            createdAt: timestamp,
            updatedAt: timestamp
          })
          .returning()
          .get()
      );
      if (!row) throw new Error(`Insert of product ${sku} returned no row`);
      logger.info({ id: row.id, sku: row.sku }, "Product created");
      return fromRow(row);
    },

    getById: findById,

    getBySku(sku: string): Product | null {
      const row = db.select().from(products).where(eq(products.sku, sku.toUpperCase())).get();
      return row ? fromRow(row) : null;
    },

    list(params: Pagination & ProductFilters): Product[] {
      return db
        .select()
        .from(products)
        .where(filterClause(params))
        .orderBy(asc(products.id))
        .limit(params.limit)
        .offset(params.skip)
        .all()
        .map(fromRow);
    },

    count(filters: ProductFilters = {}): number {
      const row = db.select({ value: count() }).from(products).where(filterClause(filters)).get();
      return row?.value ?? 0;
    },

    update(id: number, patch: ProductPatch): Product | null {
      const current = findById(id);
      if (!current) return null;

      const next = applyPatch(current, patch);
      const sku = next.sku.toUpperCase();
      if (patch.sku !== undefined && sku !== current.sku && skuTaken(sku, id)) {
        throw new DuplicateSkuError(sku);
      }
      const updatedAt = nextStamp(now(), current.updatedAt);

      const row = guardUnique(sku, () =>
        db
          .update(products)
          .set({
            name: next.name,
            sku,
            category: categoryToStorage(next.category),
            unitPrice: next.unitPrice,
            stock: next.stock,
            available: next.available,
            updatedAt
          })
          .where(eq(products.id, id))
          .returning()
          .get()
      );
      if (!row) return null;
      logger.info({ id, fields: Object.keys(patch) }, "Product updated");
      return fromRow(row);
    },

    delete(id: number): boolean {
      const result = db.delete(products).where(eq(products.id, id)).run();
      if (result.changes > 0) logger.info({ id }, "Product deleted");
      return result.changes > 0;
    },

    searchByName(term: string, page: Pagination): Product[] {
      return db
        .select()
        .from(products)
        .where(sql`${products.name} LIKE ${likePattern(term)} ESCAPE '\\'`)
        .orderBy(asc(products.id))
        .limit(page.limit)
        .offset(page.skip)
        .all()
        .map(fromRow);
    }
  };
}
