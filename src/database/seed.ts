import { env } from "../config/env";
import { logger } from "../config/logger";
import { createProductsRepo, type ProductsRepo } from "../modules/products/products.repository";
import type { NewProduct } from "../modules/products/products.types";
import { openSqlite } from "./sqlite/client";
import { runMigrations } from "./sqlite/migrate";

export const DEMO_PRODUCTS: NewProduct[] = [
  { name: "Pan Francés", sku: "PAN-0001", category: "Bread", unitPrice: "1.25", stock: 120, available: true },
  { name: "Croissant", sku: "PAS-0101", category: "Pastry", unitPrice: "2.75", stock: 60, available: true },
  { name: "Café Americano", sku: "BEB-0201", category: "Beverages", unitPrice: "1.50", stock: 200, available: true },
  { name: "Empanada de Pollo", sku: "EMP-0301", category: "Other", unitPrice: "3.00", stock: 50, available: true }
];

/** Inserts the demo catalog into an empty table, all or nothing. Returns how many rows were written. */
export function seedProducts(repo: ProductsRepo, items: NewProduct[] = DEMO_PRODUCTS): number {
  if (repo.count() > 0) {
    logger.info("Catalog already has products; skipping seed");
    return 0;
  }
  repo.transaction(() => {
    for (const item of items) repo.create(item);
  });
  logger.info({ count: items.length }, "Demo products inserted");
  return items.length;
}

if (require.main === module) {
  const database = openSqlite(env.DATABASE_URL);
  try {
    runMigrations(database.db);
    seedProducts(createProductsRepo(database.db));
  } finally {
    database.close();
  }
}
