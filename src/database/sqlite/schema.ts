import { sql } from "drizzle-orm";
import { check, integer, sqliteTable, text, uniqueIndex, index } from "drizzle-orm/sqlite-core";

export const products = sqliteTable(
  "products",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name", { length: 150 }).notNull(),
    sku: text("sku", { length: 20 }).notNull(),
    category: text("category").notNull(),
    unitPrice: text("unit_price").notNull(),
    stock: integer("stock").notNull().default(0),
    available: integer("available", { mode: "boolean" }).notNull().default(true),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull()
  },
  (t) => ({
    skuUnique: uniqueIndex("uq_products_sku").on(t.sku),
    nameIdx: index("ix_products_name").on(t.name),
    categoryIdx: index("ix_products_category").on(t.category),
    nameLength: check("products_name_length", sql`length(${t.name}) BETWEEN 1 AND 150`),
    skuLength: check("products_sku_length", sql`length(${t.sku}) BETWEEN 3 AND 20`),
    categoryKnown: check("products_category_known", sql`${t.category} IN ('Bread', 'Pastry', 'Beverages', 'Other')`),
    stockNonNegative: check("products_stock_non_negative", sql`${t.stock} >= 0`)
  })
);

export type ProductRow = typeof products.$inferSelect;
