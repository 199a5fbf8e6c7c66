import type { ProductRow } from "../../database/sqlite/schema";

export const CATEGORIES = ["Bread", "Pastry", "Beverages", "Other"] as const;
export type Category = (typeof CATEGORIES)[number];

export function isCategory(value: unknown): value is Category {
  return CATEGORIES.some((c) => c === value);
}

export const categoryToStorage = (category: Category): string => category;

export function categoryFromStorage(stored: string): Category {
  if (!isCategory(stored)) {
    throw new Error(`Unknown product category in storage: ${stored}`);
  }
  return stored;
}

export interface Product {
  id: number;
  name: string;
  sku: string;
  category: Category;
  /** Canonical decimal string with two fraction digits, e.g. "1.25". */
  unitPrice: string;
  stock: number;
  available: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface NewProduct {
  name: string;
  sku: string;
  category: Category;
  unitPrice: string;
  stock: number;
  available: boolean;
}

/** Absent key = leave the stored value alone. */
export type ProductPatch = Partial<NewProduct>;

export interface ProductFilters {
  category?: Category;
  available?: boolean;
}

export interface Pagination {
  skip: number;
  limit: number;
}

export interface ProductPage {
  items: Product[];
  total: number;
  page: number;
  size: number;
}

export function fromRow(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    sku: row.sku,
    category: categoryFromStorage(row.category),
    unitPrice: row.unitPrice,
    stock: row.stock,
    available: row.available,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}

/** Overlays the keys present in `patch` onto `current`. */
export function applyPatch(current: NewProduct, patch: ProductPatch): NewProduct {
  return {
    name: patch.name ?? current.name,
    sku: patch.sku ?? current.sku,
    category: patch.category ?? current.category,
    unitPrice: patch.unitPrice ?? current.unitPrice,
    stock: patch.stock ?? current.stock,
    available: patch.available ?? current.available
  };
}

/** JSON shape returned to HTTP clients. */
export interface ProductDto {
  id: number;
  name: string;
  sku: string;
  category: Category;
  unit_price: string;
  stock: number;
  available: boolean;
  created_at: string;
  updated_at: string;
}

export function toDto(p: Product): ProductDto {
  return {
    id: p.id,
    name: p.name,
    sku: p.sku,
    category: p.category,
    unit_price: p.unitPrice,
    stock: p.stock,
    available: p.available,
    created_at: p.createdAt,
    updated_at: p.updatedAt
  };
}
