import { z } from "zod";
import { ValidationError, type FieldErrors } from "../../utils/errors";
import type { NewProduct, Pagination, ProductFilters, ProductPatch } from "./products.types";
import {
  createProductSchema,
  listQuerySchema,
  productIdSchema,
  searchQuerySchema,
  updateProductSchema
} from "./products.schemas";

/** Keeps the first message reported for each field path. */
export function toFieldErrors(error: z.ZodError, root = "body"): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : root;
    if (!(key in fields)) fields[key] = issue.message;
  }
  return fields;
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, root?: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ValidationError(toFieldErrors(parsed.error, root));
  return parsed.data;
}

export function validateCreate(payload: unknown): NewProduct {
  const body = parseOrThrow(createProductSchema, payload);
  return {
    name: body.name,
    sku: body.sku,
    category: body.category,
    unitPrice: body.unit_price,
    stock: body.stock,
    available: body.available
  };
}

export function validateUpdate(payload: unknown): ProductPatch {
  const body = parseOrThrow(updateProductSchema, payload);
  const patch: ProductPatch = {};
  if (body.name !== undefined) patch.name = body.name;
  if (body.sku !== undefined) patch.sku = body.sku;
  if (body.category !== undefined) patch.category = body.category;
  if (body.unit_price !== undefined) patch.unitPrice = body.unit_price;
  if (body.stock !== undefined) patch.stock = body.stock;
  if (body.available !== undefined) patch.available = body.available;
  return patch;
}

export function parseProductId(raw: unknown): number {
  return parseOrThrow(productIdSchema, raw, "id");
}

export function parseListQuery(query: unknown): Pagination & ProductFilters {
  const q = parseOrThrow(listQuerySchema, query, "query");
  const result: Pagination & ProductFilters = { skip: q.skip, limit: q.limit };
  if (q.category !== undefined) result.category = q.category;
  if (q.available !== undefined) result.available = q.available;
  return result;
}

export function parseSearchQuery(name: unknown, query: unknown): Pagination & { term: string } {
  const q = parseOrThrow(searchQuerySchema, { ...toRecord(query), name }, "query");
  return { term: q.name, skip: q.skip, limit: q.limit };
}

function toRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null ? { ...value } : {};
}
