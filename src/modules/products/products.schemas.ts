import { z } from "zod";
import { CATEGORIES } from "./products.types";

const DECIMAL = /^-?(\d+)(?:\.(\d+))?$/;
const MAX_INTEGER_DIGITS = 8;
const MAX_FRACTION_DIGITS = 2;

/**
 * Checks a price on its decimal text, never on a binary float: a JS number is
 * rendered with String(), which yields the shortest text that round-trips.
 * Returns the canonical form ("01.5" -> "1.50").
 */
export const priceSchema = z
  .union([z.number().finite(), z.string().trim()], {
    errorMap: () => ({ message: "Unit price must be a number" })
  })
  .transform((value, ctx) => {
    const text = String(value);
    const match = DECIMAL.exec(text);
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Unit price must be a plain decimal number" });
      return z.NEVER;
    }
    const integerPart = match[1].replace(/^0+(?=\d)/, "");
    const fraction = match[2] ?? "";
    const isZero = /^0*$/.test(match[1]) && /^0*$/.test(fraction);
    if (text.startsWith("-") || isZero) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Unit price must be greater than 0" });
      return z.NEVER;
    }
    if (fraction.length > MAX_FRACTION_DIGITS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Unit price cannot have more than 2 decimal places" });
      return z.NEVER;
    }
    if (integerPart.length > MAX_INTEGER_DIGITS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Unit price cannot have more than 8 digits before the decimal point" });
      return z.NEVER;
    }
    return `${integerPart}.${fraction.padEnd(MAX_FRACTION_DIGITS, "0")}`;
  });

// Uppercasing can lengthen a string ("ß" -> "SS"), so the checks run on the normalized form.
export const skuSchema = z
  .string()
  .transform((v) => v.toUpperCase())
  .pipe(
    z
      .string()
      .min(3, "SKU must be at least 3 characters")
      .max(20, "SKU must be at most 20 characters")
      .refine((v) => {
        const parts = v.split("-");
        return parts.length === 2 && parts.every((p) => p.length > 0);
      }, "SKU must have the format XXX-NNNN (e.g. PAN-0001)")
  );

const nameSchema = z
  .string()
  .min(1, "Name must not be empty")
  .max(150, "Name must be at most 150 characters");

const categorySchema = z.enum(CATEGORIES, {
  errorMap: () => ({ message: `Category must be one of: ${CATEGORIES.join(", ")}` })
});

const stockSchema = z
  .number({ invalid_type_error: "Stock must be an integer" })
  .int("Stock must be an integer")
  .min(0, "Stock cannot be negative");

export const createProductSchema = z.object({
  name: nameSchema,
  sku: skuSchema,
  category: categorySchema,
  unit_price: priceSchema,
  stock: stockSchema,
  available: z.boolean().default(true)
});

export const updateProductSchema = z.object({
  name: nameSchema.optional(),
  sku: skuSchema.optional(),
  category: categorySchema.optional(),
  unit_price: priceSchema.optional(),
  stock: stockSchema.optional(),
  available: z.boolean().optional()
});

const queryBoolean = z
  .enum(["true", "false", "1", "0"], {
    errorMap: () => ({ message: "Expected true or false" })
  })
  .transform((v) => v === "true" || v === "1");

const paginationShape = {
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100)
};

export const listQuerySchema = z.object({
  ...paginationShape,
  category: categorySchema.optional(),
  available: queryBoolean.optional()
});

export const searchQuerySchema = z.object({
  name: z.string().min(1, "Search term must not be empty").max(150),
  ...paginationShape
});

export const productIdSchema = z.coerce
  .number({ invalid_type_error: "Product id must be an integer" })
  .int("Product id must be an integer")
  .positive("Product id must be positive");
