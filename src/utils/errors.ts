export class AppError extends Error {
  public status: number;
  public code: string;
  public details?: unknown;
  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/** Field path → message, one entry per violated field. */
export type FieldErrors = Record<string, string>;

export class ValidationError extends AppError {
  public fields: FieldErrors;
  constructor(fields: FieldErrors) {
    super(422, "VALIDATION_ERROR", "Invalid request", fields);
    this.fields = fields;
  }
}

export class DuplicateSkuError extends AppError {
  public sku: string;
  constructor(sku: string) {
    super(400, "DUPLICATE_SKU", `SKU ${sku} already exists`, { sku });
    this.sku = sku;
  }
}

export class ProductNotFoundError extends AppError {
  constructor(key: { id: number } | { sku: string }) {
    const label = "id" in key ? `ID ${key.id}` : `SKU ${key.sku}`;
    super(404, "PRODUCT_NOT_FOUND", `Product with ${label} not found`, key);
  }
}
