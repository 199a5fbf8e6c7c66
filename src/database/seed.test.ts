import { describe, it, expect } from "@jest/globals";
import { createProductsRepo } from "../modules/products/products.repository";
import { openMemoryDatabase } from "../testing/database";
import { DuplicateSkuError } from "../utils/errors";
import { DEMO_PRODUCTS, seedProducts } from "./seed";

describe("seedProducts", () => {
  it("fills an empty catalog once", () => {
    const handle = openMemoryDatabase();
    try {
      const repo = createProductsRepo(handle.db);
      expect(seedProducts(repo)).toBe(4);
      expect(seedProducts(repo)).toBe(0);
      expect(repo.count()).toBe(4);
      expect(repo.getBySku("beb-0201")).toMatchObject({ name: "Café Americano", category: "Beverages", unitPrice: "1.50" });
    } finally {
      handle.close();
    }
  });

  it("writes nothing when one item fails", () => {
    const handle = openMemoryDatabase();
    try {
      const repo = createProductsRepo(handle.db);
      const [first, second] = DEMO_PRODUCTS;
      expect(() => seedProducts(repo, [first, second, { ...first, name: "Copia" }])).toThrow(DuplicateSkuError);
      expect(repo.count()).toBe(0);
      expect(seedProducts(repo)).toBe(4);
    } finally {
      handle.close();
    }
  });
});
