import { ProductNotFoundError } from "../../utils/errors";
import type { ProductsRepo } from "./products.repository";
import type { Pagination, Product, ProductFilters, ProductPage } from "./products.types";
import { validateCreate, validateUpdate } from "./products.validation";

export type ProductsService = ReturnType<typeof createProductsService>;

export function createProductsService(repo: ProductsRepo) {
  return {
    list(params: Pagination & ProductFilters): ProductPage {
      const { skip, limit, ...filters } = params;
      return {
        items: repo.list(params),
        total: repo.count(filters),
        page: Math.floor(skip / limit) + 1,
        size: limit
      };
    },
    get(id: number): Product {
      const product = repo.getById(id);
      if (!product) throw new ProductNotFoundError({ id });
      return product;
    },
    getBySku(sku: string): Product {
      const product = repo.getBySku(sku);
      if (!product) throw new ProductNotFoundError({ sku: sku.toUpperCase() });
      return product;
    },
    create: (payload: unknown) => repo.create(validateCreate(payload)),
    update(id: number, payload: unknown): Product {
      const updated = repo.update(id, validateUpdate(payload));
      if (!updated) throw new ProductNotFoundError({ id });
      return updated;
    },
    remove(id: number): void {
      if (!repo.delete(id)) throw new ProductNotFoundError({ id });
    },
    search: (term: string, page: Pagination) => repo.searchByName(term, page)
  };
}
