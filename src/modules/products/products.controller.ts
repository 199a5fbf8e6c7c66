import { Request, Response, NextFunction } from "express";
import type { ProductsService } from "./products.service";
import { toDto } from "./products.types";
import { parseListQuery, parseProductId, parseSearchQuery } from "./products.validation";
import { ok } from "../../utils/response";

export function createProductsController(service: ProductsService) {
  return {
    async list(req: Request, res: Response, next: NextFunction) {
      try {
        const page = service.list(parseListQuery(req.query));
        res.json(ok({ ...page, items: page.items.map(toDto) }));
      } catch (e) { next(e); }
    },
    async search(req: Request, res: Response, next: NextFunction) {
      try {
        const { term, skip, limit } = parseSearchQuery(req.params.name, req.query);
        res.json(ok(service.search(term, { skip, limit }).map(toDto)));
      } catch (e) { next(e); }
    },
    async getBySku(req: Request, res: Response, next: NextFunction) {
      try { res.json(ok(toDto(service.getBySku(req.params.sku)))); } catch (e) { next(e); }
    },
    async get(req: Request, res: Response, next: NextFunction) {
      try { res.json(ok(toDto(service.get(parseProductId(req.params.id))))); } catch (e) { next(e); }
    },
    async create(req: Request, res: Response, next: NextFunction) {
      try { res.status(201).json(ok(toDto(service.create(req.body)))); } catch (e) { next(e); }
    },
    async update(req: Request, res: Response, next: NextFunction) {
      try {
        const id = parseProductId(req.params.id);
        res.json(ok(toDto(service.update(id, req.body))));
      } catch (e) { next(e); }
    },
    async remove(req: Request, res: Response, next: NextFunction) {
      try {
        service.remove(parseProductId(req.params.id));
        res.status(204).end();
      } catch (e) { next(e); }
    }
  };
}
