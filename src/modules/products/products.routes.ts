import { Router } from "express";
import type { ProductsService } from "./products.service";
import { createProductsController } from "./products.controller";

export function productsRoutes(service: ProductsService) {
  const router = Router();
  const controller = createProductsController(service);

  router.get("/", controller.list);
  router.post("/", controller.create);
  router.get("/search/:name", controller.search);
  router.get("/sku/:sku", controller.getBySku);
  router.get("/:id", controller.get);
  router.put("/:id", controller.update);
  router.patch("/:id", controller.update);
  router.delete("/:id", controller.remove);

  return router;
}
