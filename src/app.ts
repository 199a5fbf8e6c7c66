import express from "express";
import helmet from "helmet";
import cors from "cors";
import { sql } from "drizzle-orm";
import type { CatalogDb } from "./database/sqlite/client";
import { env } from "./config/env";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";
import { createProductsRepo, type ProductsRepoOptions } from "./modules/products/products.repository";
import { createProductsService } from "./modules/products/products.service";
import { productsRoutes } from "./modules/products/products.routes";
import { ok } from "./utils/response";

export const SERVICE_NAME = "Bakery Catalog API";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps extends ProductsRepoOptions {
  db: CatalogDb;
  corsOrigin?: string;
}

export function createApp({ db, now, corsOrigin = env.CORS_ORIGIN }: AppDeps) {
  const products = createProductsService(createProductsRepo(db, { now }));

  const app = express();
  app.use(helmet());
  app.use(cors({ origin: corsOrigin === "*" ? true : corsOrigin, credentials: true }));
  app.use(express.json({ limit: env.BODY_LIMIT }));

  app.get("/", (_req, res) => {
    res.json(ok({ name: SERVICE_NAME, version: SERVICE_VERSION }));
  });

  app.get("/api/v1/health", (_req, res, next) => {
    try {
      db.get(sql`SELECT 1`);
      res.json(ok({ status: "ok", database: "up", time: new Date().toISOString() }));
    } catch (e) { next(e); }
  });

  app.use("/api/v1/products", productsRoutes(products));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
