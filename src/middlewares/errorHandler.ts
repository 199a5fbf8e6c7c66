import { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors";
import { logger } from "../config/logger";
import { fail } from "../utils/response";

// body-parser tags its errors with a `type`; only malformed JSON is the client's fault.
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json(fail("ROUTE_NOT_FOUND", `Route ${req.method} ${req.path} not found`));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    logger.warn({ code: err.code, details: err.details }, err.message);
    return res.status(err.status).json(fail(err.code, err.message, err.details));
  }
  if (isBodyParseError(err)) {
    logger.warn("Malformed JSON body");
    return res.status(400).json(fail("INVALID_JSON", "Request body is not valid JSON"));
  }
  logger.error({ err }, "Unhandled error");
  return res.status(500).json(fail("INTERNAL_SERVER_ERROR", "Unexpected error"));
}
