import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { logger } from "../lib/logger.js";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Zod error tagged with where the invalid input came from. */
export class RequestValidationError extends Error {
  constructor(
    public location: "body" | "path",
    public zodError: ZodError,
  ) {
    super(zodError.message);
    this.name = "RequestValidationError";
  }
}

export interface ValidationDetail {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export function validationDetails(err: RequestValidationError): ValidationDetail[] {
  return err.zodError.issues.map((issue) => ({
    loc: [err.location, ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

function isUniqueViolation(err: Error): boolean {
  return "code" in err && err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

// express.json() marks body parse failures with type "entity.parse.failed"
function isJsonParseError(err: Error): boolean {
  return "type" in err && err.type === "entity.parse.failed";
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ detail: "Not Found" });
}

export function createErrorHandler(nodeEnv: string) {
  return function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof AppError) {
      logger.debug(`${req.method} ${req.path} -> ${err.statusCode} ${err.message}`);
      res.status(err.statusCode).json({ detail: err.message });
      return;
    }

    if (err instanceof RequestValidationError) {
      res.status(422).json({ detail: validationDetails(err) });
      return;
    }

    if (isJsonParseError(err)) {
      res.status(400).json({ detail: "Malformed JSON body" });
      return;
    }

    if (isUniqueViolation(err)) {
      logger.warn(`Unique constraint violation on ${req.method} ${req.path}: ${err.message}`);
      res.status(409).json({ detail: "Username already registered" });
      return;
    }

    logger.error(err);
    res.status(500).json({
      detail: "Internal server error",
      ...(nodeEnv !== "production" && { error: err.message }),
    });
  };
}
