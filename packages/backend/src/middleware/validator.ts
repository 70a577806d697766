import type { RequestHandler } from "express";
import { ZodError, type ZodIssue, type ZodTypeAny } from "zod";
import { logger } from "../utils/logger.js";

interface ValidationSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

type RequestPart = keyof ValidationSchemas;

export interface ValidationErrorBody {
  error: "Validation failed";
  details: Array<{ location: RequestPart; path: string; message: string }>;
}

function toDetails(location: RequestPart, issues: ZodIssue[]): ValidationErrorBody["details"] {
  return issues.map((issue) => ({
    location,
    path: issue.path.join("."),
    message: issue.message
  }));
}

/** Parses params, query and body in place; every failing part is reported in one 400. */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    const details: ValidationErrorBody["details"] = [];
    const run = (location: RequestPart, apply: () => void): void => {
      try {
        apply();
      } catch (error) {
        if (!(error instanceof ZodError)) {
          throw error;
        }
        details.push(...toDetails(location, error.issues));
      }
    };

    try {
      const { params, query, body } = schemas;
      if (params) {
        run("params", () => {
          req.params = params.parse(req.params);
        });
      }
      if (query) {
        run("query", () => {
          req.query = query.parse(req.query);
        });
      }
      if (body) {
        run("body", () => {
          req.body = body.parse(req.body);
        });
      }
    } catch (error) {
      next(error);
      return;
    }

    if (details.length > 0) {
      logger.debug({ url: req.originalUrl, details }, "Request validation failed");
      const response: ValidationErrorBody = { error: "Validation failed", details };
      res.status(400).json(response);
      return;
    }
    next();
  };
};
