import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

/**
 * One log line per request. Streaming answers can outlive the client, so a
 * connection that closes before the response finished is logged as aborted.
 */
export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();
  const streaming = (req.headers.accept ?? "").includes("text/event-stream");

  res.on("close", () => {
    const entry = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
      streaming
    };

    if (!res.writableFinished) {
      logger.warn(entry, "HTTP request aborted by client");
    } else if (res.statusCode >= 500) {
      logger.error(entry, "HTTP request failed");
    } else {
      logger.info(entry, "HTTP request");
    }
  });

  next();
};
