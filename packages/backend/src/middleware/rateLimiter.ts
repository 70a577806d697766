import type { RequestHandler } from "express";
import rateLimit from "express-rate-limit";
import { appConfig } from "../config.js";
import { logger } from "../utils/logger.js";

interface RateLimiterOptions {
  windowMs: number;
  max: number;
  scope: string;
}

export function createRateLimiter({ windowMs, max, scope }: RateLimiterOptions): RequestHandler {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn({ scope, ip: req.ip, url: req.originalUrl }, "Rate limit exceeded");
      res.status(429).json({ error: "Too many requests, please try again later." });
    }
  });
}

export const apiRateLimiter = createRateLimiter({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  max: appConfig.RATE_LIMIT_MAX,
  scope: "api"
});

// Every upload is parsed and embedded, so uploads get their own, smaller budget.
export const uploadRateLimiter = createRateLimiter({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  max: appConfig.UPLOAD_RATE_LIMIT_MAX,
  scope: "upload"
});
