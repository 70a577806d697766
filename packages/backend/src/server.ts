import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter, uploadRateLimiter } from "./middleware/rateLimiter.js";
import { createAdminRouter } from "./routes/admin.js";
import { createChatRouter } from "./routes/chat.js";
import { createDocumentsRouter } from "./routes/documents.js";
import { createHealthRouter } from "./routes/health.js";
import { closeChatStore } from "./runtime/chatRuntime.js";
import { logger } from "./utils/logger.js";

export const app = express();

app.use(requestLogger);
app.use(
  cors({
    origin: appConfig.CORS_ORIGIN
  })
);
app.use(express.json({ limit: "2mb" }));
app.use(express.urlencoded({ extended: true }));
app.use(apiRateLimiter);

app.use("/api/documents", uploadRateLimiter, createDocumentsRouter());
app.use("/api/chats", createChatRouter());
app.use("/api/health", createHealthRouter());
app.use("/api/admin", createAdminRouter());

app.use((_req, res) => {
  res.status(404).json({ error: "Route not found" });
});

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  logger.error({ err }, "Unhandled error");
  res.status(500).json({ error: "Internal server error" });
});

const server = app.listen(appConfig.PORT, () => {
  logger.info(`Document chat backend is running on http://localhost:${appConfig.PORT}`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    closeChatStore();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
