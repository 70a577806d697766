import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  UPLOAD_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CHAT_DB_PATH: z.string().default("data/docchat.db"),
  UPLOADS_DIR: z.string().default("data/uploads"),
  CHUNK_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP_TOKENS: z.coerce.number().int().min(0).default(200),
  CHUNK_MIN_LENGTH: z.coerce.number().int().min(0).default(50),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(4),
  RETRIEVAL_MAX_DISTANCE: z.coerce.number().positive().default(0.8),
  CONTEXT_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(5),
  ANSWER_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  ANSWER_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default(""),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1000),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
