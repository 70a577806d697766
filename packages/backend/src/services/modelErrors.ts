import type { ModelErrorCategory } from "@docchat/shared";
import { EmbeddingUnavailableError, errorMessage } from "../errors.js";

export interface ClassifiedModelError {
  category: ModelErrorCategory;
  retryable: boolean;
  status?: number;
  detail: string;
}

const TRANSIENT_CODES = new Set(["ETIMEDOUT", "ECONNRESET", "ECONNABORTED", "ECONNREFUSED", "EAI_AGAIN"]);

const remediationMessages: Record<Exclude<ModelErrorCategory, "unknown">, string> = {
  transient: [
    "The language model service is temporarily unavailable. This could be due to:",
    "• Temporary service outage",
    "• High request volume",
    "",
    "Please try again in a few minutes."
  ].join("\n"),
  invalid_request: [
    "Invalid request to the language model service. Please check:",
    "• Your API key is valid",
    "• The request format is correct",
    "• Try rephrasing your question"
  ].join("\n"),
  unauthorized: [
    "Authentication failed with the language model service. Please verify:",
    "• Your API key is correct",
    "• The API key has the necessary permissions",
    "• The API is enabled for your account"
  ].join("\n"),
  rate_limited: [
    "Rate limit exceeded. Please:",
    "• Wait a few minutes before trying again",
    "• Check your API quota limits",
    "• Consider upgrading your API plan if needed"
  ].join("\n"),
  embedding_unavailable: [
    "The embedding service is unavailable, so the document could not be searched. Please check:",
    "• The embedding API key and endpoint",
    "• Your network connection"
  ].join("\n")
};

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function categoryFromStatus(status: number): ModelErrorCategory | undefined {
  if (status >= 500) return "transient";
  if (status === 401 || status === 403) return "unauthorized";
  if (status === 429) return "rate_limited";
  if (status >= 400) return "invalid_request";
  return undefined;
}

function categoryFromMessage(message: string): ModelErrorCategory {
  if (/timeout|timed out|temporarily unavailable|service unavailable|connection error/i.test(message)) {
    return "transient";
  }
  if (/quota|rate limit/i.test(message)) return "rate_limited";
  if (/unauthori[sz]ed|api key/i.test(message)) return "unauthorized";
  if (/invalid/i.test(message)) return "invalid_request";
  return "unknown";
}

export function classifyModelError(error: unknown): ClassifiedModelError {
  const detail = errorMessage(error);
  if (error instanceof EmbeddingUnavailableError) {
    return { category: "embedding_unavailable", retryable: false, detail };
  }

  const status = readStatus(error);
  const code = readCode(error);
  const category =
    (status !== undefined ? categoryFromStatus(status) : undefined) ??
    (code !== undefined && TRANSIENT_CODES.has(code) ? "transient" : undefined) ??
    categoryFromMessage(detail);

  const classified: ClassifiedModelError = {
    category,
    retryable: category === "transient",
    detail
  };
  if (status !== undefined) {
    classified.status = status;
  }
  return classified;
}

export function remediationMessage(classified: ClassifiedModelError): string {
  if (classified.category === "unknown") {
    return [
      "I encountered an error while processing your question:",
      classified.detail,
      "",
      "Troubleshooting tips:",
      "• Check your internet connection",
      "• Verify your API key is valid",
      "• Try asking a simpler question"
    ].join("\n");
  }
  return remediationMessages[classified.category];
}
