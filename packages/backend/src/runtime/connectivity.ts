import type { ServiceCheckStatus } from "@docchat/shared";
import type { ChatStoreLike } from "../services/ChatStore.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";

export function isLlmConfigured(llmService: LLMServiceLike): boolean {
  return llmService.isConfigured?.() ?? true;
}

export function checkDatabase(store: ChatStoreLike): ServiceCheckStatus {
  try {
    store.getStats();
    return "ok";
  } catch (error) {
    logger.error({ err: error }, "Chat store health check failed");
    return "failed";
  }
}

/** Probes the embedding endpoint, the cheapest call the model backend offers. */
export async function checkLlmConnection(
  llmService: LLMServiceLike,
  probeText = "ping"
): Promise<ServiceCheckStatus> {
  if (!isLlmConfigured(llmService)) {
    return "not_configured";
  }

  try {
    const vector = await llmService.generateEmbedding(probeText);
    return vector.length > 0 ? "ok" : "failed";
  } catch (error) {
    logger.warn({ err: error }, "Language model health check failed");
    return "failed";
  }
}
