import { Router } from "express";
import type { HealthResponse, ServiceCheckStatus } from "@docchat/shared";
import { getChatStoreSingleton } from "../runtime/chatRuntime.js";
import { checkDatabase, checkLlmConnection } from "../runtime/connectivity.js";
import { getLLMServiceSingleton, getSessionCoordinatorSingleton } from "../runtime/serviceRuntime.js";
import type { ChatStoreLike } from "../services/ChatStore.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import type { SessionCoordinator } from "../services/SessionCoordinator.js";

interface CreateHealthRouterOptions {
  chatStore?: ChatStoreLike;
  llmService?: LLMServiceLike;
  coordinator?: SessionCoordinator;
  checkLlm?: () => Promise<ServiceCheckStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const chatStore = options.chatStore ?? getChatStoreSingleton();
  const coordinator = options.coordinator ?? getSessionCoordinatorSingleton();
  const checkLlm =
    options.checkLlm ??
    (() => checkLlmConnection(options.llmService ?? getLLMServiceSingleton()));
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const database = checkDatabase(chatStore);
    const llm = await checkLlm();
    const status: HealthResponse["status"] =
      database === "failed" || llm === "failed" ? "degraded" : "ok";

    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        database,
        llm
      },
      memory: coordinator.stats()
    };
    if (database === "ok") {
      response.database = chatStore.getStats();
    }
    res.json(response);
  });

  return healthRouter;
}
