import type { Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type {
  AnswerTerminalEvent,
  AnswerWithSourcesResponse,
  ChatSessionDetailResponse,
  CreateChatMessageResponse,
  DocumentSummaryResponse,
  ListChatSessionsResponse,
  StopGenerationResponse,
  SuggestedQuestionsResponse
} from "@docchat/shared";
import { SessionBusyError, SessionNotFoundError, SessionRecreationError } from "../errors.js";
import { validate } from "../middleware/validator.js";
import { getChatStoreSingleton } from "../runtime/chatRuntime.js";
import { getSessionCoordinatorSingleton } from "../runtime/serviceRuntime.js";
import type { ChatStoreLike } from "../services/ChatStore.js";
import type { AnswerRun, SessionCoordinator } from "../services/SessionCoordinator.js";
import { logger } from "../utils/logger.js";

const HEARTBEAT_INTERVAL_MS = 15_000;

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

const questionBodySchema = z.object({
  content: z.string().max(20_000)
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(100)
});

const summaryQuerySchema = z.object({
  maxLength: z.coerce.number().int().min(1).max(10_000).optional()
});

interface CreateChatRouterOptions {
  chatStore?: ChatStoreLike;
  coordinator?: SessionCoordinator;
  heartbeatIntervalMs?: number;
}

function wantsSse(req: Request): boolean {
  const accepts = req.headers.accept ?? "";
  const streamFlag = req.query.stream;
  const streamRequested =
    typeof streamFlag === "string" && streamFlag.toLowerCase() === "true";
  return accepts.includes("text/event-stream") || streamRequested;
}

function sendSseEvent(res: Response, eventName: string, payload: unknown): void {
  res.write(`event: ${eventName}\n`);
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

function sendSessionError(res: Response, error: unknown, sessionId: string): Response {
  if (error instanceof SessionNotFoundError) {
    return res.status(404).json({ error: "Session not found" });
  }
  if (error instanceof SessionBusyError) {
    return res.status(409).json({ error: error.message });
  }
  if (error instanceof SessionRecreationError) {
    logger.error({ err: error, sessionId }, "Chat session could not be recreated");
    return res.status(500).json({ error: error.message });
  }

  logger.error({ err: error, sessionId }, "Chat request failed");
  return res.status(500).json({ error: "Failed to process chat message" });
}

export function createChatRouter(options: CreateChatRouterOptions = {}): Router {
  const chatStore = options.chatStore ?? getChatStoreSingleton();
  const coordinator = options.coordinator ?? getSessionCoordinatorSingleton();
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;

  const chatRouter = Router();

  chatRouter.get("/", validate({ query: listSessionsQuerySchema }), (req, res) => {
    const { limit } = listSessionsQuerySchema.parse(req.query);
    const response: ListChatSessionsResponse = {
      sessions: chatStore.listSessions(limit)
    };
    res.json(response);
  });

  chatRouter.get("/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const sessionWithMessages = chatStore.getSessionWithMessages(req.params.id ?? "");
    if (!sessionWithMessages) {
      return res.status(404).json({ error: "Session not found" });
    }

    const response: ChatSessionDetailResponse = {
      session: {
        ...sessionWithMessages.session,
        messages: sessionWithMessages.messages
      }
    };
    return res.json(response);
  });

  chatRouter.delete("/:id", validate({ params: sessionParamsSchema }), async (req, res) => {
    try {
      const deleted = await coordinator.delete(req.params.id ?? "");
      if (!deleted) {
        return res.status(404).json({ error: "Session not found" });
      }
      return res.status(204).send();
    } catch (error) {
      logger.error({ err: error, sessionId: req.params.id }, "Chat session deletion failed");
      return res.status(500).json({ error: "Failed to delete chat session" });
    }
  });

  chatRouter.post("/:id/stop", validate({ params: sessionParamsSchema }), (req, res) => {
    const response: StopGenerationResponse = {
      status: coordinator.stop(req.params.id ?? "")
    };
    res.json(response);
  });

  chatRouter.post(
    "/:id/messages",
    validate({
      params: sessionParamsSchema,
      body: questionBodySchema
    }),
    async (req, res) => {
      const sessionId = req.params.id ?? "";
      let run: AnswerRun | null = null;
      let closed = false;
      // A client that leaves at any point stops its own generation.
      res.on("close", () => {
        if (res.writableEnded) {
          return;
        }
        closed = true;
        run?.cancel();
      });

      try {
        run = await coordinator.ask(sessionId, req.body.content);
      } catch (error) {
        return sendSessionError(res, error, sessionId);
      }
      if (closed) {
        run.cancel();
      }
      const { events } = run;

      if (!wantsSse(req)) {
        let result: AnswerTerminalEvent | null = null;
        try {
          for await (const event of events) {
            if (event.type !== "token") {
              result = event;
            }
          }
        } catch (error) {
          return sendSessionError(res, error, sessionId);
        }
        if (closed) {
          return;
        }
        if (!result) {
          return res.status(500).json({ error: "Answer ended without a result" });
        }

        const response: CreateChatMessageResponse = { sessionId, result };
        return res.json(response);
      }

      res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
      res.setHeader("Cache-Control", "no-cache, no-transform");
      res.setHeader("Connection", "keep-alive");
      res.flushHeaders();

      sendSseEvent(res, "ack", { sessionId });
      const heartbeat = setInterval(() => {
        res.write(": heartbeat\n\n");
      }, heartbeatIntervalMs);
      res.on("close", () => {
        clearInterval(heartbeat);
      });

      try {
        // Keep draining after a disconnect so the generation settles as stopped.
        for await (const event of events) {
          if (!closed) {
            sendSseEvent(res, event.type, event);
          }
        }
      } catch (error) {
        logger.error({ err: error, sessionId }, "Chat stream failed");
        if (!closed) {
          sendSseEvent(res, "error", {
            type: "error",
            content: "Failed to process chat stream",
            category: "unknown"
          });
        }
      } finally {
        clearInterval(heartbeat);
        if (!closed) {
          res.end();
        }
      }
    }
  );

  chatRouter.post(
    "/:id/answer",
    validate({
      params: sessionParamsSchema,
      body: questionBodySchema
    }),
    async (req, res) => {
      const sessionId = req.params.id ?? "";
      try {
        const response: AnswerWithSourcesResponse = await coordinator.answerWithSources(
          sessionId,
          req.body.content
        );
        return res.json(response);
      } catch (error) {
        return sendSessionError(res, error, sessionId);
      }
    }
  );

  chatRouter.get(
    "/:id/summary",
    validate({ params: sessionParamsSchema, query: summaryQuerySchema }),
    async (req, res) => {
      const sessionId = req.params.id ?? "";
      const { maxLength } = summaryQuerySchema.parse(req.query);
      try {
        const response: DocumentSummaryResponse = {
          summary: await coordinator.summarize(sessionId, maxLength)
        };
        return res.json(response);
      } catch (error) {
        return sendSessionError(res, error, sessionId);
      }
    }
  );

  chatRouter.get("/:id/suggestions", validate({ params: sessionParamsSchema }), async (req, res) => {
    const sessionId = req.params.id ?? "";
    try {
      const response: SuggestedQuestionsResponse = {
        questions: await coordinator.suggestQuestions(sessionId)
      };
      return res.json(response);
    } catch (error) {
      return sendSessionError(res, error, sessionId);
    }
  });

  return chatRouter;
}
