import { randomBytes } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { AnswerStreamEvent, ChatSession } from "@docchat/shared";
import { appConfig } from "../config.js";
import {
  IngestionError,
  SessionBusyError,
  SessionNotFoundError,
  SessionRecreationError,
  UnsupportedFormatError,
  errorMessage
} from "../errors.js";
import { sanitizeFilename } from "../parsers/fileValidator.js";
import type { DocumentPipeline } from "../pipeline/DocumentPipeline.js";
import type { DocumentPipelineResult } from "../pipeline/types.js";
import { logger } from "../utils/logger.js";
import { AnswerEngine, INVALID_QUESTION_MESSAGE, toAnswerWithSources } from "./AnswerEngine.js";
import type { AnswerEngineDeps, AnswerEngineOptions, AnswerWithSources } from "./AnswerEngine.js";
import { CancellationToken } from "./CancellationToken.js";
import type { ChatStoreLike } from "./ChatStore.js";
import type { EmbeddingIndex } from "./EmbeddingIndex.js";
import type { LanguageModel } from "./llmTypes.js";
import type { Retriever } from "./Retriever.js";

const TITLE_MAX_LENGTH = 50;
const DAY_MS = 24 * 60 * 60 * 1000;

export type SessionState = "unloaded" | "loading" | "ready" | "answering";

export interface SessionCoordinatorOptions {
  store: ChatStoreLike;
  pipeline: DocumentPipeline;
  retriever: Retriever;
  llm: LanguageModel;
  uploadsDir?: string;
  engineOptions?: Partial<AnswerEngineOptions>;
  engineDeps?: AnswerEngineDeps;
  createId?: () => string;
}

export interface UploadedDocument {
  originalName: string;
  buffer: Buffer;
}

export interface CreatedSession {
  session: ChatSession;
  chunkCount: number;
  message: string;
}

export interface AnswerRun {
  events: AsyncGenerator<AnswerStreamEvent>;
  /** Stops this run only; a later generation on the same session is left alone. */
  cancel(): void;
}

export interface CoordinatorStats {
  residentSessions: number;
  activeGenerations: number;
}

class GenerationState {
  readonly token = new CancellationToken();
  readonly startedAt = Date.now();

  get cancelRequested(): boolean {
    return this.token.cancelled;
  }
}

interface ResidentSession {
  id: string;
  engine: AnswerEngine;
  chunkCount: number;
  generation: GenerationState | null;
}

async function* invalidQuestionEvents(): AsyncGenerator<AnswerStreamEvent> {
  yield { type: "complete", content: INVALID_QUESTION_MESSAGE, sources: [] };
}

export function createChatId(now = new Date()): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}_${time}_${pad(now.getUTCMilliseconds(), 3)}_${randomBytes(2).toString("hex")}`;
}

export function initialAssistantMessage(filename: string, chunkCount: number): string {
  return `Document '${filename}' processed successfully! I've analyzed ${chunkCount} chunks of text. You can now ask me questions about this document.`;
}

export function titleFromQuestion(question: string): string {
  const trimmed = question.trim();
  return trimmed.length > TITLE_MAX_LENGTH ? `${trimmed.slice(0, TITLE_MAX_LENGTH)}...` : trimmed;
}

/**
 * Owns the resident answer engine of every loaded session. The durable store
 * is the source of truth; residents are a cache that is rebuilt from the
 * stored document whenever a session is queried without one.
 */
export class SessionCoordinator {
  private readonly sessions = new Map<string, ResidentSession>();
  private readonly loading = new Map<string, Promise<ResidentSession>>();
  private readonly store: ChatStoreLike;
  private readonly pipeline: DocumentPipeline;
  private readonly retriever: Retriever;
  private readonly llm: LanguageModel;
  private readonly uploadsDir: string;
  private readonly engineOptions: Partial<AnswerEngineOptions>;
  private readonly engineDeps: AnswerEngineDeps;
  private readonly createId: () => string;

  constructor(options: SessionCoordinatorOptions) {
    this.store = options.store;
    this.pipeline = options.pipeline;
    this.retriever = options.retriever;
    this.llm = options.llm;
    this.uploadsDir = resolve(options.uploadsDir ?? appConfig.UPLOADS_DIR);
    this.engineOptions = options.engineOptions ?? {};
    this.engineDeps = options.engineDeps ?? {};
    this.createId = options.createId ?? (() => createChatId());
  }

  getState(sessionId: string): SessionState {
    const resident = this.sessions.get(sessionId);
    if (resident) {
      return resident.generation ? "answering" : "ready";
    }
    return this.loading.has(sessionId) ? "loading" : "unloaded";
  }

  /** Writes the upload to disk and ingests it; nothing is left behind when any step fails. */
  async createFromUpload(upload: UploadedDocument): Promise<CreatedSession> {
    const id = this.createId();
    const filename = sanitizeFilename(upload.originalName);
    const documentPath = join(this.uploadsDir, `${id}_${filename}`);
    let recordCreated = false;

    try {
      await mkdir(this.uploadsDir, { recursive: true });
      await writeFile(documentPath, upload.buffer);

      const { index, stats } = await this.pipeline.ingest(id, documentPath);
      const session = this.store.createSession({
        id,
        title: upload.originalName,
        documentFilename: upload.originalName,
        documentPath,
        chunkCount: stats.totalChunks
      });
      recordCreated = true;

      const message = initialAssistantMessage(upload.originalName, stats.totalChunks);
      this.store.appendMessage({ sessionId: id, role: "assistant", content: message });

      this.sessions.set(id, {
        id,
        engine: this.createEngine(id, index),
        chunkCount: stats.totalChunks,
        generation: null
      });
      logger.info({ sessionId: id, filename: upload.originalName, chunkCount: stats.totalChunks }, "Chat session created");

      return { session, chunkCount: stats.totalChunks, message };
    } catch (error) {
      await this.removeDocument(id, documentPath);
      if (recordCreated) {
        this.store.deleteSession(id);
      }
      if (error instanceof UnsupportedFormatError) {
        throw error;
      }
      throw new IngestionError(`Failed to process document ${upload.originalName}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  /**
   * Claims the session for one answer. Lookup, rehydration and the busy check
   * settle before this resolves, and the question is recorded; the returned
   * events must then be consumed (or closed after the first step) to release it.
   */
  async ask(sessionId: string, question: string): Promise<AnswerRun> {
    if (question.trim().length === 0) {
      return { events: invalidQuestionEvents(), cancel: () => undefined };
    }

    const resident = await this.ensureLoaded(sessionId);
    const generation = this.claimGeneration(resident);
    try {
      this.recordUserMessage(sessionId, question);
    } catch (error) {
      this.releaseGeneration(resident, generation);
      throw error;
    }

    return {
      events: this.streamAnswer(resident, generation, question),
      cancel: () => {
        this.cancelGeneration(sessionId, generation);
      }
    };
  }

  stop(sessionId: string): "stopped" | "idle" {
    const generation = this.sessions.get(sessionId)?.generation;
    if (!generation) {
      return "idle";
    }
    this.cancelGeneration(sessionId, generation);
    return "stopped";
  }

  /** Drops the resident engine only; durable state is untouched. */
  evict(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  async delete(sessionId: string): Promise<boolean> {
    const session = this.store.getSession(sessionId);
    if (!session && !this.sessions.has(sessionId)) {
      return false;
    }

    this.stop(sessionId);
    this.evict(sessionId);
    if (session?.documentPath) {
      await this.removeDocument(sessionId, session.documentPath);
    }
    this.store.deleteSession(sessionId);
    logger.info({ sessionId }, "Chat session deleted");
    return true;
  }

  /** Non-streaming answer; the exchange is recorded like a streamed one. */
  async answerWithSources(sessionId: string, question: string): Promise<AnswerWithSources> {
    if (question.trim().length === 0) {
      return toAnswerWithSources({ type: "complete", content: INVALID_QUESTION_MESSAGE, sources: [] });
    }

    return this.withGeneration(sessionId, async (resident, generation) => {
      this.recordUserMessage(sessionId, question);
      const result = await resident.engine.collect(question, generation.token);
      if (result.type === "complete") {
        this.store.appendMessage({
          sessionId,
          role: "assistant",
          content: result.content,
          sources: result.sources
        });
      }
      return toAnswerWithSources(result);
    });
  }

  async summarize(sessionId: string, maxLength?: number): Promise<string> {
    return this.withGeneration(sessionId, (resident, generation) =>
      resident.engine.summarize(maxLength, generation.token)
    );
  }

  async suggestQuestions(sessionId: string): Promise<string[]> {
    return this.withGeneration(sessionId, (resident, generation) =>
      resident.engine.suggestQuestions(generation.token)
    );
  }

  async cleanupOlderThan(daysOld: number, now = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - daysOld * DAY_MS);
    let deleted = 0;
    for (const session of this.store.listSessionsOlderThan(cutoff)) {
      if (await this.delete(session.id)) {
        deleted += 1;
      }
    }
    logger.info({ daysOld, deleted }, "Old chat sessions cleaned up");
    return deleted;
  }

  stats(): CoordinatorStats {
    let activeGenerations = 0;
    for (const resident of this.sessions.values()) {
      if (resident.generation) {
        activeGenerations += 1;
      }
    }
    return { residentSessions: this.sessions.size, activeGenerations };
  }

  private async *streamAnswer(
    resident: ResidentSession,
    generation: GenerationState,
    question: string
  ): AsyncGenerator<AnswerStreamEvent> {
    const sessionId = resident.id;
    try {
      for await (const event of resident.engine.stream(question, generation.token)) {
        if (event.type !== "complete") {
          yield event;
          continue;
        }

        try {
          this.store.appendMessage({
            sessionId,
            role: "assistant",
            content: event.content,
            sources: event.sources
          });
        } catch (error) {
          logger.error({ sessionId, err: error }, "Failed to persist assistant message");
          yield {
            type: "error",
            content: `The answer could not be saved: ${errorMessage(error)}`,
            category: "unknown"
          };
          return;
        }
        yield event;
      }
    } finally {
      this.releaseGeneration(resident, generation);
    }
  }

  private async withGeneration<T>(
    sessionId: string,
    work: (resident: ResidentSession, generation: GenerationState) => Promise<T>
  ): Promise<T> {
    const resident = await this.ensureLoaded(sessionId);
    const generation = this.claimGeneration(resident);
    try {
      return await work(resident, generation);
    } finally {
      this.releaseGeneration(resident, generation);
    }
  }

  /** At most one generation per session, whichever operation started it. */
  private claimGeneration(resident: ResidentSession): GenerationState {
    if (resident.generation) {
      throw new SessionBusyError(resident.id);
    }
    const generation = new GenerationState();
    resident.generation = generation;
    return generation;
  }

  private releaseGeneration(resident: ResidentSession, generation: GenerationState): void {
    if (resident.generation === generation) {
      resident.generation = null;
    }
  }

  private cancelGeneration(sessionId: string, generation: GenerationState): void {
    if (generation.cancelRequested) {
      return;
    }
    generation.token.cancel();
    logger.info({ sessionId, runningMs: Date.now() - generation.startedAt }, "Generation stop requested");
  }

  private ensureLoaded(sessionId: string): Promise<ResidentSession> {
    const resident = this.sessions.get(sessionId);
    if (resident) {
      return Promise.resolve(resident);
    }
    const pending = this.loading.get(sessionId);
    if (pending) {
      return pending;
    }

    const session = this.store.getSession(sessionId);
    if (!session) {
      return Promise.reject(new SessionNotFoundError(sessionId));
    }

    const load = this.rehydrate(session).finally(() => {
      this.loading.delete(sessionId);
    });
    this.loading.set(sessionId, load);
    return load;
  }

  private async rehydrate(session: ChatSession): Promise<ResidentSession> {
    if (!session.documentPath) {
      throw new SessionRecreationError(session.id, { cause: new Error("No document is stored for this session") });
    }

    logger.info({ sessionId: session.id, documentPath: session.documentPath }, "Rehydrating chat session");
    let built: DocumentPipelineResult;
    try {
      built = await this.pipeline.ingest(session.id, session.documentPath);
    } catch (error) {
      throw new SessionRecreationError(session.id, { cause: error });
    }

    // Deleted while loading.
    if (!this.store.sessionExists(session.id)) {
      throw new SessionNotFoundError(session.id);
    }

    const resident: ResidentSession = {
      id: session.id,
      engine: this.createEngine(session.id, built.index),
      chunkCount: built.stats.totalChunks,
      generation: null
    };
    this.sessions.set(session.id, resident);
    return resident;
  }

  private createEngine(sessionId: string, index: EmbeddingIndex): AnswerEngine {
    return new AnswerEngine(index, this.retriever, this.llm, { ...this.engineOptions, sessionId }, this.engineDeps);
  }

  private recordUserMessage(sessionId: string, question: string): void {
    const isFirstQuestion = this.store.countMessages(sessionId, "user") === 0;
    this.store.appendMessage({ sessionId, role: "user", content: question });
    if (isFirstQuestion) {
      this.store.updateSessionTitle(sessionId, titleFromQuestion(question));
    }
  }

  private async removeDocument(sessionId: string, path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error) {
      logger.warn({ sessionId, path, err: error }, "Failed to remove document file");
    }
  }
}
