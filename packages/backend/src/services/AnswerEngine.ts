import type { AnswerStreamEvent, AnswerTerminalEvent, ChatSource } from "@docchat/shared";
import { appConfig } from "../config.js";
import {
  DOCUMENT_SUMMARY_QUESTION,
  SUGGESTION_SEED_QUERY,
  buildAnswerPrompt,
  buildSuggestionPrompt
} from "../prompts/index.js";
import { logger } from "../utils/logger.js";
import { CancellationToken } from "./CancellationToken.js";
import type { EmbeddingIndex, ScoredChunk } from "./EmbeddingIndex.js";
import type { LanguageModel } from "./llmTypes.js";
import { classifyModelError, remediationMessage } from "./modelErrors.js";
import type { Retriever } from "./Retriever.js";

export const INVALID_QUESTION_MESSAGE = "Please provide a valid question.";
export const STOPPED_EVENT_CONTENT = "[Response stopped by user]";
export const STOPPED_ANSWER = "Chat stopped by user.";
export const EMPTY_ANSWER_FALLBACK = "I couldn't generate an answer.";
export const SUMMARY_UNAVAILABLE = "Unable to generate document summary.";

export interface AnswerEngineOptions {
  maxRetries: number;
  /** Retry n waits n × this value: 2s, 4s, 6s with the default. */
  retryBaseDelayMs: number;
  snippetLength: number;
  summaryMaxLength: number;
  suggestionCount: number;
  sessionId?: string;
}

export interface AnswerWithSources {
  answer: string;
  sources: ChatSource[];
  confidence: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AnswerEngineDeps {
  sleep?: Sleep;
}

const defaultOptions: AnswerEngineOptions = {
  maxRetries: appConfig.ANSWER_MAX_RETRIES,
  retryBaseDelayMs: appConfig.ANSWER_RETRY_BASE_DELAY_MS,
  snippetLength: 200,
  summaryMaxLength: 500,
  suggestionCount: 5
};

/** Resolves after `ms`, or as soon as `signal` aborts, clearing the timer. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function toAnswerWithSources(result: AnswerTerminalEvent): AnswerWithSources {
  if (result.type !== "complete") {
    return {
      answer: result.type === "stopped" ? STOPPED_ANSWER : result.content,
      sources: [],
      confidence: 0
    };
  }
  return {
    answer: result.content,
    sources: result.sources,
    confidence: Math.min(1, result.sources.length / 4)
  };
}

const stoppedEvent = (): AnswerStreamEvent => ({ type: "stopped", content: STOPPED_EVENT_CONTENT });

/**
 * Answers questions about one indexed document. Generation stops cooperatively:
 * the cancellation token is checked before every emitted token, and aborting
 * it also aborts the in-flight model request.
 */
export class AnswerEngine {
  private readonly options: AnswerEngineOptions;
  private readonly sleep: Sleep;

  constructor(
    private readonly index: EmbeddingIndex,
    private readonly retriever: Retriever,
    private readonly llm: LanguageModel,
    options: Partial<AnswerEngineOptions> = {},
    deps: AnswerEngineDeps = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.sleep = deps.sleep ?? sleep;
  }

  async *stream(
    question: string,
    token: CancellationToken = new CancellationToken()
  ): AsyncGenerator<AnswerStreamEvent> {
    if (question.trim().length === 0) {
      yield { type: "complete", content: INVALID_QUESTION_MESSAGE, sources: [] };
      return;
    }
    if (token.cancelled) {
      yield stoppedEvent();
      return;
    }

    let retrieved: ScoredChunk[];
    try {
      retrieved = await this.retriever.retrieve(this.index, question);
    } catch (error) {
      const classified = classifyModelError(error);
      logger.error({ sessionId: this.options.sessionId, err: error }, "Retrieval failed");
      yield { type: "error", content: remediationMessage(classified), category: classified.category };
      return;
    }

    const prompt = buildAnswerPrompt(retrieved.map((item) => item.chunk.text).join("\n\n"), question);
    const sources = retrieved.map((item) => this.toSource(item));

    for (let attempt = 0; ; attempt += 1) {
      if (token.cancelled) {
        yield stoppedEvent();
        return;
      }

      const controller = new AbortController();
      const unsubscribe = token.onCancel(() => controller.abort());
      let answer = "";
      let failed = false;
      let failure: unknown;

      try {
        for await (const delta of this.llm.chatCompletion(prompt, { signal: controller.signal })) {
          if (token.cancelled) {
            break;
          }
          if (delta.length === 0) {
            continue;
          }
          answer += delta;
          yield { type: "token", content: delta };
        }
      } catch (error) {
        failed = true;
        failure = error;
      } finally {
        unsubscribe();
      }

      if (token.cancelled) {
        logger.info({ sessionId: this.options.sessionId, emittedChars: answer.length }, "Generation stopped");
        yield stoppedEvent();
        return;
      }

      if (!failed) {
        if (answer.length === 0) {
          answer = EMPTY_ANSWER_FALLBACK;
          yield { type: "token", content: answer };
        }
        yield { type: "complete", content: answer, sources };
        return;
      }

      const classified = classifyModelError(failure);
      // Output already sent cannot be taken back, so only a clean failure is retried.
      if (classified.retryable && answer.length === 0 && attempt < this.options.maxRetries) {
        const delayMs = this.options.retryBaseDelayMs * (attempt + 1);
        logger.warn(
          { sessionId: this.options.sessionId, attempt: attempt + 1, delayMs, err: failure },
          "Transient model failure, retrying"
        );
        await this.backoff(delayMs, token);
        continue;
      }

      logger.error(
        { sessionId: this.options.sessionId, category: classified.category, attempts: attempt + 1, err: failure },
        "Answer generation failed"
      );
      yield { type: "error", content: remediationMessage(classified), category: classified.category };
      return;
    }
  }

  async answer(question: string, token?: CancellationToken): Promise<string> {
    const result = await this.collect(question, token);
    switch (result.type) {
      case "complete":
      case "error":
        return result.content;
      case "stopped":
        return STOPPED_ANSWER;
    }
  }

  async answerWithSources(question: string, token?: CancellationToken): Promise<AnswerWithSources> {
    return toAnswerWithSources(await this.collect(question, token));
  }

  async summarize(maxLength = this.options.summaryMaxLength, token?: CancellationToken): Promise<string> {
    const result = await this.collect(DOCUMENT_SUMMARY_QUESTION, token);
    if (result.type !== "complete") {
      return SUMMARY_UNAVAILABLE;
    }
    return result.content.length > maxLength ? `${result.content.slice(0, maxLength)}...` : result.content;
  }

  async suggestQuestions(token: CancellationToken = new CancellationToken()): Promise<string[]> {
    if (token.cancelled) {
      return [];
    }
    const controller = new AbortController();
    const unsubscribe = token.onCancel(() => controller.abort());
    try {
      const samples = await this.retriever.retrieve(
        this.index,
        SUGGESTION_SEED_QUERY,
        3,
        Number.POSITIVE_INFINITY
      );
      if (samples.length === 0) {
        return [];
      }

      const content = samples.map((item) => item.chunk.text.slice(0, 300)).join("\n");
      const response = await this.llm.generate(buildSuggestionPrompt(content), { signal: controller.signal });
      return token.cancelled ? [] : parseSuggestedQuestions(response).slice(0, this.options.suggestionCount);
    } catch (error) {
      if (token.cancelled) {
        logger.info({ sessionId: this.options.sessionId }, "Question suggestion stopped");
        return [];
      }
      logger.error({ sessionId: this.options.sessionId, err: error }, "Question suggestion failed");
      return [];
    } finally {
      unsubscribe();
    }
  }

  /** Runs the answer stream to its terminal event. */
  async collect(question: string, token?: CancellationToken): Promise<AnswerTerminalEvent> {
    for await (const event of this.stream(question, token)) {
      if (event.type !== "token") {
        return event;
      }
    }
    throw new Error("Answer stream ended without a terminal event");
  }

  private async backoff(delayMs: number, token: CancellationToken): Promise<void> {
    const controller = new AbortController();
    const cancelled = new Promise<void>((resolve) => {
      controller.signal.addEventListener("abort", () => resolve(), { once: true });
    });
    const unsubscribe = token.onCancel(() => controller.abort());
    try {
      await Promise.race([this.sleep(delayMs, controller.signal), cancelled]);
    } finally {
      unsubscribe();
      // Releases the timer of a sleep still pending when the backoff ends.
      controller.abort();
    }
  }

  private toSource({ chunk, distance }: ScoredChunk): ChatSource {
    const snippet =
      chunk.text.length > this.options.snippetLength
        ? `${chunk.text.slice(0, this.options.snippetLength)}...`
        : chunk.text;
    return { chunkIndex: chunk.index, snippet, distance };
  }
}

/** Pulls questions out of a numbered or bulleted list. */
export function parseSuggestedQuestions(response: string): string[] {
  const questions: string[] = [];
  for (const rawLine of response.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line.length === 0) {
      continue;
    }

    const numbered = /^\d+[.)]\s*(.*)$/.exec(line);
    if (numbered) {
      line = (numbered[1] ?? "").trim();
    } else if (line.startsWith("-") || line.startsWith("*")) {
      line = line.slice(1).trim();
    }

    if (line.includes("?")) {
      questions.push(line);
    }
  }
  return questions;
}
