import { logger } from "../utils/logger.js";
import { classifyModelError } from "./modelErrors.js";
import type { LLMRateLimitConfig } from "./llmTypes.js";

export interface RunOptions {
  /** Overrides the limiter-wide retry count for this call. */
  maxRetries?: number;
  /** Aborting drops the call from the queue if it has not started yet. */
  signal?: AbortSignal;
}

type QueuedStart = () => Promise<void>;

export class QueuedRequestAbortedError extends Error {
  constructor() {
    super("Model request aborted while waiting for a free slot");
    this.name = "AbortError";
  }
}

function retryableByDefault(error: unknown): boolean {
  const { category } = classifyModelError(error);
  return category === "transient" || category === "rate_limited";
}

/** Concurrency cap, requests-per-minute window, per-call timeout and retry for model calls. */
export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedStart[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 60_000,
      isRetryable: config.isRetryable ?? retryableByDefault
    };
  }

  run<T>(task: () => Promise<T>, options: RunOptions = {}): Promise<T> {
    const maxRetries = options.maxRetries ?? this.config.maxRetries;
    const { signal } = options;

    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new QueuedRequestAbortedError());
        return;
      }

      const onAbort = (): void => {
        const position = this.queue.indexOf(start);
        if (position >= 0) {
          this.queue.splice(position, 1);
          reject(new QueuedRequestAbortedError());
        }
      };
      const start: QueuedStart = () => {
        signal?.removeEventListener("abort", onAbort);
        return this.executeTask(task, maxRetries).then(resolve, reject);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(start);
      this.drainQueue();
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const start = this.queue.shift();
      if (!start) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void start().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeTask<T>(task: () => Promise<T>, maxRetries: number): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await this.withTimeout(task(), this.config.timeoutMs);
      } catch (error) {
        if (!this.config.isRetryable(error) || attempt >= maxRetries) {
          throw error;
        }

        attempt += 1;
        const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
        logger.warn({ attempt, backoffMs: backoff, err: error }, "Retrying model request");
        await this.sleep(backoff);
      }
    }
  }

  private withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) {
      return promise;
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`LLM request timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      promise.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (firstInWindow === undefined) {
      return 0;
    }

    return Math.max(0, 60_000 - (Date.now() - firstInWindow));
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
