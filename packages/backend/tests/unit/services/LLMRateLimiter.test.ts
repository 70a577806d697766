import { describe, expect, it } from "vitest";
import { LLMRateLimiter, QueuedRequestAbortedError } from "../../../src/services/LLMRateLimiter.js";
import { FakeApiError } from "../../helpers/FakeLLMService.js";

function createLimiter(overrides: ConstructorParameters<typeof LLMRateLimiter>[0] = {}): LLMRateLimiter {
  return new LLMRateLimiter({
    maxConcurrent: 1,
    maxRetries: 3,
    retryDelayMs: 1,
    requestsPerMinute: 100,
    timeoutMs: 5000,
    ...overrides
  });
}

describe("LLMRateLimiter", () => {
  it("retries retryable failures with exponential backoff", async () => {
    const limiter = createLimiter();

    let attempt = 0;
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt < 3) {
        throw new FakeApiError(429);
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("does not retry permanent failures", async () => {
    const limiter = createLimiter();

    let attempt = 0;
    await expect(
      limiter.run(async () => {
        attempt += 1;
        throw new FakeApiError(401);
      })
    ).rejects.toThrow("Request failed with status 401");
    expect(attempt).toBe(1);
  });

  it("lets a single call opt out of retrying", async () => {
    const limiter = createLimiter();

    let attempt = 0;
    await expect(
      limiter.run(
        async () => {
          attempt += 1;
          throw new FakeApiError(503);
        },
        { maxRetries: 0 }
      )
    ).rejects.toBeInstanceOf(FakeApiError);
    expect(attempt).toBe(1);
  });

  it("rejects calls that exceed the timeout", async () => {
    const limiter = createLimiter({ maxRetries: 0, timeoutMs: 10 });

    await expect(
      limiter.run(
        () =>
          new Promise((resolve) => {
            setTimeout(resolve, 200);
          })
      )
    ).rejects.toThrow("LLM request timeout after 10ms");
  });

  it("honors maxConcurrent", async () => {
    const limiter = createLimiter({ maxConcurrent: 2, maxRetries: 0 });

    let inFlight = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }).map((_, idx) =>
        limiter.run(async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => {
            setTimeout(resolve, 20 + idx * 2);
          });
          inFlight -= 1;
          return idx;
        })
      )
    );

    expect(peak).toBe(2);
  });

  it("drops a queued call when its signal aborts", async () => {
    const limiter = createLimiter({ maxConcurrent: 1, maxRetries: 0 });
    let releaseFirst: () => void = () => undefined;
    const first = limiter.run(
      () =>
        new Promise<string>((resolve) => {
          releaseFirst = () => resolve("first");
        })
    );
    const controller = new AbortController();
    let secondStarted = false;
    const second = limiter.run(
      async () => {
        secondStarted = true;
        return "second";
      },
      { signal: controller.signal }
    );

    expect(limiter.pending).toBe(1);
    controller.abort();

    await expect(second).rejects.toBeInstanceOf(QueuedRequestAbortedError);
    expect(limiter.pending).toBe(0);
    releaseFirst();
    await expect(first).resolves.toBe("first");
    expect(secondStarted).toBe(false);
  });

  it("rejects at once when the signal is already aborted", async () => {
    const limiter = createLimiter();
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.run(async () => "never", { signal: controller.signal })).rejects.toThrow(
      "Model request aborted while waiting for a free slot"
    );
  });
});
