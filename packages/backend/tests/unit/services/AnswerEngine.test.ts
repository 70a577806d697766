import type { AnswerStreamEvent } from "@docchat/shared";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  AnswerEngine,
  EMPTY_ANSWER_FALLBACK,
  INVALID_QUESTION_MESSAGE,
  STOPPED_ANSWER,
  STOPPED_EVENT_CONTENT,
  SUMMARY_UNAVAILABLE,
  parseSuggestedQuestions,
  type AnswerEngineOptions
} from "../../../src/services/AnswerEngine.js";
import { CancellationToken } from "../../../src/services/CancellationToken.js";
import { Indexer } from "../../../src/services/EmbeddingIndex.js";
import { remediationMessage } from "../../../src/services/modelErrors.js";
import { Retriever } from "../../../src/services/Retriever.js";
import { makeChunks } from "../../helpers/chunks.js";
import { FakeApiError, FakeLLMService } from "../../helpers/FakeLLMService.js";

const texts = [
  "solar panels convert sunlight into electricity",
  "wind turbines generate power from moving air",
  "batteries store electricity for the night"
];

interface Setup {
  engine: AnswerEngine;
  llm: FakeLLMService;
  sleeps: number[];
}

async function setup(
  llm: FakeLLMService = new FakeLLMService(),
  options: Partial<AnswerEngineOptions> = {},
  sleep?: (ms: number) => Promise<void>
): Promise<Setup> {
  const indexer = new Indexer(llm);
  const index = await indexer.build(makeChunks(texts));
  const retriever = new Retriever(indexer, { k: 4, maxDistance: Number.POSITIVE_INFINITY });
  const sleeps: number[] = [];
  const engine = new AnswerEngine(
    index,
    retriever,
    llm,
    { maxRetries: 2, retryBaseDelayMs: 2000, ...options },
    {
      sleep:
        sleep ??
        (async (ms) => {
          sleeps.push(ms);
        })
    }
  );
  return { engine, llm, sleeps };
}

async function collect(
  stream: AsyncGenerator<AnswerStreamEvent>,
  onEvent: (event: AnswerStreamEvent, seen: AnswerStreamEvent[]) => void = () => undefined
): Promise<AnswerStreamEvent[]> {
  const events: AnswerStreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
    onEvent(event, events);
  }
  return events;
}

afterEach(() => {
  vi.useRealTimers();
});

describe("AnswerEngine.stream", () => {
  it("streams tokens that add up to the completed answer", async () => {
    const { engine, llm } = await setup();

    const events = await collect(engine.stream("What do solar panels do?"));

    const tokens = events.filter((event) => event.type === "token").map((event) => event.content);
    const last = events.at(-1);
    expect(tokens).toEqual(["The ", "answer ", "is ", "42."]);
    expect(last?.type).toBe("complete");
    expect(last?.content).toBe(tokens.join(""));
    expect(llm.prompts[0]).toContain("Question: What do solar panels do?");
    expect(llm.prompts[0]).toContain("solar panels convert sunlight into electricity");
  });

  it("reports sources with chunk index, snippet and distance", async () => {
    const { engine } = await setup(new FakeLLMService(), { snippetLength: 10 });

    const events = await collect(engine.stream("solar panels"));
    const last = events.at(-1);

    expect(last?.type).toBe("complete");
    if (last?.type === "complete") {
      expect(last.sources).toHaveLength(3);
      expect(last.sources[0]).toMatchObject({ chunkIndex: 0, snippet: "solar pane..." });
    }
  });

  it("answers a blank question with a validation message and no model call", async () => {
    const { engine, llm } = await setup();

    const events = await collect(engine.stream("   "));

    expect(events).toEqual([{ type: "complete", content: INVALID_QUESTION_MESSAGE, sources: [] }]);
    expect(llm.chatCalls).toBe(0);
  });

  it("ends with stopped and no further tokens when cancelled mid-answer", async () => {
    const { engine, llm } = await setup();
    const token = new CancellationToken();

    const events = await collect(engine.stream("What is it?", token), (event, seen) => {
      if (event.type === "token" && seen.length === 2) {
        token.cancel();
      }
    });

    expect(events).toEqual([
      { type: "token", content: "The " },
      { type: "token", content: "answer " },
      { type: "stopped", content: STOPPED_EVENT_CONTENT }
    ]);
    expect(llm.abortedCalls).toBe(1);
  });

  it("stops before calling the model when already cancelled", async () => {
    const { engine, llm } = await setup();
    const token = new CancellationToken();
    token.cancel();

    const events = await collect(engine.stream("What is it?", token));

    expect(events).toEqual([{ type: "stopped", content: STOPPED_EVENT_CONTENT }]);
    expect(llm.chatCalls).toBe(0);
  });

  it("retries transient failures with growing delays", async () => {
    const llm = new FakeLLMService({ failures: [new FakeApiError(503), new FakeApiError(503)] });
    const { engine, sleeps } = await setup(llm);

    const events = await collect(engine.stream("What is it?"));

    expect(sleeps).toEqual([2000, 4000]);
    expect(llm.chatCalls).toBe(3);
    expect(events.at(-1)).toMatchObject({ type: "complete", content: "The answer is 42." });
  });

  it("gives up after the retry budget with a remediation message", async () => {
    const llm = new FakeLLMService({
      failures: [new FakeApiError(503), new FakeApiError(503), new FakeApiError(503)]
    });
    const { engine, sleeps } = await setup(llm);

    const events = await collect(engine.stream("What is it?"));

    expect(sleeps).toEqual([2000, 4000]);
    expect(events).toEqual([
      {
        type: "error",
        content: remediationMessage({ category: "transient", retryable: true, detail: "" }),
        category: "transient"
      }
    ]);
  });

  it("never retries an authentication failure", async () => {
    const llm = new FakeLLMService({ failures: [new FakeApiError(401)] });
    const { engine, sleeps } = await setup(llm);

    const events = await collect(engine.stream("What is it?"));

    expect(sleeps).toEqual([]);
    expect(llm.chatCalls).toBe(1);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "error", category: "unauthorized" });
  });

  it("does not retry once tokens have been emitted", async () => {
    const llm = new FakeLLMService({ streamError: { afterTokens: 2, error: new FakeApiError(503) } });
    const { engine, sleeps } = await setup(llm);

    const events = await collect(engine.stream("What is it?"));

    expect(events.map((event) => event.type)).toEqual(["token", "token", "error"]);
    expect(sleeps).toEqual([]);
    expect(llm.chatCalls).toBe(1);
  });

  it("stops during the retry backoff", async () => {
    const llm = new FakeLLMService({ failures: [new FakeApiError(503)] });
    const token = new CancellationToken();
    const delays: number[] = [];
    const { engine } = await setup(llm, {}, async (ms) => {
      delays.push(ms);
      token.cancel();
      await new Promise<void>(() => undefined);
    });

    const events = await collect(engine.stream("What is it?", token));

    expect(delays).toEqual([2000]);
    expect(events).toEqual([{ type: "stopped", content: STOPPED_EVENT_CONTENT }]);
    expect(llm.chatCalls).toBe(1);
  });

  it("clears the backoff timer when stopped while waiting", async () => {
    const llm = new FakeLLMService({ failures: [new FakeApiError(503)] });
    const indexer = new Indexer(llm);
    const index = await indexer.build(makeChunks(texts));
    const retriever = new Retriever(indexer, { k: 4, maxDistance: Number.POSITIVE_INFINITY });
    vi.useFakeTimers();
    const engine = new AnswerEngine(index, retriever, llm, { maxRetries: 2, retryBaseDelayMs: 2000 });
    const token = new CancellationToken();

    const first = engine.stream("What is it?", token).next();
    await vi.advanceTimersByTimeAsync(0);
    expect(llm.chatCalls).toBe(1);
    expect(vi.getTimerCount()).toBe(1);

    token.cancel();

    expect(await first).toEqual({ done: false, value: { type: "stopped", content: STOPPED_EVENT_CONTENT } });
    expect(vi.getTimerCount()).toBe(0);
  });

  it("emits a fallback answer when the model returns nothing", async () => {
    const { engine } = await setup(new FakeLLMService({ tokens: [] }));

    const events = await collect(engine.stream("What is it?"));

    expect(events.map((event) => [event.type, event.content])).toEqual([
      ["token", EMPTY_ANSWER_FALLBACK],
      ["complete", EMPTY_ANSWER_FALLBACK]
    ]);
  });

  it("turns an unavailable embedding service into an error event", async () => {
    const { engine, llm } = await setup();
    llm.embeddingError = new Error("connect ECONNREFUSED");

    const events = await collect(engine.stream("What is it?"));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "error", category: "embedding_unavailable" });
    expect(llm.chatCalls).toBe(0);
  });
});

describe("AnswerEngine helpers", () => {
  it("answer returns the full text or the stopped message", async () => {
    const { engine } = await setup();
    const token = new CancellationToken();
    token.cancel();

    expect(await engine.answer("What is it?")).toBe("The answer is 42.");
    expect(await engine.answer("What is it?", token)).toBe(STOPPED_ANSWER);
  });

  it("answerWithSources derives confidence from the number of sources", async () => {
    const { engine } = await setup();

    const result = await engine.answerWithSources("What is it?");

    expect(result.answer).toBe("The answer is 42.");
    expect(result.sources).toHaveLength(3);
    expect(result.confidence).toBe(0.75);
  });

  it("summarize truncates long summaries", async () => {
    const { engine } = await setup(new FakeLLMService({ tokens: ["a".repeat(300), "b".repeat(300)] }));

    expect(await engine.summarize(500)).toBe(`${"a".repeat(300)}${"b".repeat(200)}...`);
    expect(await engine.summarize(600)).toBe(`${"a".repeat(300)}${"b".repeat(300)}`);
  });

  it("suggestQuestions keeps at most five question lines", async () => {
    const llm = new FakeLLMService({
      generateResponse: [
        "1. What is solar power?",
        "2) How do turbines work?",
        "- Why store electricity?",
        "Not a question",
        "* When is wind strongest?",
        "5. Who builds batteries?",
        "6. Where are panels made?"
      ].join("\n")
    });
    const { engine } = await setup(llm);

    expect(await engine.suggestQuestions()).toEqual([
      "What is solar power?",
      "How do turbines work?",
      "Why store electricity?",
      "When is wind strongest?",
      "Who builds batteries?"
    ]);
    expect(llm.prompts.at(-1)).toContain("suggest 5 relevant questions");
  });

  it("summarize and suggestQuestions give up once stopped", async () => {
    const { engine, llm } = await setup();
    const token = new CancellationToken();
    token.cancel();

    expect(await engine.summarize(500, token)).toBe(SUMMARY_UNAVAILABLE);
    expect(await engine.suggestQuestions(token)).toEqual([]);
    expect(llm.chatCalls).toBe(0);
  });

  it("suggestQuestions returns nothing when the model fails", async () => {
    const { engine } = await setup(new FakeLLMService({ failures: [new FakeApiError(500)] }));

    expect(await engine.suggestQuestions()).toEqual([]);
  });
});

describe("parseSuggestedQuestions", () => {
  it("strips list markers and ignores lines without a question mark", () => {
    expect(parseSuggestedQuestions("1. First?\n\n2) Second?\nplain line\n- Third?")).toEqual([
      "First?",
      "Second?",
      "Third?"
    ]);
  });
});
