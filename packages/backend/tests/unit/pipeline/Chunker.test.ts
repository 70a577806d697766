import { describe, expect, it } from "vitest";
import { Chunker, chunkStats, estimateTokens, normalizeText } from "../../../src/pipeline/Chunker.js";
import { makeChunk } from "../../helpers/chunks.js";

function buildDocument(): string {
  const sentences = Array.from(
    { length: 40 },
    (_, i) => `Sentence number ${i} talks about topic ${i % 7} in some detail.`
  );
  const paragraphs: string[] = [];
  for (let i = 0; i < sentences.length; i += 5) {
    paragraphs.push(sentences.slice(i, i + 5).join(" "));
  }
  return paragraphs.join("\n\n");
}

describe("Chunker", () => {
  it("returns no chunks for empty or blank input", async () => {
    const chunker = new Chunker({ minLength: 0 });

    expect(await chunker.chunk("")).toEqual([]);
    expect(await chunker.chunk("   \n\n\t ")).toEqual([]);
  });

  it("keeps every chunk within the token limit and covers every word", async () => {
    const text = buildDocument();
    const normalized = normalizeText(text);
    const chunker = new Chunker({ maxTokens: 50, overlapTokens: 10, minLength: 0 });

    const chunks = await chunker.chunk(text, "doc-1");

    expect(chunks.length).toBeGreaterThan(1);
    chunks.forEach((chunk, position) => {
      expect(chunk.index).toBe(position);
      expect(chunk.sourceId).toBe("doc-1");
      expect(chunk.tokenCount).toBeLessThanOrEqual(50);
      expect(chunk.tokenCount).toBe(estimateTokens(chunk.text));
      expect(chunk.charCount).toBe(chunk.text.length);
      expect(normalized.includes(chunk.text)).toBe(true);
    });

    const chunkWords = new Set(chunks.flatMap((chunk) => chunk.text.split(/\s+/)));
    for (const word of new Set(normalized.split(/\s+/))) {
      expect(chunkWords.has(word)).toBe(true);
    }
  });

  it("drops pieces shorter than the minimum length", async () => {
    const text = "A short note about testing.";

    expect(await new Chunker({ minLength: 50 }).chunk(text)).toEqual([]);
    expect(await new Chunker({ minLength: 0 }).chunk(text)).toEqual([
      { text, index: 0, sourceId: "document", tokenCount: 7, charCount: 27 }
    ]);
  });

  it("uses a pluggable token length function", async () => {
    const wordCount = (value: string) => value.split(/\s+/).filter(Boolean).length;
    const chunker = new Chunker({ maxTokens: 12, overlapTokens: 0, minLength: 0, tokenLength: wordCount });

    const chunks = await chunker.chunk(buildDocument());

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(wordCount(chunk.text)).toBeLessThanOrEqual(12);
      expect(chunk.tokenCount).toBe(wordCount(chunk.text));
    }
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => new Chunker({ maxTokens: 10, overlapTokens: 10 })).toThrow(RangeError);
    expect(() => new Chunker({ maxTokens: 0, overlapTokens: 0 })).toThrow(RangeError);
  });
});

describe("normalizeText", () => {
  it("unifies whitespace and strips control characters", () => {
    expect(normalizeText("  Line one\r\n\r\n\r\n\tLine\u0007 two  ")).toBe("Line one\n\nLine two");
  });
});

describe("chunkStats", () => {
  it("summarizes token and character counts", () => {
    const stats = chunkStats([makeChunk("abcdefghij", 0), makeChunk("abcdefghijabcdefghij", 1)]);

    expect(stats).toEqual({
      totalChunks: 2,
      totalTokens: 8,
      totalCharacters: 30,
      avgTokensPerChunk: 4,
      avgCharactersPerChunk: 15,
      maxTokens: 5,
      minTokens: 3
    });
  });

  it("returns zeros for no chunks", () => {
    expect(chunkStats([])).toEqual({
      totalChunks: 0,
      totalTokens: 0,
      totalCharacters: 0,
      avgTokensPerChunk: 0,
      avgCharactersPerChunk: 0,
      maxTokens: 0,
      minTokens: 0
    });
  });
});
