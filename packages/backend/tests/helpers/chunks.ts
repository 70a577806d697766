import type { Chunk } from "@docchat/shared";

export function makeChunk(text: string, index: number, sourceId = "test-doc"): Chunk {
  return {
    text,
    index,
    sourceId,
    tokenCount: Math.ceil(text.length / 4),
    charCount: text.length
  };
}

export function makeChunks(texts: string[], sourceId = "test-doc"): Chunk[] {
  return texts.map((text, index) => makeChunk(text, index, sourceId));
}
