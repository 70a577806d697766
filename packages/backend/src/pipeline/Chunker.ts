import { RecursiveCharacterTextSplitter } from "langchain/text_splitter";
import type { Chunk, ChunkStats } from "@docchat/shared";
import { appConfig } from "../config.js";

export type TokenLengthFunction = (text: string) => number;

export interface ChunkerOptions {
  maxTokens: number;
  overlapTokens: number;
  /** Chunks shorter than this many characters are dropped after splitting. */
  minLength: number;
  tokenLength: TokenLengthFunction;
}

export const CHUNK_SEPARATORS = ["\n\n", "\n", " ", ""];

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

const defaultOptions: ChunkerOptions = {
  maxTokens: appConfig.CHUNK_MAX_TOKENS,
  overlapTokens: appConfig.CHUNK_OVERLAP_TOKENS,
  minLength: appConfig.CHUNK_MIN_LENGTH,
  tokenLength: estimateTokens
};

const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

/**
 * Unifies line endings, removes control characters, collapses runs of
 * horizontal whitespace and limits blank lines to one paragraph break.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(CONTROL_CHARACTERS, "")
    .replace(/[^\S\n]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export class Chunker {
  private readonly options: ChunkerOptions;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = {
      ...defaultOptions,
      ...options
    };

    if (!Number.isInteger(this.options.maxTokens) || this.options.maxTokens < 1) {
      throw new RangeError(`maxTokens must be a positive integer, got ${this.options.maxTokens}`);
    }
    if (this.options.overlapTokens < 0 || this.options.overlapTokens >= this.options.maxTokens) {
      throw new RangeError(
        `overlapTokens must be in [0, ${this.options.maxTokens}), got ${this.options.overlapTokens}`
      );
    }
  }

  get maxTokens(): number {
    return this.options.maxTokens;
  }

  tokenLength(text: string): number {
    return this.options.tokenLength(text);
  }

  async chunk(text: string, sourceId = "document"): Promise<Chunk[]> {
    const normalized = normalizeText(text);
    if (normalized.length === 0) {
      return [];
    }

    const splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.options.maxTokens,
      chunkOverlap: this.options.overlapTokens,
      separators: CHUNK_SEPARATORS,
      lengthFunction: this.options.tokenLength
    });

    const pieces = await splitter.splitText(normalized);
    return pieces
      .map((piece) => piece.trim())
      .filter((piece) => piece.length > 0 && piece.length >= this.options.minLength)
      .map((piece, index) => ({
        text: piece,
        index,
        sourceId,
        tokenCount: this.options.tokenLength(piece),
        charCount: piece.length
      }));
  }
}

export function chunkStats(chunks: readonly Chunk[]): ChunkStats {
  if (chunks.length === 0) {
    return {
      totalChunks: 0,
      totalTokens: 0,
      totalCharacters: 0,
      avgTokensPerChunk: 0,
      avgCharactersPerChunk: 0,
      maxTokens: 0,
      minTokens: 0
    };
  }

  const tokenCounts = chunks.map((chunk) => chunk.tokenCount);
  const totalTokens = tokenCounts.reduce((sum, count) => sum + count, 0);
  const totalCharacters = chunks.reduce((sum, chunk) => sum + chunk.charCount, 0);

  return {
    totalChunks: chunks.length,
    totalTokens,
    totalCharacters,
    avgTokensPerChunk: totalTokens / chunks.length,
    avgCharactersPerChunk: totalCharacters / chunks.length,
    maxTokens: Math.max(...tokenCounts),
    minTokens: Math.min(...tokenCounts)
  };
}
