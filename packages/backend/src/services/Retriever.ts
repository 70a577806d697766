import { appConfig } from "../config.js";
import { estimateTokens } from "../pipeline/Chunker.js";
import type { EmbeddingIndex, Indexer, ScoredChunk } from "./EmbeddingIndex.js";

export interface RetrieverOptions {
  k: number;
  maxDistance: number;
  maxContextTokens: number;
  /** How many neighbours the token-budgeted variant considers before packing. */
  contextCandidates: number;
  tokenLength: (text: string) => number;
}

const defaultOptions: RetrieverOptions = {
  k: appConfig.RETRIEVAL_TOP_K,
  maxDistance: appConfig.RETRIEVAL_MAX_DISTANCE,
  maxContextTokens: appConfig.CONTEXT_MAX_TOKENS,
  contextCandidates: 10,
  tokenLength: estimateTokens
};

export interface RetrievedContext {
  context: string;
  tokenCount: number;
  chunks: ScoredChunk[];
}

export class Retriever {
  private readonly options: RetrieverOptions;

  constructor(
    private readonly indexer: Indexer,
    options: Partial<RetrieverOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  /** Nearest chunks in ascending distance, without any beyond `maxDistance`. */
  async retrieve(
    index: EmbeddingIndex,
    query: string,
    k = this.options.k,
    maxDistance = this.options.maxDistance
  ): Promise<ScoredChunk[]> {
    const results = await this.indexer.query(index, query, k);
    return results.filter((result) => result.distance <= maxDistance);
  }

  async retrieveContext(
    index: EmbeddingIndex,
    query: string,
    options: { maxTokens?: number } = {}
  ): Promise<RetrievedContext> {
    const budget = options.maxTokens ?? this.options.maxContextTokens;
    const candidates = await this.retrieve(index, query, this.options.contextCandidates);

    const selected: ScoredChunk[] = [];
    let tokenCount = 0;
    for (const candidate of candidates) {
      const tokens = this.options.tokenLength(candidate.chunk.text);
      if (tokenCount + tokens > budget) {
        break;
      }
      selected.push(candidate);
      tokenCount += tokens;
    }

    return {
      context: selected.map((item) => item.chunk.text).join("\n\n"),
      tokenCount,
      chunks: selected
    };
  }
}
