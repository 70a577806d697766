import { EventEmitter } from "node:events";
import { EmptyDocumentError, errorMessage } from "../errors.js";
import type { TextExtractorLike } from "../parsers/TextExtractor.js";
import type { Indexer } from "../services/EmbeddingIndex.js";
import { logger } from "../utils/logger.js";
import { Chunker, chunkStats } from "./Chunker.js";
import type { DocumentPipelineResult, PipelinePhase, PipelineStatusEvent } from "./types.js";

/**
 * Extract → chunk → index for one document. Used both for a fresh upload and
 * for rebuilding a session's index after a restart or eviction.
 */
export class DocumentPipeline {
  private readonly eventEmitter: EventEmitter;

  constructor(
    private readonly extractor: TextExtractorLike,
    private readonly chunker: Chunker,
    private readonly indexer: Indexer,
    eventEmitter?: EventEmitter
  ) {
    this.eventEmitter = eventEmitter ?? new EventEmitter();
  }

  onStatus(listener: (event: PipelineStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  async ingest(sourceId: string, path: string): Promise<DocumentPipelineResult> {
    const startedAt = Date.now();
    try {
      this.emitStatus(sourceId, "extracting", 0);
      const text = await this.extractor.extract(path);

      this.emitStatus(sourceId, "chunking", 30);
      const chunks = await this.chunker.chunk(text, sourceId);
      if (chunks.length === 0) {
        throw new EmptyDocumentError(`No usable text chunks found in ${path}`);
      }

      this.emitStatus(sourceId, "indexing", 50);
      const index = await this.indexer.build(chunks);

      const stats = chunkStats(chunks);
      this.emitStatus(sourceId, "completed", 100);
      logger.info(
        { sourceId, chunkCount: stats.totalChunks, totalTokens: stats.totalTokens, durationMs: Date.now() - startedAt },
        "Document ingested"
      );
      return { chunks, index, stats };
    } catch (error) {
      this.emitStatus(sourceId, "error", 100, errorMessage(error));
      logger.warn({ sourceId, err: error }, "Document ingestion failed");
      throw error;
    }
  }

  private emitStatus(sourceId: string, phase: PipelinePhase, progress: number, message?: string): void {
    const event: PipelineStatusEvent = { sourceId, phase, progress };
    if (message !== undefined) {
      event.message = message;
    }
    this.eventEmitter.emit("status", event);
  }
}
