import type { Chunk, ChunkStats } from "@docchat/shared";
import type { EmbeddingIndex } from "../services/EmbeddingIndex.js";

export type PipelinePhase = "extracting" | "chunking" | "indexing" | "completed" | "error";

export interface PipelineStatusEvent {
  sourceId: string;
  phase: PipelinePhase;
  progress: number;
  message?: string;
}

export interface DocumentPipelineResult {
  chunks: Chunk[];
  index: EmbeddingIndex;
  stats: ChunkStats;
}
