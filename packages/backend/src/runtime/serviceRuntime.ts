import { appConfig } from "../config.js";
import { TextExtractor } from "../parsers/TextExtractor.js";
import { Chunker } from "../pipeline/Chunker.js";
import { DocumentPipeline } from "../pipeline/DocumentPipeline.js";
import { Indexer } from "../services/EmbeddingIndex.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { LLMService } from "../services/LLMService.js";
import { Retriever } from "../services/Retriever.js";
import { SessionCoordinator } from "../services/SessionCoordinator.js";
import { getChatStoreSingleton } from "./chatRuntime.js";

let llmServiceSingleton: LLMServiceLike | null = null;
let documentPipelineSingleton: DocumentPipeline | null = null;
let retrieverSingleton: Retriever | null = null;
let sessionCoordinatorSingleton: SessionCoordinator | null = null;
let indexerSingleton: Indexer | null = null;

export function getLLMServiceSingleton(): LLMServiceLike {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }

  return llmServiceSingleton;
}

function getIndexerSingleton(): Indexer {
  if (!indexerSingleton) {
    indexerSingleton = new Indexer(getLLMServiceSingleton(), {
      concurrency: appConfig.EMBEDDING_CONCURRENCY
    });
  }

  return indexerSingleton;
}

export function getDocumentPipelineSingleton(): DocumentPipeline {
  if (!documentPipelineSingleton) {
    documentPipelineSingleton = new DocumentPipeline(
      new TextExtractor(),
      new Chunker({
        maxTokens: appConfig.CHUNK_MAX_TOKENS,
        overlapTokens: appConfig.CHUNK_OVERLAP_TOKENS,
        minLength: appConfig.CHUNK_MIN_LENGTH
      }),
      getIndexerSingleton()
    );
  }

  return documentPipelineSingleton;
}

export function getRetrieverSingleton(): Retriever {
  if (!retrieverSingleton) {
    retrieverSingleton = new Retriever(getIndexerSingleton());
  }

  return retrieverSingleton;
}

export function getSessionCoordinatorSingleton(): SessionCoordinator {
  if (!sessionCoordinatorSingleton) {
    sessionCoordinatorSingleton = new SessionCoordinator({
      store: getChatStoreSingleton(),
      pipeline: getDocumentPipelineSingleton(),
      retriever: getRetrieverSingleton(),
      llm: getLLMServiceSingleton(),
      uploadsDir: appConfig.UPLOADS_DIR
    });
  }

  return sessionCoordinatorSingleton;
}
