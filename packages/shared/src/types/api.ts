import type { ChatMessage, ChatSession, ChatSessionSummary, ChatSource } from "./chat.js";
import type { AnswerTerminalEvent } from "./events.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface UploadDocumentResponse {
  sessionId: string;
  filename: string;
  chunkCount: number;
  message: string;
}

export interface ListChatSessionsResponse {
  sessions: ChatSessionSummary[];
}

export interface ChatSessionDetailResponse {
  session: ChatSession & {
    messages: ChatMessage[];
  };
}

export interface CreateChatMessageRequest {
  content: string;
}

export interface CreateChatMessageResponse {
  sessionId: string;
  result: AnswerTerminalEvent;
}

export interface StopGenerationResponse {
  status: "stopped" | "idle";
}

export interface AnswerWithSourcesResponse {
  answer: string;
  sources: ChatSource[];
  confidence: number;
}

export interface DocumentSummaryResponse {
  summary: string;
}

export interface SuggestedQuestionsResponse {
  questions: string[];
}

export type ServiceCheckStatus = "ok" | "failed" | "not_configured";

export interface StoreStats {
  totalSessions: number;
  totalMessages: number;
  lastSessionAt: string | null;
  databasePath: string;
}

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec?: number;
  checks?: {
    database: ServiceCheckStatus;
    llm: ServiceCheckStatus;
  };
  database?: StoreStats;
  memory?: {
    residentSessions: number;
    activeGenerations: number;
  };
}

export interface CleanupResponse {
  deletedSessions: number;
  message: string;
}
