export interface ChatSession {
  id: string;
  title: string;
  documentFilename: string | null;
  documentPath: string | null;
  chunkCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatSessionSummary extends ChatSession {
  messageCount: number;
}

export type ChatRole = "user" | "assistant";

export interface ChatSource {
  chunkIndex: number;
  snippet: string;
  distance: number;
}

export interface ChatMessage {
  id: number;
  sessionId: string;
  role: ChatRole;
  content: string;
  sources?: ChatSource[];
  createdAt: Date;
}
