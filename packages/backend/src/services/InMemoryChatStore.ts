import type { ChatMessage, ChatRole, ChatSession, ChatSessionSummary, StoreStats } from "@docchat/shared";
import { SessionNotFoundError } from "../errors.js";
import type { AppendMessageInput, ChatStoreLike, CreateSessionInput } from "./ChatStore.js";

export class InMemoryChatStore implements ChatStoreLike {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly sessionMessages = new Map<string, ChatMessage[]>();
  private nextMessageId = 1;

  close(): void {
    this.sessions.clear();
    this.sessionMessages.clear();
  }

  createSession(input: CreateSessionInput): ChatSession {
    if (this.sessions.has(input.id)) {
      throw new Error(`Chat session already exists: ${input.id}`);
    }

    const now = input.createdAt ?? new Date();
    const session: ChatSession = {
      id: input.id,
      title: input.title,
      documentFilename: input.documentFilename ?? null,
      documentPath: input.documentPath ?? null,
      chunkCount: input.chunkCount ?? 0,
      createdAt: now,
      updatedAt: now
    };

    this.sessions.set(session.id, session);
    this.sessionMessages.set(session.id, []);
    return { ...session };
  }

  getSession(id: string): ChatSession | null {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  sessionExists(id: string): boolean {
    return this.sessions.has(id);
  }

  updateSessionTitle(id: string, title: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    this.sessions.set(id, { ...session, title, updatedAt: new Date() });
    return true;
  }

  listSessions(limit = 100): ChatSessionSummary[] {
    const safeLimit = Math.max(1, limit);
    return [...this.sessions.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id))
      .slice(0, safeLimit)
      .map((session) => ({
        ...session,
        messageCount: this.sessionMessages.get(session.id)?.length ?? 0
      }));
  }

  deleteSession(id: string): boolean {
    const existed = this.sessions.delete(id);
    this.sessionMessages.delete(id);
    return existed;
  }

  appendMessage(input: AppendMessageInput): ChatMessage {
    const session = this.sessions.get(input.sessionId);
    if (!session) {
      throw new SessionNotFoundError(input.sessionId);
    }

    const message: ChatMessage = {
      id: this.nextMessageId++,
      sessionId: input.sessionId,
      role: input.role,
      content: input.content,
      createdAt: new Date()
    };
    if (input.sources) {
      message.sources = input.sources;
    }

    const messages = this.sessionMessages.get(input.sessionId) ?? [];
    messages.push(message);
    this.sessionMessages.set(input.sessionId, messages);

    this.sessions.set(input.sessionId, {
      ...session,
      updatedAt: message.createdAt
    });

    return message;
  }

  listMessages(sessionId: string): ChatMessage[] {
    return [...(this.sessionMessages.get(sessionId) ?? [])];
  }

  countMessages(sessionId: string, role?: ChatRole): number {
    const messages = this.sessionMessages.get(sessionId) ?? [];
    return role ? messages.filter((message) => message.role === role).length : messages.length;
  }

  getSessionWithMessages(sessionId: string): { session: ChatSession; messages: ChatMessage[] } | null {
    const session = this.getSession(sessionId);
    if (!session) {
      return null;
    }

    return {
      session,
      messages: this.listMessages(sessionId)
    };
  }

  listSessionsOlderThan(cutoff: Date): ChatSession[] {
    return [...this.sessions.values()]
      .filter((session) => session.createdAt.getTime() < cutoff.getTime())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((session) => ({ ...session }));
  }

  getStats(): StoreStats {
    let totalMessages = 0;
    for (const messages of this.sessionMessages.values()) {
      totalMessages += messages.length;
    }

    let last: Date | null = null;
    for (const session of this.sessions.values()) {
      if (!last || session.createdAt > last) {
        last = session.createdAt;
      }
    }

    return {
      totalSessions: this.sessions.size,
      totalMessages,
      lastSessionAt: last ? last.toISOString() : null,
      databasePath: ":memory:"
    };
  }
}
