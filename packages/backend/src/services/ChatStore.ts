import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import type {
  ChatMessage,
  ChatRole,
  ChatSession,
  ChatSessionSummary,
  ChatSource,
  StoreStats
} from "@docchat/shared";
import { SessionNotFoundError } from "../errors.js";

export interface ChatStoreOptions {
  dbPath?: string;
}

export interface CreateSessionInput {
  id: string;
  title: string;
  documentFilename?: string | null;
  documentPath?: string | null;
  chunkCount?: number;
  createdAt?: Date;
}

export interface AppendMessageInput {
  sessionId: string;
  role: ChatRole;
  content: string;
  sources?: ChatSource[];
}

/** Durable session metadata and append-only, ordered message history. */
export interface ChatStoreLike {
  close(): void;
  createSession(input: CreateSessionInput): ChatSession;
  getSession(id: string): ChatSession | null;
  sessionExists(id: string): boolean;
  updateSessionTitle(id: string, title: string): boolean;
  listSessions(limit?: number): ChatSessionSummary[];
  /** Cascades to the session's messages. */
  deleteSession(id: string): boolean;
  appendMessage(input: AppendMessageInput): ChatMessage;
  listMessages(sessionId: string): ChatMessage[];
  countMessages(sessionId: string, role?: ChatRole): number;
  getSessionWithMessages(sessionId: string): { session: ChatSession; messages: ChatMessage[] } | null;
  listSessionsOlderThan(cutoff: Date): ChatSession[];
  getStats(): StoreStats;
}

interface ChatSessionRow {
  id: string;
  title: string;
  document_filename: string | null;
  document_path: string | null;
  chunk_count: number;
  created_at: string;
  updated_at: string;
}

interface ChatSessionSummaryRow extends ChatSessionRow {
  message_count: number;
}

interface ChatMessageRow {
  id: number;
  session_id: string;
  role: ChatRole;
  content: string;
  sources_json: string | null;
  created_at: string;
}

const SESSION_COLUMNS = "id, title, document_filename, document_path, chunk_count, created_at, updated_at";
const MESSAGE_COLUMNS = "id, session_id, role, content, sources_json, created_at";

export class ChatStore implements ChatStoreLike {
  private readonly db: Database.Database;
  private readonly dbPath: string;

  constructor(options: ChatStoreOptions = {}) {
    this.dbPath = resolve(options.dbPath ?? "data/docchat.db");
    mkdirSync(dirname(this.dbPath), { recursive: true });

    this.db = new Database(this.dbPath);
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("journal_mode = WAL");

    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  createSession(input: CreateSessionInput): ChatSession {
    const now = (input.createdAt ?? new Date()).toISOString();

    this.db
      .prepare(
        `
        INSERT INTO chat_sessions (id, title, document_filename, document_path, chunk_count, created_at, updated_at)
        VALUES (@id, @title, @document_filename, @document_path, @chunk_count, @created_at, @updated_at)
        `
      )
      .run({
        id: input.id,
        title: input.title,
        document_filename: input.documentFilename ?? null,
        document_path: input.documentPath ?? null,
        chunk_count: input.chunkCount ?? 0,
        created_at: now,
        updated_at: now
      });

    const session = this.getSession(input.id);
    if (!session) {
      throw new Error(`Chat session was not persisted: ${input.id}`);
    }
    return session;
  }

  getSession(id: string): ChatSession | null {
    const row = this.db
      .prepare<[string], ChatSessionRow>(`SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE id = ? LIMIT 1`)
      .get(id);

    return row ? this.mapSessionRow(row) : null;
  }

  sessionExists(id: string): boolean {
    return this.db.prepare<[string], { found: number }>("SELECT 1 AS found FROM chat_sessions WHERE id = ?").get(id) !== undefined;
  }

  updateSessionTitle(id: string, title: string): boolean {
    const result = this.db
      .prepare("UPDATE chat_sessions SET title = ?, updated_at = ? WHERE id = ?")
      .run(title, new Date().toISOString(), id);
    return result.changes > 0;
  }

  listSessions(limit = 100): ChatSessionSummary[] {
    const safeLimit = Math.max(1, limit);
    const rows = this.db
      .prepare<[number], ChatSessionSummaryRow>(
        `
        SELECT s.id, s.title, s.document_filename, s.document_path, s.chunk_count, s.created_at, s.updated_at,
               COUNT(m.id) AS message_count
        FROM chat_sessions s
        LEFT JOIN chat_messages m ON m.session_id = s.id
        GROUP BY s.id
        ORDER BY s.created_at DESC, s.id DESC
        LIMIT ?
        `
      )
      .all(safeLimit);

    return rows.map((row) => ({
      ...this.mapSessionRow(row),
      messageCount: row.message_count
    }));
  }

  deleteSession(id: string): boolean {
    const result = this.db.prepare("DELETE FROM chat_sessions WHERE id = ?").run(id);
    return result.changes > 0;
  }

  appendMessage(input: AppendMessageInput): ChatMessage {
    if (!this.sessionExists(input.sessionId)) {
      throw new SessionNotFoundError(input.sessionId);
    }

    const now = new Date().toISOString();
    const insert = this.db.transaction(() => {
      const result = this.db
        .prepare(
          `
          INSERT INTO chat_messages (session_id, role, content, sources_json, created_at)
          VALUES (@session_id, @role, @content, @sources_json, @created_at)
          `
        )
        .run({
          session_id: input.sessionId,
          role: input.role,
          content: input.content,
          sources_json: input.sources ? JSON.stringify(input.sources) : null,
          created_at: now
        });

      this.db.prepare("UPDATE chat_sessions SET updated_at = ? WHERE id = ?").run(now, input.sessionId);
      return Number(result.lastInsertRowid);
    });

    const id = insert();
    const row = this.db
      .prepare<[number], ChatMessageRow>(`SELECT ${MESSAGE_COLUMNS} FROM chat_messages WHERE id = ? LIMIT 1`)
      .get(id);
    if (!row) {
      throw new Error(`Chat message was not persisted for session ${input.sessionId}`);
    }
    return this.mapMessageRow(row);
  }

  listMessages(sessionId: string): ChatMessage[] {
    const rows = this.db
      .prepare<[string], ChatMessageRow>(
        `SELECT ${MESSAGE_COLUMNS} FROM chat_messages WHERE session_id = ? ORDER BY id ASC`
      )
      .all(sessionId);

    return rows.map((row) => this.mapMessageRow(row));
  }

  countMessages(sessionId: string, role?: ChatRole): number {
    const row = role
      ? this.db
          .prepare<[string, string], { total: number }>(
            "SELECT COUNT(*) AS total FROM chat_messages WHERE session_id = ? AND role = ?"
          )
          .get(sessionId, role)
      : this.db
          .prepare<[string], { total: number }>("SELECT COUNT(*) AS total FROM chat_messages WHERE session_id = ?")
          .get(sessionId);
    return row?.total ?? 0;
  }

  getSessionWithMessages(sessionId: string): { session: ChatSession; messages: ChatMessage[] } | null {
    const session = this.getSession(sessionId);
    if (!session) {
      return null;
    }

    return { session, messages: this.listMessages(sessionId) };
  }

  listSessionsOlderThan(cutoff: Date): ChatSession[] {
    const rows = this.db
      .prepare<[string], ChatSessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE created_at < ? ORDER BY created_at ASC`
      )
      .all(cutoff.toISOString());
    return rows.map((row) => this.mapSessionRow(row));
  }

  getStats(): StoreStats {
    const counts = this.db
      .prepare<[], { total_sessions: number; total_messages: number; last_session_at: string | null }>(
        `
        SELECT
          (SELECT COUNT(*) FROM chat_sessions) AS total_sessions,
          (SELECT COUNT(*) FROM chat_messages) AS total_messages,
          (SELECT MAX(created_at) FROM chat_sessions) AS last_session_at
        `
      )
      .get();

    return {
      totalSessions: counts?.total_sessions ?? 0,
      totalMessages: counts?.total_messages ?? 0,
      lastSessionAt: counts?.last_session_at ?? null,
      databasePath: this.dbPath
    };
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chat_sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        document_filename TEXT,
        document_path TEXT,
        chunk_count INTEGER NOT NULL DEFAULT 0,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS chat_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES chat_sessions(id) ON DELETE CASCADE,
        role TEXT NOT NULL CHECK(role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        sources_json TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_chat_messages_session_id
        ON chat_messages(session_id, id);

      CREATE INDEX IF NOT EXISTS idx_chat_sessions_created_at
        ON chat_sessions(created_at DESC);
    `);
  }

  private mapSessionRow(row: ChatSessionRow): ChatSession {
    return {
      id: row.id,
      title: row.title,
      documentFilename: row.document_filename,
      documentPath: row.document_path,
      chunkCount: row.chunk_count,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    };
  }

  private mapMessageRow(row: ChatMessageRow): ChatMessage {
    const message: ChatMessage = {
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      content: row.content,
      createdAt: new Date(row.created_at)
    };

    const sources = parseSources(row.sources_json);
    if (sources) {
      message.sources = sources;
    }
    return message;
  }
}

function parseSources(raw: string | null): ChatSource[] | undefined {
  if (!raw) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  return Array.isArray(parsed) ? parsed.filter(isChatSource) : undefined;
}

function isChatSource(value: unknown): value is ChatSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "chunkIndex" in value &&
    typeof value.chunkIndex === "number" &&
    "snippet" in value &&
    typeof value.snippet === "string" &&
    "distance" in value &&
    typeof value.distance === "number"
  );
}
