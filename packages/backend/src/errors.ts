export class UnsupportedFormatError extends Error {
  constructor(readonly extension: string) {
    super(`Unsupported file format: ${extension || "(none)"}`);
    this.name = "UnsupportedFormatError";
  }
}

export class DocumentNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`File not found: ${path}`);
    this.name = "DocumentNotFoundError";
  }
}

export class EmptyDocumentError extends Error {
  constructor(detail: string) {
    super(detail);
    this.name = "EmptyDocumentError";
  }
}

export class EmbeddingUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingUnavailableError";
  }
}

/** Ingestion aborted; any partially written document has been removed. */
export class IngestionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IngestionError";
  }
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Chat session does not exist: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string) {
    super(`A response is already being generated for session ${sessionId}`);
    this.name = "SessionBusyError";
  }
}

export class SessionRecreationError extends Error {
  constructor(readonly sessionId: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to recreate the answer engine for session ${sessionId}${reason}`, options);
    this.name = "SessionRecreationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
