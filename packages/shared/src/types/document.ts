export type DocumentFileType = "pdf" | "docx" | "md" | "txt";

/** A bounded contiguous slice of a document's extracted text. */
export interface Chunk {
  readonly text: string;
  readonly index: number;
  readonly sourceId: string;
  readonly tokenCount: number;
  readonly charCount: number;
}

export interface ChunkStats {
  totalChunks: number;
  totalTokens: number;
  totalCharacters: number;
  avgTokensPerChunk: number;
  avgCharactersPerChunk: number;
  maxTokens: number;
  minTokens: number;
}

export interface DocumentRef {
  filename: string;
  path: string;
  fileType: DocumentFileType;
}
