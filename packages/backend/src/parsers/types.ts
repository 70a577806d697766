export interface DocumentMetadata {
  wordCount: number;
  characterCount: number;
  lineCount: number;
  pageCount?: number;
  /** Conversion notices such as unsupported styles; only some formats report them. */
  warningCount?: number;
}

export interface ParsedDocumentResult {
  text: string;
  metadata: DocumentMetadata;
}

/** Turns the raw bytes of one document format into plain text. */
export interface DocumentParser {
  parse(buffer: Buffer): Promise<ParsedDocumentResult>;
}

export function countWords(input: string): number {
  const normalized = input.trim();
  return normalized.length === 0 ? 0 : normalized.split(/\s+/).length;
}

export function countLines(input: string): number {
  return input.length === 0 ? 0 : input.split(/\r?\n/).length;
}

/** Counts for extracted text; `source` is the original markup where it differs from the text. */
export function describeText(text: string, source = text): DocumentMetadata {
  return {
    wordCount: countWords(text),
    characterCount: text.length,
    lineCount: countLines(source)
  };
}
