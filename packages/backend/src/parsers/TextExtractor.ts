import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import type { DocumentFileType } from "@docchat/shared";
import { DocumentNotFoundError, EmptyDocumentError, UnsupportedFormatError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { DocxParser } from "./DocxParser.js";
import { MarkdownParser } from "./MarkdownParser.js";
import { PDFParser } from "./PDFParser.js";
import { TextParser } from "./TextParser.js";
import type { DocumentParser } from "./types.js";

export const extensionToFileType: Readonly<Record<string, DocumentFileType>> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".md": "md",
  ".txt": "txt"
};

const emptyDocumentMessages: Record<DocumentFileType, string> = {
  pdf: "No text found in PDF. The file might be image-based.",
  docx: "No text found in DOCX file.",
  md: "The markdown file is empty.",
  txt: "The text file is empty."
};

export interface TextExtractorLike {
  extract(path: string): Promise<string>;
}

export function fileTypeFromPath(path: string): DocumentFileType | undefined {
  return extensionToFileType[extname(path).toLowerCase()];
}

/** Turns a stored document into plain text, picking the parser by file extension. */
export class TextExtractor implements TextExtractorLike {
  private readonly parsers: Record<DocumentFileType, DocumentParser>;

  constructor(parsers: Partial<Record<DocumentFileType, DocumentParser>> = {}) {
    this.parsers = {
      pdf: parsers.pdf ?? new PDFParser(),
      docx: parsers.docx ?? new DocxParser(),
      md: parsers.md ?? new MarkdownParser(),
      txt: parsers.txt ?? new TextParser()
    };
  }

  async extract(path: string): Promise<string> {
    const fileType = fileTypeFromPath(path);
    if (!fileType) {
      throw new UnsupportedFormatError(extname(path).toLowerCase());
    }

    const exists = await stat(path).then(
      (info) => info.isFile(),
      () => false
    );
    if (!exists) {
      throw new DocumentNotFoundError(path);
    }

    const buffer = await readFile(path);
    const result = await this.parsers[fileType].parse(buffer);
    if (result.text.trim().length === 0) {
      throw new EmptyDocumentError(emptyDocumentMessages[fileType]);
    }

    logger.debug(
      { path, fileType, characters: result.text.length, ...result.metadata },
      "Extracted document text"
    );
    return result.text;
  }
}
