import mammoth from "mammoth";
import { describeText, type DocumentParser, type ParsedDocumentResult } from "./types.js";

export class DocxParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const { value, messages } = await mammoth.extractRawText({ buffer });
    return {
      text: value,
      metadata: { ...describeText(value), warningCount: messages.length }
    };
  }
}
