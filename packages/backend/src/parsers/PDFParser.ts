// The package entry point runs a self-test when imported as ESM; load the library file directly.
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { describeText, type DocumentParser, type ParsedDocumentResult } from "./types.js";

export class PDFParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const { text, numpages } = await pdfParse(buffer);
    return {
      text,
      metadata: { ...describeText(text), pageCount: numpages }
    };
  }
}
