import { describeText, type DocumentParser, type ParsedDocumentResult } from "./types.js";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export class TextParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const text = decodeText(buffer);
    return { text, metadata: describeText(text) };
  }
}

function decodeText(buffer: Buffer): string {
  try {
    return utf8Decoder.decode(buffer);
  } catch {
    // not valid UTF-8; every byte sequence is valid latin1
    return buffer.toString("latin1");
  }
}
