import { unified } from "unified";
import remarkParse from "remark-parse";
import { visit } from "unist-util-visit";
import { describeText, type DocumentParser, type ParsedDocumentResult } from "./types.js";

export class MarkdownParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const source = buffer.toString("utf8");
    const tree = unified().use(remarkParse).parse(source);
    const blocks: string[] = [];

    // One block per top-level node so paragraph breaks survive into chunking.
    for (const block of tree.children) {
      const fragments: string[] = [];
      visit(block, (node) => {
        if ("value" in node && typeof node.value === "string") {
          const value = node.value.trim();
          if (value.length > 0) {
            fragments.push(value);
          }
        }
      });
      if (fragments.length > 0) {
        blocks.push(fragments.join(" "));
      }
    }

    const text = blocks.join("\n\n");
    return { text, metadata: describeText(text, source) };
  }
}
