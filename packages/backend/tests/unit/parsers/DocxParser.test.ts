import { beforeEach, describe, expect, it, vi } from "vitest";
import mammoth from "mammoth";
import { DocxParser } from "../../../src/parsers/DocxParser.js";

vi.mock("mammoth", () => ({
  default: {
    extractRawText: vi.fn()
  }
}));

const mockedExtractRawText = vi.mocked(mammoth.extractRawText);

describe("DocxParser", () => {
  beforeEach(() => {
    mockedExtractRawText.mockReset();
  });

  it("returns the raw text mammoth extracts", async () => {
    mockedExtractRawText.mockResolvedValue({
      value: "Meeting notes\n\nBudget approved for next year",
      messages: []
    });

    const buffer = Buffer.from("PK\u0003\u0004");
    const result = await new DocxParser().parse(buffer);

    expect(mockedExtractRawText).toHaveBeenCalledWith({ buffer });
    expect(result.text).toBe("Meeting notes\n\nBudget approved for next year");
    expect(result.metadata.wordCount).toBe(7);
    expect(result.metadata.lineCount).toBe(3);
    expect(result.metadata.warningCount).toBe(0);
  });
});
