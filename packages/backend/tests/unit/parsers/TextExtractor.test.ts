import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { DocumentNotFoundError, EmptyDocumentError, UnsupportedFormatError } from "../../../src/errors.js";
import { TextExtractor, fileTypeFromPath } from "../../../src/parsers/TextExtractor.js";
import type { DocumentParser } from "../../../src/parsers/types.js";
import { createTempDir, removeTempDir } from "../../helpers/coordinator.js";

const dir = createTempDir("extractor");

async function writeFixture(name: string, content: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, content, "utf8");
  return path;
}

beforeAll(async () => {
  await mkdir(dir, { recursive: true });
});

afterAll(async () => {
  await removeTempDir(dir);
});

describe("TextExtractor", () => {
  it("maps extensions to file types case-insensitively", () => {
    expect(fileTypeFromPath("/docs/report.PDF")).toBe("pdf");
    expect(fileTypeFromPath("notes.md")).toBe("md");
    expect(fileTypeFromPath("table.csv")).toBeUndefined();
  });

  it("rejects unsupported extensions before touching the disk", async () => {
    await expect(new TextExtractor().extract(join(dir, "missing.csv"))).rejects.toBeInstanceOf(
      UnsupportedFormatError
    );
  });

  it("reports a missing file", async () => {
    const path = join(dir, "missing.txt");

    await expect(new TextExtractor().extract(path)).rejects.toThrow(new DocumentNotFoundError(path).message);
  });

  it("reports a blank text file as empty", async () => {
    const path = await writeFixture("blank.txt", "  \n\t ");

    const extraction = new TextExtractor().extract(path);

    await expect(extraction).rejects.toBeInstanceOf(EmptyDocumentError);
    await expect(extraction).rejects.toThrow("The text file is empty.");
  });

  it("returns plain text unchanged", async () => {
    const path = await writeFixture("plain.txt", "First line\nSecond line");

    await expect(new TextExtractor().extract(path)).resolves.toBe("First line\nSecond line");
  });

  it("strips markdown syntax", async () => {
    const path = await writeFixture("readme.md", "# Heading\n\nA *short* note.");

    await expect(new TextExtractor().extract(path)).resolves.toBe("Heading\n\nA short note.");
  });

  it("routes by extension to an injected parser", async () => {
    const pdf: DocumentParser = {
      parse: vi.fn(async () => ({
        text: "page text",
        metadata: { wordCount: 2, characterCount: 9, lineCount: 1, pageCount: 1 }
      }))
    };
    const path = await writeFixture("scan.PDF", "%PDF-fake");

    await expect(new TextExtractor({ pdf }).extract(path)).resolves.toBe("page text");
    expect(pdf.parse).toHaveBeenCalledWith(Buffer.from("%PDF-fake"));
  });
});
