import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "node:path";
import {
  decodeText,
  layoutBlocks,
  sanitizeForFont,
  textToPdf,
  toBlocks,
  wrapText,
} from "./text";
import type { TextLayout } from "./text";
import { loadDefaultConfig } from "../utils/load-config";
import { createScratch, loadPdf } from "../testing/fixtures";

// Every character is 10 units wide
const measure = (text: string): number => text.length * 10;

const smallPage: TextLayout = {
  pageWidth: 100,
  pageHeight: 100,
  margin: 10,
  fontSize: 8,
  leading: 10,
  paragraphSpacing: 0,
  measure,
};

describe("decodeText", () => {
  it("drops bytes that are not valid UTF-8", () => {
    expect(decodeText(new Uint8Array([0x61, 0xff, 0x62]))).toBe("ab");
  });

  it("decodes multi-byte characters", () => {
    expect(decodeText(new TextEncoder().encode("café"))).toBe("café");
  });
});

describe("toBlocks", () => {
  it("makes one paragraph per non-blank line and a spacer per blank line", () => {
    expect(toBlocks("first\n\n  \nsecond\n", 14)).toEqual([
      { kind: "paragraph", text: "first" },
      { kind: "spacer", height: 14 },
      { kind: "spacer", height: 14 },
      { kind: "paragraph", text: "second" },
    ]);
  });

  it("keeps markup characters literally", () => {
    expect(toBlocks(`a < b & c > d "q" 'r'`, 14)).toEqual([
      { kind: "paragraph", text: `a < b & c > d "q" 'r'` },
    ]);
  });

  it("handles Windows and old Mac line endings", () => {
    expect(toBlocks("a\r\nb\rc", 5)).toEqual([
      { kind: "paragraph", text: "a" },
      { kind: "paragraph", text: "b" },
      { kind: "paragraph", text: "c" },
    ]);
  });

  it("returns no blocks for empty content", () => {
    expect(toBlocks("", 14)).toEqual([]);
  });
});

describe("sanitizeForFont", () => {
  it("removes characters outside the charset and expands tabs", () => {
    const charset = new Set([..."ab "].map((c) => c.codePointAt(0) ?? 0));
    expect(sanitizeForFont("a\tb😀", charset)).toBe("a    b");
  });
});

describe("wrapText", () => {
  it("keeps lines that fit", () => {
    expect(wrapText("one two", 80, measure)).toEqual(["one two"]);
  });

  it("breaks between words", () => {
    expect(wrapText("one two three", 80, measure)).toEqual(["one two", "three"]);
  });

  it("breaks words longer than the line", () => {
    expect(wrapText("abcdefghij", 40, measure)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("collapses runs of whitespace", () => {
    expect(wrapText("  a   b  ", 80, measure)).toEqual(["a b"]);
  });
});

describe("layoutBlocks", () => {
  it("places lines from the top margin down", () => {
    const pages = layoutBlocks(
      [
        { kind: "paragraph", text: "a" },
        { kind: "paragraph", text: "b" },
      ],
      smallPage,
    );

    expect(pages).toEqual([
      [
        { text: "a", x: 10, y: 82 },
        { text: "b", x: 10, y: 72 },
      ],
    ]);
  });

  it("turns a spacer into vertical space", () => {
    const pages = layoutBlocks(
      [
        { kind: "paragraph", text: "a" },
        { kind: "spacer", height: 15 },
        { kind: "paragraph", text: "b" },
      ],
      smallPage,
    );

    expect(pages[0].map((line) => line.y)).toEqual([82, 57]);
  });

  it("keeps the line of a paragraph with nothing printable", () => {
    const pages = layoutBlocks(
      [
        { kind: "paragraph", text: "a" },
        { kind: "paragraph", text: "" },
        { kind: "paragraph", text: "b" },
      ],
      smallPage,
    );

    expect(pages).toEqual([
      [
        { text: "a", x: 10, y: 82 },
        { text: "b", x: 10, y: 62 },
      ],
    ]);
  });

  it("starts a new page when content overflows", () => {
    const blocks = Array.from({ length: 20 }, (_, i) => ({
      kind: "paragraph" as const,
      text: String(i),
    }));

    const pages = layoutBlocks(blocks, smallPage);

    expect(pages.map((page) => page.length)).toEqual([8, 8, 4]);
    expect(pages[1][0]).toEqual({ text: "8", x: 10, y: 82 });
  });

  it("returns one empty page for no blocks", () => {
    expect(layoutBlocks([], smallPage)).toEqual([[]]);
  });
});

describe("textToPdf", () => {
  let scratch: ReturnType<typeof createScratch>;

  beforeEach(() => {
    scratch = createScratch();
  });

  afterEach(async () => {
    await scratch.cleanup();
  });

  it("paginates long text onto A4 pages", async () => {
    const input = join(scratch.dir, "notes.txt");
    const output = join(scratch.dir, "notes.pdf");
    const lines = Array.from({ length: 100 }, (_, i) => `line ${i}`);
    await writeFile(input, lines.join("\n"));

    await textToPdf(input, output, loadDefaultConfig().text);

    const doc = await loadPdf(output);
    // 41 single-line paragraphs fit on a page with the default layout
    expect(doc.getPageCount()).toBe(3);
    expect(doc.getPage(0).getSize()).toEqual({ width: 595.28, height: 841.89 });
    expect(doc.getTitle()).toBe("notes.txt");
  });

  it("renders text the standard font cannot encode", async () => {
    const input = join(scratch.dir, "mixed.txt");
    const output = join(scratch.dir, "mixed.pdf");
    await writeFile(input, "price < 5 & tax > 0\n\nemoji 😀 and 日本語\n");

    await textToPdf(input, output, loadDefaultConfig().text);

    expect((await loadPdf(output)).getPageCount()).toBe(1);
  });
});
