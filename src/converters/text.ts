/**
 * Text → PDF
 * Paginated plain-text rendering on a fixed page size with fixed margins
 */

import { readFile, writeFile } from "fs/promises";
import { basename } from "node:path";
import { PDFDocument, PageSizes, StandardFonts } from "pdf-lib";
import type { TextConfig } from "../types";

export type TextBlock =
  | { kind: "paragraph"; text: string }
  | { kind: "spacer"; height: number };

export interface PlacedLine {
  text: string;
  x: number;
  y: number; // Baseline, from the bottom of the page
}

export interface TextLayout {
  pageWidth: number;
  pageHeight: number;
  margin: number;
  fontSize: number;
  leading: number;
  paragraphSpacing: number;
  measure: (text: string) => number;
}

/**
 * Decode UTF-8, dropping bytes that do not decode
 */
export function decodeText(bytes: Uint8Array): string {
  return new TextDecoder("utf-8").decode(bytes).replace(/\uFFFD/g, "");
}

/**
 * Split text into lines: a non-blank line is a paragraph, a blank line a spacer
 * A trailing newline does not produce an extra blank line
 */
export function toBlocks(content: string, blankLineSpacing: number): TextBlock[] {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();

  return lines.map((line): TextBlock =>
    line.trim() === ""
      ? { kind: "spacer", height: blankLineSpacing }
      : { kind: "paragraph", text: line },
  );
}

/**
 * Remove characters the font cannot encode; tabs become spaces
 */
export function sanitizeForFont(text: string, charset: ReadonlySet<number>): string {
  let result = "";
  for (const char of text.replace(/\t/g, "    ")) {
    const codePoint = char.codePointAt(0);
    if (codePoint !== undefined && charset.has(codePoint)) {
      result += char;
    }
  }
  return result;
}

/**
 * Greedy word wrap; words wider than the line are broken by character
 */
export function wrapText(
  text: string,
  maxWidth: number,
  measure: (text: string) => number,
): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.trim().split(/\s+/)) {
    if (word === "") continue;

    const candidate = current ? `${current} ${word}` : word;
    if (measure(candidate) <= maxWidth) {
      current = candidate;
      continue;
    }

    if (current) lines.push(current);

    let rest = word;
    while (rest.length > 1 && measure(rest) > maxWidth) {
      let cut = 1;
      while (cut < rest.length - 1 && measure(rest.slice(0, cut + 1)) <= maxWidth) {
        cut++;
      }
      lines.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current) lines.push(current);
  return lines;
}

/**
 * Flow blocks onto pages, starting a new page whenever the next line
 * would cross the bottom margin. Always returns at least one page.
 */
export function layoutBlocks(blocks: TextBlock[], layout: TextLayout): PlacedLine[][] {
  const top = layout.pageHeight - layout.margin;
  const bottom = layout.margin;
  const maxWidth = layout.pageWidth - 2 * layout.margin;

  const pages: PlacedLine[][] = [[]];
  let cursor = top;

  const newPage = (): void => {
    pages.push([]);
    cursor = top;
  };

  for (const block of blocks) {
    if (block.kind === "spacer") {
      // A spacer that does not fit ends the page and is dropped
      if (cursor - block.height >= bottom) cursor -= block.height;
      else if (cursor !== top) newPage();
      continue;
    }

    // A paragraph with nothing printable still takes its line
    const wrapped = wrapText(block.text, maxWidth, layout.measure);
    const lines = wrapped.length > 0 ? wrapped : [""];

    for (const text of lines) {
      if (cursor - layout.leading < bottom && cursor !== top) newPage();
      if (text !== "") {
        pages[pages.length - 1].push({
          text,
          x: layout.margin,
          y: cursor - layout.fontSize,
        });
      }
      cursor -= layout.leading;
    }
    cursor -= layout.paragraphSpacing;
  }

  return pages;
}

export async function textToPdf(
  inputPath: string,
  outputPath: string,
  config: TextConfig,
): Promise<void> {
  const content = decodeText(await readFile(inputPath));

  const doc = await PDFDocument.create();
  doc.setTitle(basename(inputPath));

  const font = await doc.embedFont(StandardFonts.Helvetica);
  const charset = new Set(font.getCharacterSet());
  const [pageWidth, pageHeight] = PageSizes[config.pageSize];

  const blocks = toBlocks(content, config.blankLineSpacing).map((block): TextBlock =>
    block.kind === "paragraph"
      ? { kind: "paragraph", text: sanitizeForFont(block.text, charset) }
      : block,
  );

  const pages = layoutBlocks(blocks, {
    pageWidth,
    pageHeight,
    margin: config.margin,
    fontSize: config.fontSize,
    leading: config.leading,
    paragraphSpacing: config.paragraphSpacing,
    measure: (text) => font.widthOfTextAtSize(text, config.fontSize),
  });

  for (const lines of pages) {
    const page = doc.addPage([pageWidth, pageHeight]);
    for (const line of lines) {
      page.drawText(line.text, {
        x: line.x,
        y: line.y,
        size: config.fontSize,
        font,
      });
    }
  }

  await writeFile(outputPath, await doc.save());
}
