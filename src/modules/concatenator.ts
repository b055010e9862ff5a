/**
 * Concatenator Module
 * Appends the pages of every prepared PDF, in order, and writes the output
 */

import { readFile, writeFile } from "fs/promises";
import { PDFDocument } from "pdf-lib";
import type { MergeContext } from "../types";

/**
 * Reads from context:
 * - pdfPaths (preparer)
 * - outputPath (validator)
 *
 * @returns The written output path
 */
export async function concatenate(ctx: MergeContext): Promise<string> {
  if (!ctx.pdfPaths || !ctx.outputPath) {
    throw new Error("Validator and preparer must run before concatenator");
  }

  const { pdfPaths, outputPath, logger, onProgress } = ctx;
  const merged = await PDFDocument.create();

  for (const [index, pdfPath] of pdfPaths.entries()) {
    onProgress?.({ stage: "append", index, total: pdfPaths.length, path: pdfPath });

    const source = await PDFDocument.load(await readFile(pdfPath));
    const pages = await merged.copyPages(source, source.getPageIndices());
    for (const page of pages) {
      merged.addPage(page);
    }
    logger?.debug(`Appended ${pages.length} pages from ${pdfPath}`);
  }

  onProgress?.({
    stage: "write",
    index: pdfPaths.length,
    total: pdfPaths.length,
    path: outputPath,
  });

  // Serialize fully before touching the output file
  const bytes = await merged.save();
  await writeFile(outputPath, bytes);
  logger?.debug(`Wrote ${merged.getPageCount()} pages to ${outputPath}`);

  return outputPath;
}
