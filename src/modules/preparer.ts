/**
 * Preparer Module
 * Turns every input into a PDF path, converting non-PDF inputs into tempDir
 */

import { isPdf } from "../converters/extensions";
import type { MergeContext } from "../types";

/**
 * Inputs are handled one at a time, in order
 *
 * Reads from context:
 * - inputs (validator)
 *
 * Writes to context:
 * - pdfPaths: One PDF per input, same order as inputs
 */
export async function prepare(ctx: MergeContext, tempDir: string): Promise<void> {
  if (!ctx.inputs) {
    throw new Error("Validator must run before preparer");
  }

  const { inputs, converter, logger, onProgress } = ctx;
  const pdfPaths: string[] = [];

  for (const [index, input] of inputs.entries()) {
    if (isPdf(input)) {
      pdfPaths.push(input);
      continue;
    }

    onProgress?.({ stage: "convert", index, total: inputs.length, path: input });
    const converted = await converter.convert(input, tempDir);
    logger?.debug(`Converted ${input} -> ${converted}`);
    pdfPaths.push(converted);
  }

  ctx.pdfPaths = pdfPaths;
}
