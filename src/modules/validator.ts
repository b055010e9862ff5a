/**
 * Validator Module
 * Checks the request and resolves the output path before anything is written
 */

import { mkdir } from "fs/promises";
import { dirname, resolve } from "node:path";
import { AlreadyExistsError, IOError, ValidationError } from "../errors";
import { withPdfSuffix } from "../converters/extensions";
import { fileExists, isDirectory, isFile } from "../utils/fs";
import type { MergeContext } from "../types";

/**
 * Validates the request; first violation wins
 *
 * Writes to context:
 * - inputs: Absolute input paths with blank entries removed
 * - outputPath: Absolute output path ending in .pdf
 */
export async function validate(ctx: MergeContext): Promise<void> {
  const { request } = ctx;

  // 1. Non-empty after dropping blank entries
  const inputs = request.inputs.filter((input) => input.trim() !== "");
  if (inputs.length === 0) {
    throw new ValidationError("No input files provided.");
  }

  // 2. Every input is an existing file
  for (const input of inputs) {
    if (!(await isFile(input))) {
      throw new ValidationError(`Input file not found: ${input}`);
    }
  }

  // 3. Output directory exists (created when missing)
  const requested = resolve(request.output);
  const outputDir = dirname(requested);
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw IOError.from(error, `Cannot create output directory ${outputDir}`);
  }

  // 4. Output is not a directory, neither as given nor with the .pdf suffix
  const outputPath = withPdfSuffix(requested);
  for (const candidate of new Set([requested, outputPath])) {
    if (await isDirectory(candidate)) {
      throw new ValidationError(`Output path points to a directory, not a file: ${candidate}`);
    }
  }

  // 5. Overwrite policy applies to the file actually written
  if (!request.overwrite && (await fileExists(outputPath))) {
    throw new AlreadyExistsError(outputPath);
  }

  ctx.inputs = inputs.map((input) => resolve(input));
  ctx.outputPath = outputPath;
  ctx.logger?.debug(`Validated ${inputs.length} inputs -> ${outputPath}`);
}
