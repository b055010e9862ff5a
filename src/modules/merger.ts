/**
 * Merger Module
 * Runs validate → prepare → concatenate inside a scoped temporary directory
 */

import { temporaryDirectoryTask } from "tempy";
import { Converter, getDefaultConverter } from "../converter";
import {
  AlreadyExistsError,
  MergeError,
  ValidationError,
  describeError,
} from "../errors";
import { loadDefaultConfig } from "../utils/load-config";
import type { MergeContext, MergeOptions, MergeRequest } from "../types";
import { validate } from "./validator";
import { prepare } from "./preparer";
import { concatenate } from "./concatenator";

/**
 * Merge inputs, in order, into one PDF
 *
 * @param inputPaths - PDF, image, text or DOCX files; order sets page order
 * @param outputPath - Destination; ".pdf" is appended when missing
 * @param overwrite - Replace an existing output instead of failing
 * @returns Absolute path of the written PDF
 *
 * @throws ValidationError before any output is written
 * @throws AlreadyExistsError when the output exists and overwrite is false
 * @throws IOError when the output directory cannot be created
 * @throws MergeError wrapping any conversion or write failure
 */
export async function mergePdfs(
  inputPaths: readonly string[],
  outputPath: string,
  overwrite = false,
  options: MergeOptions = {},
): Promise<string> {
  const config = options.config ?? loadDefaultConfig();
  const converter =
    options.converter ??
    (options.config
      ? new Converter({ config, logger: options.logger })
      : getDefaultConverter());

  const ctx: MergeContext = {
    request: { inputs: [...inputPaths], output: outputPath, overwrite },
    config,
    converter,
    logger: options.logger,
    onProgress: options.onProgress,
  };

  await validate(ctx);

  try {
    // The directory and everything in it is removed however the task ends
    return await temporaryDirectoryTask(
      async (tempDir) => {
        ctx.logger?.debug(`Using temporary directory ${tempDir}`);
        await prepare(ctx, tempDir);
        return concatenate(ctx);
      },
      { prefix: config.temp.prefix },
    );
  } catch (error) {
    if (error instanceof AlreadyExistsError || error instanceof ValidationError) {
      throw error;
    }
    throw new MergeError(`Failed to merge PDFs: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/**
 * mergePdfs for a prepared MergeRequest
 */
export async function mergeRequest(
  request: MergeRequest,
  options: MergeOptions = {},
): Promise<string> {
  return mergePdfs(request.inputs, request.output, request.overwrite, options);
}
