import { join } from "node:path";
import { ValidationError } from "../errors";
import { withPdfSuffix } from "../converters/extensions";
import type { MergeRequest } from "../types";

/**
 * Build a request from an output folder and a file name chosen separately
 *
 * @example
 * createMergeRequest("/tmp/out", "report", ["a.pdf", "b.png"]);
 * // { inputs: ["a.pdf", "b.png"], output: "/tmp/out/report.pdf", overwrite: false }
 */
export function createMergeRequest(
  directory: string,
  filename: string,
  inputs: readonly string[],
  overwrite = false,
): MergeRequest {
  if (directory.trim() === "") {
    throw new ValidationError("Output directory is not selected.");
  }
  if (filename.trim() === "") {
    throw new ValidationError("Output filename is empty.");
  }

  return {
    inputs: [...inputs],
    output: withPdfSuffix(join(directory.trim(), filename.trim())),
    overwrite,
  };
}
