/**
 * Merge context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { MergeConfig } from "./config";
import type { MergeProgress, MergeRequest } from "./merge";
import type { Converter } from "../converter";
import type { Logger } from "../utils/logger";

export interface MergeContext {
  // Input - provided at initialization
  request: MergeRequest;
  config: MergeConfig;
  converter: Converter;
  logger?: Logger;
  onProgress?: (progress: MergeProgress) => void;

  inputs?: string[]; // Absolute input paths, blanks removed (validator)
  outputPath?: string; // Absolute output path ending in .pdf (validator)
  pdfPaths?: string[]; // One PDF per input, in input order (preparer)
}
