/**
 * Merge request and progress types
 */

import type { MergeConfig } from "./config";
import type { Converter } from "../converter";
import type { Logger } from "../utils/logger";

export interface MergeRequest {
  inputs: string[]; // Input paths, in output page order
  output: string; // Destination path (".pdf" is appended when missing)
  overwrite: boolean; // Replace an existing output file
}

export type MergeStage = "convert" | "append" | "write";

export interface MergeProgress {
  stage: MergeStage;
  index: number; // Zero-based position of the file being handled
  total: number;
  path: string;
}

export interface MergeOptions {
  config?: MergeConfig; // Defaults to src/config/default.json
  converter?: Converter; // Defaults to the shared converter for the config
  logger?: Logger; // Core stays silent without one
  onProgress?: (progress: MergeProgress) => void;
}
