/**
 * Public API
 */

export { mergePdfs, mergeRequest } from "./modules";
export {
  Converter,
  convertToPdf,
  getDefaultConverter,
  isSupportedNonPdf,
} from "./converter";
export type { ConverterOptions } from "./converter";
export {
  PdfAssembleError,
  ValidationError,
  AlreadyExistsError,
  ConversionError,
  MergeError,
  IOError,
} from "./errors";
export { createMergeRequest, loadConfig, loadDefaultConfig, Logger } from "./utils";
export type {
  MergeConfig,
  MergeOptions,
  MergeProgress,
  MergeRequest,
  MergeStage,
} from "./types";
