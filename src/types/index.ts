/**
 * Central type exports
 */

// Configuration
export type {
  MergeConfig,
  PartialMergeConfig,
  TextConfig,
  DocxConfig,
  TempConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  MergeConfigSchema,
  PartialMergeConfigSchema,
} from "./config";

// Merge
export type {
  MergeRequest,
  MergeStage,
  MergeProgress,
  MergeOptions,
} from "./merge";

// Context
export type { MergeContext } from "./context";
