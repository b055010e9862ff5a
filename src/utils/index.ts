/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists, isFile, isDirectory, uniquePath } from "./fs";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Request utilities
export { createMergeRequest } from "./create-merge-request";

// Classes
export { Logger } from "./logger";
