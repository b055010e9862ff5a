/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConfigError, MergeConfig, PartialMergeConfig } from "../types";
import { MergeConfigSchema, PartialMergeConfigSchema } from "../types";

const defaultConfigPath = fileURLToPath(
  new URL("../config/default.json", import.meta.url),
);

let defaultConfig: MergeConfig | undefined;

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/pdf-assemble or ~/.config/pdf-assemble
 * - macOS: ~/Library/Preferences/pdf-assemble
 * - Windows: %APPDATA%\pdf-assemble
 */
function getConfigDirectory(): string {
  // Resolved per call so XDG_CONFIG_HOME changes take effect
  return envPaths("pdf-assemble", { suffix: "" }).config;
}

/**
 * Load default configuration with Zod validation
 * Read once and cached; callers get their own copy
 */
export function loadDefaultConfig(): MergeConfig {
  defaultConfig ??= MergeConfigSchema.parse(
    JSON.parse(readFileSync(defaultConfigPath, "utf-8")),
  );
  return structuredClone(defaultConfig);
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialMergeConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialMergeConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs
 */
export function mergeConfig(
  base: MergeConfig,
  override: PartialMergeConfig,
): MergeConfig {
  return {
    text: { ...base.text, ...override.text },
    docx: { ...base.docx, ...override.docx },
    temp: { ...base.temp, ...override.temp },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: MergeConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load or validate is skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
