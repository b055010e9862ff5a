/**
 * Config command - Show where configuration is read from and the values in effect
 */

import chalk from "chalk";
import { describeError } from "../../errors";
import { fileExists, getUserConfigPath, loadConfig } from "../../utils";

/**
 * Prints the user config location, then the merged configuration as JSON
 * (defaults → user config → the optional custom file)
 */
export async function configCommand(custom?: string): Promise<void> {
  const userConfigPath = getUserConfigPath();
  const found = await fileExists(userConfigPath);
  console.log(`User config: ${userConfigPath} (${found ? "found" : "not found"})`);
  if (custom) {
    console.log(`Custom config: ${custom}`);
  }

  const { config, errors } = await loadConfig(custom);
  for (const err of errors) {
    console.warn(`${chalk.yellow("Warning:")} Ignoring config ${err.path}: ${describeError(err.error)}`);
  }

  console.log("Effective configuration:");
  console.log(JSON.stringify(config, null, 2));
}
