/**
 * Merge command - Loads config and runs the merge pipeline
 */

import chalk from "chalk";
import ora from "ora";
import { basename } from "node:path";
import { z } from "zod";
import { AlreadyExistsError, describeError } from "../../errors";
import { mergePdfs } from "../../modules";
import { Logger, loadConfig } from "../../utils";
import type { MergeProgress } from "../../types";

const MergeOptionsSchema = z.object({
  output: z.string().min(1),
  force: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_ALREADY_EXISTS = 2;

/**
 * 2 when the output exists (directly or as the cause of a wrapped error), else 1
 */
export function exitCodeFor(error: unknown): number {
  for (let current = error; current instanceof Error; current = current.cause) {
    if (current instanceof AlreadyExistsError) return EXIT_ALREADY_EXISTS;
  }
  return EXIT_FAILURE;
}

function progressText(progress: MergeProgress): string {
  const step = `${progress.index + 1}/${progress.total}`;
  switch (progress.stage) {
    case "convert":
      return `Converting ${step}: ${basename(progress.path)}`;
    case "append":
      return `Appending ${step}: ${basename(progress.path)}`;
    case "write":
      return `Writing ${progress.path}`;
  }
}

/**
 * @returns Process exit code
 */
export async function mergeCommand(inputs: string[], opts: unknown): Promise<number> {
  let options: z.infer<typeof MergeOptionsSchema>;
  try {
    options = MergeOptionsSchema.parse(opts);
  } catch (error) {
    console.error(`${chalk.red("Error:")} Invalid options: ${describeError(error)}`);
    return EXIT_FAILURE;
  }

  // Load configuration (default → user → custom)
  const { config, errors } = await loadConfig(options.config);
  const logger = new Logger(options.verbose ? "debug" : config.logging.level);

  for (const err of errors) {
    logger.warn(`Ignoring config ${err.path}: ${describeError(err.error)}`);
  }

  const spinner = ora({ text: "Merging...", indent: 2 }).start();

  try {
    const written = await mergePdfs(inputs, options.output, options.force ?? false, {
      config,
      logger,
      onProgress: (progress) => {
        spinner.text = progressText(progress);
      },
    });

    spinner.stop();
    console.log(`Merged ${inputs.length} files -> ${written}`);
    return EXIT_OK;
  } catch (error) {
    spinner.fail("Merge failed");
    console.error(`${chalk.red("Error:")} ${describeError(error)}`);
    return exitCodeFor(error);
  }
}
