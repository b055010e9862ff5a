/**
 * DOCX → PDF
 * Delegates to a headless LibreOffice (`soffice`) when one is installed
 */

import { execFile } from "node:child_process";
import { mkdtemp, rename, rm } from "fs/promises";
import { join, parse } from "node:path";
import { promisify } from "node:util";
import which from "which";
import { fileExists } from "../utils/fs";

const execFileAsync = promisify(execFile);

export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export const runCommand: CommandRunner = async (command, args) => {
  await execFileAsync(command, args);
};

/**
 * Locate the office binary: the configured path if it resolves,
 * otherwise `soffice` or `libreoffice` on PATH
 */
export function findOfficeBinary(configured: string | null): string | null {
  if (configured) {
    return which.sync(configured, { nothrow: true });
  }
  return (
    which.sync("soffice", { nothrow: true }) ??
    which.sync("libreoffice", { nothrow: true })
  );
}

export async function docxToPdf(
  binary: string,
  inputPath: string,
  outputPath: string,
  tempDir: string,
  run: CommandRunner = runCommand,
): Promise<void> {
  // soffice names its output after the input; convert into a private
  // directory so it cannot clobber other files in tempDir
  const workDir = await mkdtemp(join(tempDir, "docx-"));

  try {
    await run(binary, [
      "--headless",
      "--convert-to",
      "pdf",
      "--outdir",
      workDir,
      inputPath,
    ]);

    const produced = join(workDir, `${parse(inputPath).name}.pdf`);
    if (!(await fileExists(produced))) {
      throw new Error(`${binary} produced no PDF for ${inputPath}`);
    }
    await rename(produced, outputPath);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
