/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, stat } from "fs/promises";
import type { Stats } from "node:fs";
import { constants } from "node:fs";
import { join, parse } from "node:path";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch {
    return null;
  }
}

/**
 * Check if a path is an existing regular file
 */
export async function isFile(path: string): Promise<boolean> {
  return (await statOrNull(path))?.isFile() ?? false;
}

/**
 * Check if a path is an existing directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  return (await statOrNull(path))?.isDirectory() ?? false;
}

/**
 * First path of the form `<dir>/<name><ext>`, `<dir>/<name>-2<ext>`, ...
 * that does not exist yet
 */
export async function uniquePath(directory: string, filename: string): Promise<string> {
  const { name, ext } = parse(filename);
  let candidate = join(directory, filename);

  for (let n = 2; await fileExists(candidate); n++) {
    candidate = join(directory, `${name}-${n}${ext}`);
  }

  return candidate;
}
