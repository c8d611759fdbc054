/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, copyFile, rename, stat, unlink } from "fs/promises";
import { constants } from "node:fs";
import { getErrorCode } from "./errors";

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a regular file the current user may execute
 */
export async function isExecutable(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Move a file, falling back to copy + unlink across devices
 */
export async function moveFile(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (getErrorCode(error) !== "EXDEV") throw error;
    await copyFile(source, target);
    await unlink(source);
  }
}
