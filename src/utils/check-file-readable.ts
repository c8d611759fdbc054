/**
 * Artifact Checker
 * Used to check required input files and produced output files in each phase
 */

import { open } from "fs/promises";
import { getErrorCode, MissingArtifactError, UnreadableArtifactError } from "./errors";

/**
 * Open every file once, failing on the first one that is missing or unreadable
 *
 * @returns Always true; any problem is thrown instead
 * @throws MissingArtifactError, UnreadableArtifactError
 */
export async function checkFileReadable(...filenames: string[]): Promise<true> {
  for (const filename of filenames) {
    try {
      const handle = await open(filename, "r");
      await handle.close();
    } catch (error) {
      const code = getErrorCode(error);
      if (code === "ENOENT") {
        throw new MissingArtifactError(filename);
      }
      if (code === "EACCES" || code === "EPERM") {
        throw new UnreadableArtifactError(filename, "permission", error);
      }
      throw new UnreadableArtifactError(filename, "io", error);
    }
  }
  return true;
}
