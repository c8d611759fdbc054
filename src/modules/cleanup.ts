/**
 * Cleanup Module
 * Copies the log file to the output directory and removes the scratch directory
 */

import { copyFile, rm } from "fs/promises";
import path from "node:path";
import { fileExists } from "../utils/fs";
import type { TrainingContext } from "../types";

export async function cleanup(ctx: TrainingContext): Promise<void> {
  const { run, logger } = ctx;

  if (run.logFile && (await fileExists(run.logFile)) && (await fileExists(run.outputDir))) {
    await copyFile(run.logFile, path.join(run.outputDir, path.basename(run.logFile)));
  }

  // The log file lives inside the scratch directory
  logger.setFile(null);
  await rm(run.trainingDir, { recursive: true, force: true });
}
