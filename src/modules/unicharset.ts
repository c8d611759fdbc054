/**
 * Phase UP Module
 * Generates the (U)nicharset and unichar (P)roperties files
 */

import glob from "fast-glob";
import path from "node:path";
import { checkFileReadable } from "../utils/check-file-readable";
import type { TrainingContext } from "../types";

/**
 * Phase UP
 *
 * Reads from disk:
 * - <trainingDir>/*.box (rediscovered, not handed over by Phase I)
 *
 * Writes to context:
 * - unicharsetFile: <trainingDir>/<lang>.unicharset
 * - xheightsFile: <trainingDir>/<lang>.xheights
 */
export async function generateUnicharset(ctx: TrainingContext): Promise<void> {
  if (!ctx.params) {
    throw new Error("Parameters must be resolved before phase UP");
  }

  const { run, params, runner, logger } = ctx;
  logger.info("=== Phase UP: Generating unicharset and unichar properties files ===");

  const boxFiles = await glob("*.box", {
    cwd: run.trainingDir,
    absolute: true,
    onlyFiles: true,
  });
  boxFiles.sort();

  const unicharsetFile = path.join(run.trainingDir, `${run.langCode}.unicharset`);
  await runner.run("unicharset_extractor", [
    "--output_unicharset",
    unicharsetFile,
    "--norm_mode",
    `${params.normMode}`,
    ...boxFiles,
  ]);
  await checkFileReadable(unicharsetFile);
  ctx.unicharsetFile = unicharsetFile;

  // Input and output are the same file: properties are added in place
  const xheightsFile = path.join(run.trainingDir, `${run.langCode}.xheights`);
  await runner.run("set_unicharset_properties", [
    "-U",
    unicharsetFile,
    "-O",
    unicharsetFile,
    "-X",
    xheightsFile,
    `--script_dir=${run.langdataDir}`,
  ]);
  await checkFileReadable(xheightsFile);
  ctx.xheightsFile = xheightsFile;
}
