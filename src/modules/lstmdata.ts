/**
 * LSTM Data Module
 * Builds the starter traineddata and collects the training files into the output directory
 */

import glob from "fast-glob";
import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { moveFile } from "../utils/fs";
import { manifestPath } from "../utils/naming";
import type { TrainingContext } from "../types";

/**
 * Files to relocate from the scratch directory, in move order
 */
async function collectTrainingFiles(ctx: TrainingContext): Promise<string[]> {
  const { run, logger } = ctx;
  const options = { cwd: run.trainingDir, absolute: true, onlyFiles: true };
  const files: string[] = [];

  if (run.saveBoxTiff) {
    logger.info("=== Saving box/tiff pairs for training data ===");
    files.push(...(await glob(`${run.langCode}*.box`, options)).sort());
    files.push(...(await glob(`${run.langCode}*.tif`, options)).sort());
  }

  logger.info("=== Moving lstmf files for training data ===");
  files.push(...(await glob(`${run.langCode}.*.lstmf`, options)).sort());
  return files;
}

/**
 * Assembly
 *
 * Reads from disk:
 * - <trainingDir>/<lang>.unicharset
 * - <langdataDir>/<lang>/<lang>.wordlist / .numbers / .punc
 * - <trainingDir>/<lang>.*.lstmf
 *
 * Writes to context:
 * - manifestFile: <outputDir>/<lang>.training_files.txt
 */
export async function makeLstmData(ctx: TrainingContext): Promise<void> {
  if (!ctx.params) {
    throw new Error("Parameters must be resolved before assembling LSTM data");
  }

  const { run, params, runner, logger } = ctx;
  logger.info("=== Constructing LSTM training data ===");

  const langPrefix = path.join(run.langdataDir, run.langCode, run.langCode);
  await mkdir(run.outputDir, { recursive: true });

  const args: string[] = [];
  if (params.langIsRtl) {
    args.push("--lang_is_rtl");
  }
  if (params.normMode >= 2) {
    args.push("--pass_through_recoder");
  }

  // Build the starter traineddata from the inputs
  await runner.run("combine_lang_model", [
    "--input_unicharset",
    ctx.unicharsetFile ?? path.join(run.trainingDir, `${run.langCode}.unicharset`),
    "--script_dir",
    run.langdataDir,
    "--words",
    `${langPrefix}.wordlist`,
    "--numbers",
    `${langPrefix}.numbers`,
    "--puncs",
    `${langPrefix}.punc`,
    "--output_dir",
    run.outputDir,
    "--lang",
    run.langCode,
    ...args,
  ]);

  for (const file of await collectTrainingFiles(ctx)) {
    const target = path.join(run.outputDir, path.basename(file));
    logger.debug(`Moving ${file} to ${target}`);
    await moveFile(file, target);
  }

  const featureFiles = await glob(`${run.langCode}.*.lstmf`, {
    cwd: run.outputDir,
    absolute: true,
    onlyFiles: true,
  });
  featureFiles.sort();

  const manifest = manifestPath(run.outputDir, run.langCode);
  await writeFile(manifest, featureFiles.map((file) => `${file}\n`).join(""), "utf-8");
  ctx.manifestFile = manifest;
}
