/**
 * Phase E Module
 * (E)xtracts one feature file per rendered image
 */

import glob from "fast-glob";
import path from "node:path";
import { checkFileReadable } from "../utils/check-file-readable";
import { fileExists } from "../utils/fs";
import { runTaskGroup } from "../utils/task-group";
import { LSTM_BOX_CONFIG, LSTM_FEATURE_EXTENSION, withoutExtension } from "../utils/naming";
import type { TrainingContext } from "../types";

export interface FeatureOptions {
  boxConfig: readonly string[];
  extension: string;
}

/**
 * Phase E
 *
 * Reads from disk:
 * - <trainingDir>/*.exp*.tif
 * - <langdataDir>/<lang>/<lang>.config, when present
 *
 * Produces on disk, per image:
 * - <image without .tif>.<extension>
 */
export async function extractFeatures(
  ctx: TrainingContext,
  options: FeatureOptions = {
    boxConfig: LSTM_BOX_CONFIG,
    extension: LSTM_FEATURE_EXTENSION,
  },
): Promise<void> {
  const { run, runner, logger, progress } = ctx;
  const { boxConfig, extension } = options;
  logger.info(`=== Phase E: Generating ${extension} files ===`);

  const imageFiles = await glob("*.exp*.tif", {
    cwd: run.trainingDir,
    absolute: true,
    onlyFiles: true,
  });
  imageFiles.sort();
  logger.debug(imageFiles.join("\n"));

  // Use any available language-specific config
  const config: string[] = [];
  const languageConfig = path.join(run.langdataDir, run.langCode, `${run.langCode}.config`);
  if (await fileExists(languageConfig)) {
    config.push(languageConfig);
    logger.info(`Using ${run.langCode}.config`);
  }

  const env: NodeJS.ProcessEnv = { ...process.env, TESSDATA_PREFIX: run.tessdataDir };
  logger.info(`Using TESSDATA_PREFIX=${env.TESSDATA_PREFIX}`);

  const batch = progress.start("phase-e", `Extracting ${extension} files`, imageFiles.length);
  try {
    await runTaskGroup(
      imageFiles,
      (imageFile) =>
        runner.run(
          "tesseract",
          [imageFile, withoutExtension(imageFile), ...boxConfig, ...config],
          { env },
        ),
      {
        concurrency: run.workers.features,
        onComplete: () => progress.increment(batch),
      },
    );
  } catch (error) {
    logger.error("Failed while extracting features");
    throw error;
  }
  progress.finish(batch);

  for (const imageFile of imageFiles) {
    await checkFileReadable(`${withoutExtension(imageFile)}.${extension}`);
  }
}
