/**
 * Phase I Module
 * Generates (I)mages and box files from the training text for each font and exposure
 */

import { readFile, writeFile } from "fs/promises";
import { checkFileReadable } from "../utils/check-file-readable";
import { fileExists } from "../utils/fs";
import { parseBigramFreqs, selectTrainingNgrams } from "../utils/ngrams";
import { makeFontname, makeOutbase } from "../utils/naming";
import { runTaskGroup } from "../utils/task-group";
import { VERTICAL_FONTS } from "../utils/fonts";
import type { LanguageParameters, RunSettings, TrainingContext } from "../types";

/**
 * Arguments shared by the rendering pass and the font-property pass of one unit
 */
export function buildCommonArguments(
  run: RunSettings,
  params: LanguageParameters,
  font: string,
  exposure: number,
  charSpacing: number,
): string[] {
  const outbase = makeOutbase(run.trainingDir, run.langCode, makeFontname(font), exposure);

  const args = [
    `--fontconfig_tmpdir=${run.fontConfigCache}`,
    `--fonts_dir=${run.fontsDir}`,
    "--strip_unrenderable_words",
    `--leading=${params.leading}`,
    `--char_spacing=${charSpacing}`,
    `--exposure=${exposure}`,
    `--outputbase=${outbase}`,
    `--max_pages=${run.maxPages}`,
  ];

  if (run.distortImage) {
    args.push("--distort_image");
  }

  const verticalFonts = run.verticalFonts.length > 0 ? run.verticalFonts : VERTICAL_FONTS;
  if (verticalFonts.includes(font)) {
    args.push("--writing_mode=vertical-upright");
  }

  return args;
}

/**
 * Compose the .train_ngrams file from the bigram frequencies of the language
 */
export async function writeTrainingNgrams(run: RunSettings): Promise<string[]> {
  const content = await readFile(run.bigramFreqsFile, "utf-8");
  const ngrams = selectTrainingNgrams(parseBigramFreqs(content));
  await writeFile(run.trainNgramsFile, ngrams.join(" "), "utf-8");
  await checkFileReadable(run.trainNgramsFile);
  return ngrams;
}

/**
 * Render one font at one exposure; optionally extract its font properties
 *
 * @returns "<font>-<exposure>"
 */
export async function generateFontImage(
  ctx: TrainingContext,
  params: LanguageParameters,
  font: string,
  exposure: number,
  charSpacing: number,
): Promise<string> {
  const { run, runner, logger } = ctx;

  logger.info(`Rendering using ${font}`);
  const outbase = makeOutbase(run.trainingDir, run.langCode, makeFontname(font), exposure);
  const common = buildCommonArguments(run, params, font, exposure, charSpacing);

  await runner.run("text2image", [
    ...common,
    `--font=${font}`,
    `--text=${run.trainingText}`,
    `--ptsize=${run.ptsize}`,
    ...params.text2imageExtraArgs,
  ]);
  await checkFileReadable(`${outbase}.box`, `${outbase}.tif`);

  if (run.extractFontProperties && (await fileExists(run.trainNgramsFile))) {
    logger.info(`Extracting font properties of ${font}`);
    await runner.run("text2image", [
      ...common,
      `--font=${font}`,
      "--ligatures=false",
      `--text=${run.trainNgramsFile}`,
      "--only_extract_font_properties",
      "--ptsize=32",
    ]);
    await checkFileReadable(`${outbase}.fontinfo`);
  }

  return `${font}-${exposure}`;
}

/**
 * Phase I
 *
 * Reads from context:
 * - run (paths, worker count, rendering switches)
 * - params.fonts, params.exposures
 *
 * Produces on disk, per font and exposure:
 * - <trainingDir>/<lang>.<fontname>.exp<exposure>.box / .tif (and .fontinfo)
 */
export async function generateImages(ctx: TrainingContext): Promise<void> {
  if (!ctx.params) {
    throw new Error("Parameters must be resolved before phase I");
  }

  const { run, params, logger, progress } = ctx;
  logger.info("=== Phase I: Generating training images ===");
  await checkFileReadable(run.trainingText);
  const charSpacing = 0;

  for (const exposure of params.exposures) {
    if (run.extractFontProperties && (await fileExists(run.bigramFreqsFile))) {
      await writeTrainingNgrams(run);
    }

    const batch = progress.start("phase-i", `Rendering exposure ${exposure}`, params.fonts.length);
    try {
      await runTaskGroup(
        params.fonts,
        (font) => generateFontImage(ctx, params, font, exposure, charSpacing),
        {
          concurrency: run.workers.images,
          onComplete: () => progress.increment(batch),
        },
      );
    } catch (error) {
      logger.error("Failed while generating images");
      throw error;
    }
    progress.finish(batch);

    // Every unit checked its own output; check the whole set again once the pool drained
    for (const font of params.fonts) {
      const outbase = makeOutbase(run.trainingDir, run.langCode, makeFontname(font), exposure);
      await checkFileReadable(`${outbase}.box`, `${outbase}.tif`);
    }
  }
}
