/**
 * Run settings
 * Fixes every path and switch of a run and creates its scratch directories
 */

import { mkdir, mkdtemp } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { CallerParameters, RunSettings, TrainingConfig } from "../types";

function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

function nonEmpty<T>(values: readonly T[]): readonly T[] | undefined {
  return values.length > 0 ? values : undefined;
}

/**
 * Build the settings of a run from the merged configuration
 *
 * Creates `<tmp>/<lang>-<YYYY-MM-DD>XXXXXX` and the font-config cache inside it.
 */
export async function createRunSettings(
  config: TrainingConfig,
  lang: string,
  now: Date = new Date(),
): Promise<RunSettings> {
  const { paths, rendering, output, workers, logging } = config;

  const tmpDir = path.resolve(paths.tmpDir || tmpdir());
  await mkdir(tmpDir, { recursive: true });

  const trainingDir = await mkdtemp(path.join(tmpDir, `${lang}-${formatDate(now)}`));
  const fontConfigCache = await mkdtemp(path.join(trainingDir, "font_tmp"));

  const langdataDir = path.resolve(paths.langdataDir);
  const trainingText = path.resolve(
    paths.trainingText ?? path.join(langdataDir, lang, `${lang}.training_text`),
  );

  const caller: CallerParameters = {
    fonts: nonEmpty(rendering.fonts),
    exposures: nonEmpty(rendering.exposures),
  };

  return {
    langCode: lang,
    langdataDir,
    tessdataDir: path.resolve(paths.tessdataDir),
    fontsDir: paths.fontsDir ? path.resolve(paths.fontsDir) : "",
    outputDir: path.resolve(paths.outputDir),
    trainingDir,
    fontConfigCache,
    logFile: logging.logFile ? path.join(trainingDir, "training.log") : null,
    trainingText,
    bigramFreqsFile: `${trainingText}.bigram_freqs`,
    trainNgramsFile: path.join(trainingDir, `${lang}.train_ngrams`),
    maxPages: rendering.maxPages,
    ptsize: rendering.ptsize,
    distortImage: rendering.distortImage,
    extractFontProperties: rendering.extractFontProperties,
    saveBoxTiff: output.saveBoxTiff,
    verticalFonts: rendering.verticalFonts,
    workers: { ...workers },
    caller,
  };
}
