/**
 * Artifact naming
 * Every phase derives its file names from these, so the sets are predictable on disk
 */

import path from "node:path";

// Feature extraction settings for LSTM training data
export const LSTM_BOX_CONFIG = ["lstm.train"] as const;
export const LSTM_FEATURE_EXTENSION = "lstmf";

/**
 * Convert a font display name to one without spaces and commas
 *
 * @example
 * makeFontname("Times New Roman, Bold") // "Times_New_Roman_Bold"
 */
export function makeFontname(font: string): string {
  return font.replaceAll(" ", "_").replaceAll(",", "");
}

/**
 * Base output path of a Phase I work unit: <trainingDir>/<lang>.<fontname>.exp<exposure>
 */
export function makeOutbase(
  trainingDir: string,
  langCode: string,
  fontname: string,
  exposure: number,
): string {
  return path.join(trainingDir, `${langCode}.${fontname}.exp${exposure}`);
}

/**
 * Strip the last extension from a path
 *
 * @example
 * withoutExtension("/tmp/eng.Arial.exp0.tif") // "/tmp/eng.Arial.exp0"
 */
export function withoutExtension(file: string): string {
  const ext = path.extname(file);
  return ext ? file.slice(0, -ext.length) : file;
}

/**
 * Manifest listing the feature files handed to model training
 */
export function manifestPath(outputDir: string, langCode: string): string {
  return path.join(outputDir, `${langCode}.training_files.txt`);
}
