/**
 * Fontconfig Module
 * Renders one sample with the first font so the font cache exists before the parallel units start
 */

import { writeFile } from "fs/promises";
import path from "node:path";
import type { TrainingContext } from "../types";

export async function initializeFontconfig(ctx: TrainingContext): Promise<void> {
  if (!ctx.params) {
    throw new Error("Parameters must be resolved before fontconfig initialization");
  }

  const { run, params, runner, logger } = ctx;
  const samplePath = path.join(run.fontConfigCache, "sample_text.txt");
  await writeFile(samplePath, "Text\n", "utf-8");

  logger.info(`Testing font: ${params.fonts[0]}`);
  await runner.run("text2image", [
    `--fonts_dir=${run.fontsDir}`,
    `--font=${params.fonts[0]}`,
    `--outputbase=${samplePath}`,
    `--text=${samplePath}`,
    `--fontconfig_tmpdir=${run.fontConfigCache}`,
    `--ptsize=${run.ptsize}`,
  ]);
}
