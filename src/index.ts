/**
 * Library entry point
 */

import { Trainer } from "./trainer";
import { createRunSettings } from "./utils/run-settings";
import { loadDefaultConfig, mergeConfig } from "./utils/load-config";
import { readResolverEnvironment } from "./utils/environment";
import { Logger } from "./utils/logger";
import { ProgressTracker } from "./utils/progress-tracker";
import { ProcessCommandRunner } from "./utils/run-command";
import type { CommandRunner } from "./utils/run-command";
import type { PartialTrainingConfig, ResolverEnvironment, TrainingContext } from "./types";

export interface TrainOptions {
  lang: string;
  // Merged over src/config/default.json
  config?: PartialTrainingConfig;
  // Defaults to FLAGS_webtext_prefix / FLAGS_mean_count of the current process
  environment?: ResolverEnvironment;
  runner?: CommandRunner;
  logger?: Logger;
  progress?: ProgressTracker;
}

/**
 * Run the whole pipeline for one language
 *
 * The scratch directory is removed whether the run succeeds or not.
 * No log file is written.
 *
 * @returns 0 on success, 1 on any failure
 */
export async function train(options: TrainOptions): Promise<number> {
  const logger = options.logger ?? new Logger();

  let trainer: Trainer | undefined;
  let exitCode = 0;
  try {
    const merged = mergeConfig(await loadDefaultConfig(), options.config ?? {});
    const config = { ...merged, logging: { ...merged.logging, logFile: false } };
    const run = await createRunSettings(config, options.lang);
    const ctx: TrainingContext = {
      run,
      environment: options.environment ?? readResolverEnvironment(),
      runner: options.runner ?? new ProcessCommandRunner(logger),
      logger,
      progress: options.progress ?? new ProgressTracker(),
    };

    trainer = new Trainer(ctx);
    await trainer.run();
  } catch (error) {
    logger.critical(error instanceof Error ? error.message : String(error));
    exitCode = 1;
  }

  if (trainer) {
    try {
      await trainer.cleanup();
    } catch (error) {
      logger.error("Cleanup failed", error);
      exitCode = 1;
    }
  }

  return exitCode;
}

export { Trainer } from "./trainer";
export * from "./types";
export * from "./languages";
export * from "./modules";
export * from "./utils";
