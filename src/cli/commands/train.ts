/**
 * Train command - Loads config and runs the training pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  createRunSettings,
  describeConfigError,
  exitOnFatal,
  loadConfig,
  Logger,
  ProcessCommandRunner,
  ProgressTracker,
  readResolverEnvironment,
} from "../../utils";
import * as modules from "../../modules";
import { Trainer } from "../../trainer";
import type { TrainingConfig, TrainingContext, TrainingState } from "../../types";

const TrainOptionsSchema = z.object({
  lang: z.string().optional(),
  langdataDir: z.string().optional(),
  tessdataDir: z.string().optional(),
  fontsDir: z.string().optional(),
  tmpDir: z.string().optional(),
  outputDir: z.string().optional(),
  trainingText: z.string().optional(),
  fontlist: z.array(z.string()).optional(),
  exposures: z.array(z.coerce.number().int()).optional(),
  maxpages: z.coerce.number().int().nonnegative().optional(),
  ptsize: z.coerce.number().int().positive().optional(),
  workers: z.coerce.number().int().positive().optional(),
  distortImage: z.boolean().optional(),
  extractFontProperties: z.boolean().optional(),
  saveBoxTiff: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof TrainOptionsSchema>;

const STATE_LABELS: Record<TrainingState, string> = {
  init: "Initializing...",
  "resolve-params": "Resolving language parameters...",
  fontconfig: "Initializing fontconfig...",
  "phase-i": "Generating training images...",
  "phase-up": "Generating unicharset...",
  "phase-e": "Extracting features...",
  assembly: "Constructing LSTM training data...",
  cleanup: "Cleaning up...",
  done: "Done",
  failed: "Failed",
};

/**
 * Apply command-line options over the merged config
 */
function applyOptions(config: TrainingConfig, options: Options): TrainingConfig {
  const { paths, rendering, output, workers } = config;

  return {
    ...config,
    lang: options.lang ?? config.lang,
    paths: {
      ...paths,
      langdataDir: options.langdataDir ?? paths.langdataDir,
      tessdataDir: options.tessdataDir ?? paths.tessdataDir,
      fontsDir: options.fontsDir ?? paths.fontsDir,
      tmpDir: options.tmpDir ?? paths.tmpDir,
      outputDir: options.outputDir ?? paths.outputDir,
      trainingText: options.trainingText ?? paths.trainingText,
    },
    rendering: {
      ...rendering,
      fonts: options.fontlist ?? rendering.fonts,
      exposures: options.exposures ?? rendering.exposures,
      maxPages: options.maxpages ?? rendering.maxPages,
      ptsize: options.ptsize ?? rendering.ptsize,
      distortImage: options.distortImage ?? rendering.distortImage,
      // Commander defaults --no-* flags to true, so only an explicit false counts
      extractFontProperties:
        options.extractFontProperties === false ? false : rendering.extractFontProperties,
    },
    output: {
      saveBoxTiff: options.saveBoxTiff ?? output.saveBoxTiff,
    },
    workers: {
      ...workers,
      images: options.workers ?? workers.images,
    },
  };
}

export async function trainCommand(opts: Options): Promise<void> {
  const logger = new Logger();

  let options: Options;
  let config: TrainingConfig;
  try {
    // Validate CLI options
    options = TrainOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const loaded = await loadConfig(options.config);
    for (const err of loaded.errors) {
      logger.warn(`Ignoring config file ${err.path}: ${describeConfigError(err.error)}`);
    }

    // Override with CLI options
    config = applyOptions(loaded.config, options);
  } catch (error) {
    exitOnFatal(error, logger);
  }

  const lang = config.lang;
  if (!lang) {
    exitOnFatal(new Error("No language given, use --lang <code>"), logger);
  }

  const verbose = options.verbose ?? false;
  const showSpinner = config.logging.showProgress && !verbose;
  logger.setLevel(verbose ? "debug" : config.logging.level);
  logger.setQuiet(showSpinner);

  const spinner = ora({ text: STATE_LABELS.init, indent: 2, isEnabled: showSpinner }).start();

  try {
    const run = await createRunSettings(config, lang);
    logger.setFile(run.logFile);

    const progress = new ProgressTracker();
    progress.onStateChange((state) => {
      spinner.text = STATE_LABELS[state];
    });
    progress.onProgress((batch) => {
      spinner.text = `${batch.label} (${batch.completed}/${batch.total})`;
    });

    const ctx: TrainingContext = {
      run,
      environment: readResolverEnvironment(),
      runner: new ProcessCommandRunner(logger),
      logger,
      progress,
    };

    const trainer = new Trainer(ctx);
    await trainer.run();
    await trainer.cleanup();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();
    logger.setQuiet(false);

    modules.stats(ctx);
    logger.info("All done!");
  } catch (error) {
    spinner.fail("Training failed");
    logger.setQuiet(false);
    exitOnFatal(error, logger);
  }
}
