/**
 * Training context - flows through the entire pipeline
 * The resolver and each phase read what they need and write their results back
 */

import type { CallerParameters, LanguageParameters, ResolverEnvironment } from "./languages";
import type { CommandRunner } from "../utils/run-command";
import type { Logger } from "../utils/logger";
import type { ProgressTracker } from "../utils/progress-tracker";

/**
 * Paths and switches of a single run, fixed before the resolver runs
 */
export interface RunSettings {
  langCode: string;

  langdataDir: string;
  tessdataDir: string;
  fontsDir: string;
  outputDir: string;

  // Scratch directory, removed on cleanup
  trainingDir: string;
  fontConfigCache: string;
  logFile: string | null;

  trainingText: string;
  bigramFreqsFile: string;
  trainNgramsFile: string;

  maxPages: number;
  ptsize: number;
  distortImage: boolean;
  extractFontProperties: boolean;
  saveBoxTiff: boolean;
  // Empty list means the built-in vertical font list
  verticalFonts: readonly string[];

  workers: {
    images: number;
    features: number;
  };

  // Fonts/exposures given on the command line or by the library caller
  caller: CallerParameters;
}

export type TrainingState =
  | "init"
  | "resolve-params"
  | "fontconfig"
  | "phase-i"
  | "phase-up"
  | "phase-e"
  | "assembly"
  | "cleanup"
  | "done"
  | "failed";

export interface TrainingContext {
  // Input - provided at initialization
  run: RunSettings;
  environment: ResolverEnvironment;
  runner: CommandRunner;
  logger: Logger;
  progress: ProgressTracker;

  params?: LanguageParameters; // Resolver output, frozen
  unicharsetFile?: string; // Phase UP
  xheightsFile?: string; // Phase UP
  manifestFile?: string; // Assembly
}
