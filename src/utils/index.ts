/**
 * Utility exports
 */

// Errors
export {
  PipelineError,
  ToolNotFoundError,
  ToolExecutionFailedError,
  MissingArtifactError,
  UnreadableArtifactError,
  InvalidLanguageCodeError,
  isPipelineError,
  getErrorCode,
} from "./errors";
export type { PipelineErrorCode } from "./errors";
export { exitOnFatal } from "./fatal";

// Filesystem utilities
export { fileExists, isExecutable, moveFile } from "./fs";
export { checkFileReadable } from "./check-file-readable";

// Artifact naming
export {
  LSTM_BOX_CONFIG,
  LSTM_FEATURE_EXTENSION,
  makeFontname,
  makeOutbase,
  withoutExtension,
  manifestPath,
} from "./naming";
export { parseBigramFreqs, selectTrainingNgrams, NGRAM_COVERAGE } from "./ngrams";
export type { BigramRecord } from "./ngrams";
export { FONTS, VERTICAL_FONTS, loadFontTable } from "./fonts";
export type { FontTable, FontFamily } from "./fonts";

// Process utilities
export {
  ProcessCommandRunner,
  TOOL_SEARCH_PREFIXES,
  resolveTool,
  which,
} from "./run-command";
export type { CommandRunner, RunOptions, ResolvedTool, ToolLookupOptions } from "./run-command";
export { runTaskGroup } from "./task-group";
export type { TaskGroupOptions } from "./task-group";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
  describeConfigError,
} from "./load-config";
export { readResolverEnvironment } from "./environment";
export { createRunSettings } from "./run-settings";

// Classes
export { Logger } from "./logger";
export type { LogLevel, LoggerOptions } from "./logger";
export { ProgressTracker } from "./progress-tracker";
export type { PhaseProgress, TrainingStats } from "./progress-tracker";
