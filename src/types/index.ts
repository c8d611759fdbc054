/**
 * Central type exports
 */

// Configuration
export type {
  TrainingConfig,
  PartialTrainingConfig,
  PathsConfig,
  RenderingConfig,
  OutputConfig,
  WorkersConfig,
  LoggingConfig,
  ConfigError,
} from "./config";
export {
  TrainingConfigSchema,
  PartialTrainingConfigSchema,
  ResolverEnvironmentSchema,
} from "./config";

// Languages
export type {
  NormMode,
  LanguageParameters,
  LanguageDraft,
  LanguageRule,
  CallerParameters,
  ResolverEnvironment,
} from "./languages";

// Context
export type { RunSettings, TrainingState, TrainingContext } from "./context";
