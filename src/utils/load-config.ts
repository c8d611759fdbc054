/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { ZodError } from "zod";
import type { ConfigError, PartialTrainingConfig, TrainingConfig } from "../types";
import { TrainingConfigSchema, PartialTrainingConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("ocr-trainer", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/ocr-trainer or ~/.config/ocr-trainer
 * - macOS: ~/Library/Preferences/ocr-trainer
 * - Windows: %APPDATA%\ocr-trainer
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<TrainingConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return TrainingConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable or invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialTrainingConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialTrainingConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial config over a full one
 */
export function mergeConfig(
  base: TrainingConfig,
  override: PartialTrainingConfig,
): TrainingConfig {
  return {
    lang: override.lang !== undefined ? override.lang : base.lang,
    paths: { ...base.paths, ...override.paths },
    rendering: { ...base.rendering, ...override.rendering },
    output: { ...base.output, ...override.output },
    workers: { ...base.workers, ...override.workers },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: TrainingConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

/**
 * One-line reason for a config file that was skipped
 */
export function describeConfigError(error: unknown): string {
  if (error instanceof ZodError) {
    return `schema validation: ${error.issues.map((e) => e.message).join("; ")}`;
  }
  if (error instanceof SyntaxError) {
    return `invalid JSON: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
