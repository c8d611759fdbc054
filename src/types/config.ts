/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const PathsConfigSchema = z.object({
  langdataDir: z.string(),
  tessdataDir: z.string(),
  fontsDir: z.string(),
  // Empty string means the OS temporary directory
  tmpDir: z.string(),
  outputDir: z.string(),
  // Null means <langdataDir>/<lang>/<lang>.training_text
  trainingText: z.string().nullable(),
});

export const RenderingConfigSchema = z.object({
  // Empty lists fall back to the language defaults
  fonts: z.array(z.string()),
  exposures: z.array(z.number().int()),
  // Empty list means the built-in vertical font list
  verticalFonts: z.array(z.string()),
  maxPages: z.number().int().nonnegative(),
  ptsize: z.number().int().positive(),
  distortImage: z.boolean(),
  extractFontProperties: z.boolean(),
});

export const OutputConfigSchema = z.object({
  saveBoxTiff: z.boolean(),
});

export const WorkersConfigSchema = z.object({
  images: z.number().int().positive(),
  features: z.number().int().positive(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  logFile: z.boolean(),
  showProgress: z.boolean(),
});

export const TrainingConfigSchema = z.object({
  lang: z.string().nullable(),
  paths: PathsConfigSchema,
  rendering: RenderingConfigSchema,
  output: OutputConfigSchema,
  workers: WorkersConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialTrainingConfigSchema = TrainingConfigSchema.partial().extend({
  paths: PathsConfigSchema.partial().optional(),
  rendering: RenderingConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  workers: WorkersConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Environment-derived inputs of the language resolver
export const ResolverEnvironmentSchema = z.object({
  FLAGS_webtext_prefix: z.string().default(""),
  FLAGS_mean_count: z.coerce.number().int().default(-1),
});

// Infer TypeScript types from Zod schemas
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type RenderingConfig = z.infer<typeof RenderingConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type WorkersConfig = z.infer<typeof WorkersConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type TrainingConfig = z.infer<typeof TrainingConfigSchema>;
export type PartialTrainingConfig = z.infer<typeof PartialTrainingConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
