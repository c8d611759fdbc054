#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for the OCR training-data generator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { trainCommand } from "./commands/train";
import { configCommand } from "./commands/config";
import { languagesCommand } from "./commands/languages";

const program = new Command();

program
  .name("ocr-train")
  .description("Generate LSTM training data from a training text and a set of fonts")
  .version("0.1.0");

// Main training command (default action)
program
  .option("-l, --lang <code>", "Language code to train (e.g. eng)")
  .option("--langdata-dir <path>", "Directory of per-language data")
  .option("--tessdata-dir <path>", "Directory of existing traineddata files")
  .option("--fonts-dir <path>", "Directory of the fonts to render with")
  .option("--tmp-dir <path>", "Parent of the scratch directory")
  .option("-o, --output-dir <path>", "Directory for the training data")
  .option("--training-text <path>", "Text to render")
  .option("--fontlist <fonts...>", "Fonts to render with (default: language fonts)")
  .option("--exposures <values...>", "Exposure levels (default: language exposures)")
  .option("--maxpages <n>", "Maximum pages to render per font")
  .option("--ptsize <n>", "Point size of the rendered text")
  .option("--workers <n>", "Parallel rendering units")
  .option("--distort-image", "Degrade the rendered images")
  .option("--no-extract-font-properties", "Skip the font-property pass")
  .option("--save-box-tiff", "Keep the box/tif pairs in the output directory")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(trainCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

// Languages command - list valid language codes
program
  .command("languages")
  .description("List every valid language code")
  .action(languagesCommand);

program.parse();
