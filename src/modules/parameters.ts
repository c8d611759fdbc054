/**
 * Parameters Module
 * Resolves the language parameters once, before any phase runs
 */

import { resolveLanguage } from "../languages";
import type { LanguageParameters, TrainingContext } from "../types";

type ParameterField = keyof LanguageParameters;

const PARAMETER_FIELDS: readonly ParameterField[] = [
  "ambigsFilterDenominator",
  "bigramDawgFactor",
  "exposures",
  "filterArguments",
  "fonts",
  "fragmentsDisabled",
  "generateWordBigrams",
  "langIsRtl",
  "leading",
  "meanCount",
  "mixLang",
  "normMode",
  "numberDawgFactor",
  "puncDawgFactor",
  "runShapeClustering",
  "text2imageExtraArgs",
  "textCorpus",
  "trainingDataArguments",
  "wordDawgFactor",
  "wordDawgSize",
  "wordlist2dawgArguments",
];

function format(value: unknown): string {
  return JSON.stringify(value) ?? "undefined";
}

/**
 * One diagnostic line per field: newly set, unchanged from the caller, or overriding it
 */
export function describeParameterChanges(
  previous: Partial<LanguageParameters>,
  next: LanguageParameters,
): string[] {
  return PARAMETER_FIELDS.map((field) => {
    const value = format(next[field]);
    if (previous[field] === undefined) {
      return `${field} = ${value}`;
    }
    const before = format(previous[field]);
    if (before === value) {
      return `${field} = ${value} (set on cmdline)`;
    }
    return `${field} = ${value} (was ${before})`;
  });
}

/**
 * Values already on the context before resolution
 */
function previousParameters(ctx: TrainingContext): Partial<LanguageParameters> {
  if (ctx.params) return ctx.params;

  const previous: Partial<LanguageParameters> = {};
  const { fonts, exposures } = ctx.run.caller;
  if (fonts && fonts.length > 0) previous.fonts = fonts;
  if (exposures && exposures.length > 0) previous.exposures = exposures;
  return previous;
}

/**
 * Resolve the language parameters for the run
 *
 * Reads from context:
 * - run.langCode, run.caller
 * - environment
 *
 * Writes to context:
 * - params: frozen LanguageParameters
 */
export function applyLanguageParameters(ctx: TrainingContext): LanguageParameters {
  const { run, environment, logger } = ctx;

  const params = resolveLanguage(run.langCode, run.caller, environment);

  for (const line of describeParameterChanges(previousParameters(ctx), params)) {
    logger.debug(line);
  }

  ctx.params = params;
  return params;
}
