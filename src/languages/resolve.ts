/**
 * Language Parameter Resolver
 * Pure mapping from a language code (plus caller input and environment) to its parameters
 */

import { FONTS } from "../utils/fonts";
import { InvalidLanguageCodeError } from "../utils/errors";
import { LANGUAGE_RULES, corpusFor } from "./rules";
import { getScriptTraits } from "./scripts";
import type {
  CallerParameters,
  LanguageDraft,
  LanguageParameters,
  LanguageRule,
  ResolverEnvironment,
} from "../types";

// Every code some rule answers for, in table order
export const VALID_LANGUAGE_CODES: readonly string[] = LANGUAGE_RULES.flatMap(
  (rule) => rule.languages,
);

const RULES_BY_CODE = new Map<string, LanguageRule>();
for (const rule of LANGUAGE_RULES) {
  for (const code of rule.languages) {
    // First match wins
    if (!RULES_BY_CODE.has(code)) RULES_BY_CODE.set(code, rule);
  }
}

export function isValidLanguageCode(lang: string): boolean {
  return RULES_BY_CODE.has(lang);
}

/**
 * Defaults shared by every language; rules override from here
 */
function createDraft(lang: string, env: ResolverEnvironment): LanguageDraft {
  return {
    textCorpus: corpusFor(env, lang),
    fonts: [],
    exposures: [],
    filterArguments: [],
    trainingDataArguments: [],
    wordlist2dawgArguments: "",
    text2imageExtraArgs: [],
    // Fractions of the corpus not covered by the dawg. The number factor is the
    // fraction of numeric strings not covered, hence higher.
    wordDawgFactor: 0.05,
    numberDawgFactor: 0.125,
    bigramDawgFactor: 0.015,
    puncDawgFactor: null,
    wordDawgSize: null,
    generateWordBigrams: null,
    fragmentsDisabled: "y",
    runShapeClustering: false,
    ambigsFilterDenominator: "100000",
    leading: 32,
    meanCount: 40,
    mixLang: "eng",
    normMode: 1,
    langIsRtl: false,
  };
}

function freeze(draft: LanguageDraft): LanguageParameters {
  return Object.freeze({
    ...draft,
    fonts: Object.freeze([...draft.fonts]),
    exposures: Object.freeze([...draft.exposures]),
    filterArguments: Object.freeze([...draft.filterArguments]),
    trainingDataArguments: Object.freeze([...draft.trainingDataArguments]),
    text2imageExtraArgs: Object.freeze([...draft.text2imageExtraArgs]),
  });
}

/**
 * Resolve the parameters of a language.
 *
 * Non-empty caller fonts/exposures take precedence over the language defaults.
 * A positive `env.meanCount` takes precedence over rule and default values.
 *
 * @throws InvalidLanguageCodeError for codes no rule answers for
 */
export function resolveLanguage(
  lang: string,
  caller: CallerParameters = {},
  env: ResolverEnvironment = { webtextPrefix: "", meanCount: -1 },
): LanguageParameters {
  const rule = RULES_BY_CODE.get(lang);
  if (!rule) {
    throw new InvalidLanguageCodeError(lang);
  }

  const draft = createDraft(lang, env);
  rule.apply?.(draft, env, lang);

  if (env.meanCount > 0) {
    draft.meanCount = env.meanCount;
    draft.trainingDataArguments.push(`--mean_count=${env.meanCount}`);
  }

  if (caller.fonts && caller.fonts.length > 0) {
    draft.fonts = [...caller.fonts];
  } else if (draft.fonts.length === 0) {
    draft.fonts = [...FONTS.latin];
  }

  if (caller.exposures && caller.exposures.length > 0) {
    draft.exposures = [...caller.exposures];
  } else if (draft.exposures.length === 0) {
    draft.exposures = [0];
  }

  const { normMode, langIsRtl } = getScriptTraits(lang);
  draft.normMode = normMode;
  draft.langIsRtl = langIsRtl;

  return freeze(draft);
}
