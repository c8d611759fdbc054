/**
 * Language parameter types
 */

/**
 * Normalization mode handed to unicharset_extractor
 * 1 = combine graphemes (most scripts), 2 = pure unicode (complex and RTL scripts)
 */
export type NormMode = 1 | 2;

/**
 * Everything the resolver decides for a language code.
 * Fields marked nullable are intentionally optional and stay null unless a rule sets them.
 */
export interface LanguageParameters {
  // Training corpus for the language (used by later, out-of-scope stages)
  textCorpus: string;
  fonts: readonly string[];
  exposures: readonly number[];

  // Text-filtering and training-data arguments for later stages
  filterArguments: readonly string[];
  trainingDataArguments: readonly string[];
  wordlist2dawgArguments: string;
  text2imageExtraArgs: readonly string[];

  // Fractions of the corpus not covered by each dawg
  wordDawgFactor: number;
  numberDawgFactor: number;
  bigramDawgFactor: number;
  puncDawgFactor: number | null;
  wordDawgSize: number | null;
  generateWordBigrams: number | null;

  fragmentsDisabled: string;
  runShapeClustering: boolean;
  ambigsFilterDenominator: string;
  leading: number;
  meanCount: number;
  // Language to mix in for maximum accuracy
  mixLang: string;

  normMode: NormMode;
  langIsRtl: boolean;
}

/**
 * Values a caller may set before resolution.
 * Empty lists count as "not set".
 */
export interface CallerParameters {
  fonts?: readonly string[];
  exposures?: readonly number[];
}

/**
 * Process-wide inputs made explicit
 */
export interface ResolverEnvironment {
  // Directory prefix for <lang>.corpus.txt
  webtextPrefix: string;
  // Overrides every rule and default when positive
  meanCount: number;
}

/**
 * Mutable working copy a language rule writes to
 */
export type LanguageDraft = {
  -readonly [K in keyof LanguageParameters]: LanguageParameters[K] extends readonly (infer T)[]
    ? T[]
    : LanguageParameters[K];
};

export interface LanguageRule {
  // Codes this rule applies to
  languages: readonly string[];
  apply?: (draft: LanguageDraft, env: ResolverEnvironment, lang: string) => void;
}
