/**
 * Language rules
 * Ordered table of language codes -> parameter overrides, first match wins.
 * A rule without `apply` keeps every default.
 */

import { FONTS } from "../utils/fonts";
import type { LanguageRule, ResolverEnvironment } from "../types";

const ALL_EXPOSURES = [-3, -2, -1, 0, 1, 2, 3];
const INFREQUENT = "--infrequent_ratio=10000";
const NO_SPACE = ["--no_space_in_output", "--desired_bigrams="];

export function corpusFor(env: ResolverEnvironment, lang: string): string {
  return `${env.webtextPrefix}/${lang}.corpus.txt`;
}

export const LANGUAGE_RULES: readonly LanguageRule[] = [
  // ==========================================================================
  // Latin languages
  // ==========================================================================
  {
    languages: ["enm"],
    apply: (p) => {
      p.text2imageExtraArgs.push("--ligatures");
      p.fonts = [...FONTS.earlyLatin];
    },
  },
  {
    languages: ["frm"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "fra");
      // Long-s substitutions for Middle French text
      p.filterArguments.push("--make_early_language_variant=fra");
      p.text2imageExtraArgs.push("--ligatures");
      p.fonts = [...FONTS.earlyLatin];
    },
  },
  {
    languages: ["frk", "deu_latf"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "deu");
      p.fonts = [...FONTS.fraktur];
    },
  },
  {
    languages: ["ita_old"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "ita");
      p.filterArguments.push("--make_early_language_variant=ita");
      p.text2imageExtraArgs.push("--ligatures");
      p.fonts = [...FONTS.earlyLatin];
    },
  },
  {
    languages: ["lat"],
    apply: (p) => {
      p.exposures = [...ALL_EXPOSURES];
      p.fonts = [...FONTS.neolatin];
    },
  },
  {
    languages: ["spa_old"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "spa");
      p.filterArguments.push("--make_early_language_variant=spa");
      p.text2imageExtraArgs.push("--ligatures");
      p.fonts = [...FONTS.earlyLatin];
    },
  },
  {
    languages: ["srp_latn"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "srp");
    },
  },
  {
    languages: ["vie"],
    apply: (p) => {
      p.trainingDataArguments.push(INFREQUENT);
      p.fonts = [...FONTS.vietnamese];
    },
  },

  // Highly inflective languages get a bigger dawg size
  {
    languages: ["hun", "pol"],
    apply: (p) => {
      p.wordDawgSize = 1_000_000;
    },
  },

  // Latin with default treatment
  {
    languages: [
      "afr", "aze", "bos", "cat", "ceb", "cym", "dan", "epo", "est", "eus",
      "fil", "fin", "gle", "glg", "hat", "hrv", "iast", "ind", "isl", "ita",
      "jav", "lav", "lit", "mlt", "msa", "nor", "por", "ron", "slk", "slv",
      "spa", "sqi", "swa", "swe", "tgl", "tur", "uzb", "zlm",
    ],
  },
  {
    languages: ["ces"],
    apply: (p) => {
      p.puncDawgFactor = 0.004;
    },
  },
  {
    languages: ["deu"],
    apply: (p) => {
      p.wordDawgFactor = 0.125;
    },
  },
  {
    languages: ["eng"],
    apply: (p) => {
      p.wordDawgFactor = 0.03;
    },
  },
  {
    languages: ["fra"],
    apply: (p) => {
      p.wordDawgFactor = 0.08;
    },
  },
  {
    languages: ["gle_uncial"],
    apply: (p) => {
      p.fonts = [...FONTS.irishUncial];
    },
  },
  {
    languages: ["nld"],
    apply: (p) => {
      p.wordDawgFactor = 0.02;
    },
  },

  // Language-id trained on EFIGS+Latin+Vietnamese text with regular + fraktur fonts
  {
    languages: ["lat_lid"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "lat_lid");
      p.trainingDataArguments.push(INFREQUENT);
      p.generateWordBigrams = 0;
      p.wordDawgSize = 1_000_000;
      p.fonts = [...FONTS.earlyLatin];
    },
  },

  // ==========================================================================
  // Cyrillic script-based languages (mixing with Latin hurts them)
  // ==========================================================================
  {
    languages: ["rus"],
    apply: (p) => {
      p.fonts = [...FONTS.russian];
      p.mixLang = "rus";
      p.numberDawgFactor = 0.05;
      p.wordDawgSize = 1_000_000;
    },
  },
  {
    languages: ["aze_cyrl", "bel", "bul", "kaz", "mkd", "srp", "tgk", "ukr", "uzb_cyrl"],
    apply: (p, _env, lang) => {
      p.mixLang = lang;
      p.fonts = [...FONTS.russian];
    },
  },
  // Cyrillic language-id
  {
    languages: ["cyr_lid"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "cyr_lid");
      p.trainingDataArguments.push(INFREQUENT);
      p.generateWordBigrams = 0;
      p.wordDawgSize = 1_000_000;
      p.fonts = [...FONTS.russian];
    },
  },

  // ==========================================================================
  // South Asian scripts: many graphemes, so a smaller mean count
  // ==========================================================================
  {
    languages: ["asm", "ben"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.fonts = [...FONTS.bengali];
    },
  },
  {
    languages: ["bih", "hin", "mar", "nep", "san"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.fonts = [...FONTS.devanagari];
    },
  },
  {
    languages: ["bod"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.fonts = [...FONTS.tibetan];
    },
  },
  {
    languages: ["dzo"],
    apply: (p) => {
      p.wordDawgFactor = 0.01;
      p.fonts = [...FONTS.tibetan];
    },
  },
  {
    languages: ["guj"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.fonts = [...FONTS.gujarati];
    },
  },
  {
    languages: ["kan"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push("--no_newline_in_output");
      p.text2imageExtraArgs.push("--char_spacing=0.5");
      p.fonts = [...FONTS.kannada];
    },
  },
  {
    languages: ["mal"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push("--no_newline_in_output");
      p.text2imageExtraArgs.push("--char_spacing=0.5");
      p.fonts = [...FONTS.malayalam];
    },
  },
  {
    languages: ["ori"],
    apply: (p) => {
      p.wordDawgFactor = 0.01;
      p.fonts = [...FONTS.oriya];
    },
  },
  {
    languages: ["pan"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.01;
      p.fonts = [...FONTS.punjabi];
    },
  },
  {
    languages: ["sin"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.01;
      p.fonts = [...FONTS.sinhala];
    },
  },
  {
    languages: ["tam"],
    apply: (p) => {
      p.meanCount = 30;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push("--no_newline_in_output");
      p.text2imageExtraArgs.push("--char_spacing=0.5");
      p.fonts = [...FONTS.tamil];
    },
  },
  {
    languages: ["tel"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push("--no_newline_in_output");
      p.text2imageExtraArgs.push("--char_spacing=0.5");
      p.fonts = [...FONTS.telugu];
    },
  },

  // ==========================================================================
  // South-East Asian scripts
  // ==========================================================================
  {
    languages: ["jav_java"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push(INFREQUENT);
      p.fonts = [...FONTS.javanese];
    },
  },
  {
    languages: ["khm"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push(INFREQUENT);
      p.fonts = [...FONTS.khmer];
    },
  },
  {
    languages: ["lao"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push(INFREQUENT);
      p.fonts = [...FONTS.laothian];
    },
  },
  {
    languages: ["mya"],
    apply: (p) => {
      p.meanCount = 12;
      p.wordDawgFactor = 0.15;
      p.trainingDataArguments.push(INFREQUENT);
      p.fonts = [...FONTS.burmese];
    },
  },
  {
    languages: ["tha"],
    apply: (p) => {
      p.meanCount = 30;
      p.wordDawgFactor = 0.01;
      p.trainingDataArguments.push(INFREQUENT);
      p.filterArguments.push("--segmenter_lang=tha");
      p.trainingDataArguments.push(...NO_SPACE);
      p.ambigsFilterDenominator = "1000";
      p.leading = 48;
      p.fonts = [...FONTS.thai];
    },
  },

  // ==========================================================================
  // CJK
  // ==========================================================================
  {
    languages: ["chi_sim"],
    apply: (p) => {
      p.meanCount = 15;
      p.puncDawgFactor = 0.015;
      p.wordDawgFactor = 0.015;
      p.generateWordBigrams = 0;
      p.trainingDataArguments.push(INFREQUENT, ...NO_SPACE);
      p.filterArguments.push("--charset_filter=chi_sim", "--segmenter_lang=chi_sim");
      p.fonts = [...FONTS.chiSim];
    },
  },
  {
    languages: ["chi_tra"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.015;
      p.generateWordBigrams = 0;
      p.trainingDataArguments.push(INFREQUENT, ...NO_SPACE);
      p.filterArguments.push("--charset_filter=chi_tr", "--segmenter_lang=chi_tra");
      p.fonts = [...FONTS.chiTra];
    },
  },
  {
    languages: ["jpn"],
    apply: (p) => {
      p.meanCount = 15;
      p.wordDawgFactor = 0.015;
      p.generateWordBigrams = 0;
      p.trainingDataArguments.push(INFREQUENT, ...NO_SPACE);
      p.filterArguments.push("--charset_filter=jpn", "--segmenter_lang=jpn");
      p.fonts = [...FONTS.jpn];
    },
  },
  {
    languages: ["kor"],
    apply: (p) => {
      p.meanCount = 20;
      p.wordDawgFactor = 0.015;
      p.numberDawgFactor = 0.05;
      p.trainingDataArguments.push(INFREQUENT, "--desired_bigrams=");
      p.generateWordBigrams = 0;
      p.filterArguments.push("--charset_filter=kor", "--segmenter_lang=kor");
      p.fonts = [...FONTS.korean];
    },
  },

  // ==========================================================================
  // Middle-Eastern scripts
  // ==========================================================================
  {
    languages: ["ara"],
    apply: (p) => {
      p.fonts = [...FONTS.arabic];
    },
  },
  {
    languages: ["div"],
    apply: (p) => {
      p.fonts = [...FONTS.thaana];
    },
  },
  {
    languages: ["fas", "pus", "snd", "uig", "urd"],
    apply: (p) => {
      p.fonts = [...FONTS.persian];
    },
  },
  {
    languages: ["heb", "yid"],
    apply: (p) => {
      p.numberDawgFactor = 0.05;
      p.wordDawgFactor = 0.08;
      p.fonts = [...FONTS.hebrew];
    },
  },
  {
    languages: ["syr"],
    apply: (p) => {
      p.fonts = [...FONTS.syriac];
    },
  },

  // ==========================================================================
  // Other scripts
  // ==========================================================================
  {
    languages: ["amh", "tir"],
    apply: (p) => {
      p.fonts = [...FONTS.amharic];
    },
  },
  {
    languages: ["chr"],
    apply: (p) => {
      p.fonts = [...FONTS.northAmericanAboriginal, "Noto Sans Cherokee"];
    },
  },
  {
    languages: ["ell"],
    apply: (p) => {
      p.numberDawgFactor = 0.05;
      p.wordDawgFactor = 0.08;
      p.fonts = [...FONTS.greek];
    },
  },
  {
    languages: ["grc"],
    apply: (p) => {
      p.exposures = [...ALL_EXPOSURES];
      p.fonts = [...FONTS.ancientGreek];
    },
  },
  {
    languages: ["hye"],
    apply: (p) => {
      p.fonts = [...FONTS.armenian];
    },
  },
  {
    languages: ["iku"],
    apply: (p) => {
      p.fonts = [...FONTS.northAmericanAboriginal];
    },
  },
  {
    languages: ["kat"],
    apply: (p) => {
      p.fonts = [...FONTS.georgian];
    },
  },
  {
    languages: ["kat_old"],
    apply: (p, env) => {
      p.textCorpus = corpusFor(env, "kat");
      p.fonts = [...FONTS.oldGeorgian];
    },
  },
  {
    languages: ["kir"],
    apply: (p) => {
      p.fonts = [...FONTS.kyrgyz];
      p.trainingDataArguments.push("--infrequent_ratio=100");
    },
  },
  {
    languages: ["kmr"],
    apply: (p) => {
      p.fonts = [...FONTS.latin];
    },
  },
  {
    languages: ["kur_ara"],
    apply: (p) => {
      p.fonts = [...FONTS.kurdish];
    },
  },
];
