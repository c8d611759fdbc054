/**
 * Script families
 * Direction and normalization mode depend only on the script of a language
 */

import type { NormMode } from "../types";

// Right-to-left scripts
export const RTL_LANGUAGES: ReadonlySet<string> = new Set([
  "ara", "div", "fas", "pus", "snd", "syr", "uig", "urd", "kur_ara", "heb", "yid",
]);

// Large-alphabet or segmenting scripts that train on pure unicode
export const COMPLEX_SCRIPT_LANGUAGES: ReadonlySet<string> = new Set([
  "asm", "ben", "bih", "hin", "mar", "nep", "guj", "kan", "mal", "tam", "tel", "pan",
  "dzo", "sin", "san", "bod", "ori", "khm", "mya", "tha", "lao", "jav_java",
]);

export interface ScriptTraits {
  normMode: NormMode;
  langIsRtl: boolean;
}

export function getScriptTraits(lang: string): ScriptTraits {
  if (RTL_LANGUAGES.has(lang)) {
    return { normMode: 2, langIsRtl: true };
  }
  if (COMPLEX_SCRIPT_LANGUAGES.has(lang)) {
    return { normMode: 2, langIsRtl: false };
  }
  return { normMode: 1, langIsRtl: false };
}
