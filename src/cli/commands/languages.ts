/**
 * Languages command - List every valid language code
 */

import chalk from "chalk";
import { getScriptTraits, VALID_LANGUAGE_CODES } from "../../languages";

/**
 * One line per language: code, normalization mode and direction
 */
export function formatLanguages(codes: readonly string[] = VALID_LANGUAGE_CODES): string[] {
  return [...new Set(codes)].sort().map((code) => {
    const { normMode, langIsRtl } = getScriptTraits(code);
    return `${code.padEnd(12)} norm_mode=${normMode}${langIsRtl ? " rtl" : ""}`;
  });
}

export function languagesCommand(): void {
  const lines = formatLanguages();
  console.log(chalk.bold(`${lines.length} language codes:`));
  for (const line of lines) {
    console.log(`  ${line}`);
  }
}
