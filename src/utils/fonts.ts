/**
 * Font lists
 * Per-script font lists live in data/fonts.json; this module loads and validates them once
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const FontList = z.array(z.string()).nonempty();

export const FontTableSchema = z.object({
  fraktur: FontList,
  latin: FontList,
  neolatin: FontList,
  irishUncial: FontList,
  earlyLatin: FontList,
  vietnamese: FontList,
  devanagari: FontList,
  kannada: FontList,
  telugu: FontList,
  tamil: FontList,
  thai: FontList,
  korean: FontList,
  chiSim: FontList,
  chiTra: FontList,
  jpn: FontList,
  russian: FontList,
  greek: FontList,
  ancientGreek: FontList,
  arabic: FontList,
  hebrew: FontList,
  bengali: FontList,
  kyrgyz: FontList,
  persian: FontList,
  amharic: FontList,
  armenian: FontList,
  burmese: FontList,
  javanese: FontList,
  northAmericanAboriginal: FontList,
  georgian: FontList,
  oldGeorgian: FontList,
  khmer: FontList,
  kurdish: FontList,
  laothian: FontList,
  gujarati: FontList,
  malayalam: FontList,
  oriya: FontList,
  punjabi: FontList,
  sinhala: FontList,
  syriac: FontList,
  thaana: FontList,
  tibetan: FontList,
  vertical: FontList,
});

export type FontTable = z.infer<typeof FontTableSchema>;
export type FontFamily = keyof FontTable;

/**
 * Load and validate the font table
 */
export function loadFontTable(
  file: string = join(__dirname, "..", "data", "fonts.json"),
): FontTable {
  const content = readFileSync(file, "utf-8");
  return FontTableSchema.parse(JSON.parse(content));
}

export const FONTS: Readonly<FontTable> = Object.freeze(loadFontTable());

// Fonts rendered with --writing_mode=vertical-upright in Phase I
export const VERTICAL_FONTS: readonly string[] = FONTS.vertical;
