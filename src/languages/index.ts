/**
 * Language parameter exports
 */

export { resolveLanguage, isValidLanguageCode, VALID_LANGUAGE_CODES } from "./resolve";
export { LANGUAGE_RULES, corpusFor } from "./rules";
export { getScriptTraits, RTL_LANGUAGES, COMPLEX_SCRIPT_LANGUAGES } from "./scripts";
export type { ScriptTraits } from "./scripts";
