/**
 * Pipeline modules export
 */

export { applyLanguageParameters } from "./parameters";
export { initializeFontconfig } from "./fontconfig";
export { generateImages } from "./images";
export { generateUnicharset } from "./unicharset";
export { extractFeatures } from "./features";
export { makeLstmData } from "./lstmdata";
export { cleanup } from "./cleanup";
export { stats } from "./stats";
