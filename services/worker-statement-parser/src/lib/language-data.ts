/**
 * Tesseract language data from the @tesseract.js-data/<lang> npm packages,
 * so workers never fetch traineddata over the network.
 */

import path from 'path';

export const LANGUAGE_DATA_VARIANT = '4.0.0_best_int';

export type ModuleResolver = (request: string) => string;

/**
 * Directory holding `<language>.traineddata.gz` for a single language code
 */
export function resolveLanguageDataPath(
  language: string,
  resolve: ModuleResolver = require.resolve
): string {
  if (!/^[a-z_]+$/.test(language)) {
    throw new Error(`Unsupported OCR language "${language}": expected one installed language code`);
  }

  const manifest = resolve(`@tesseract.js-data/${language}/package.json`);
  return path.join(path.dirname(manifest), LANGUAGE_DATA_VARIANT);
}
