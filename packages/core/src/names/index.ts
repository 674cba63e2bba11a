/**
 * Year-name rendering in Chinese, Korean, Japanese, Vietnamese and English.
 */

export { isLanguageCode, parseLanguageCode } from './languages.js';
export {
  ELEMENTS,
  englishAttributes,
  hanCharactersOf,
  lookup,
  nameYear,
  nameYearInAllLanguages,
} from './lookup.js';
