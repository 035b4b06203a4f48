export { Language } from './Language.ts';
export { getLanguageByISO, getLanguageByName, isLanguageSupported, languagesSupported } from './catalog.ts';
