export { createTranslator } from './createTranslator.ts';
export { GoogleTranslator } from './GoogleTranslator.ts';
export { TokenGenerator } from './token/TokenGenerator.ts';
export { tokenFunction } from './token/tokenFunction.ts';
export { TranslatorSession } from './TranslatorSession.ts';
export { PartOfSpeechCollection } from './decode/PartOfSpeechCollection.ts';
export { decodeResponse } from './decode/decodeResponse.ts';
export {
  InvalidTargetLanguageError,
  IPBannedError,
  LanguageNotSupportedError,
  TranslationDecodeError,
  TransportError,
} from './errors.ts';

export type {
  Definition,
  Definitions,
  DictionaryTag,
  ExtraTranslation,
  ExtraTranslations,
  ExtraTranslationTag,
  Synonyms,
} from './decode/partOfSpeech.ts';
export type { TokenFunction, TokenSeed } from './token/tokenFunction.ts';
export type { Corrections, TranslationResult } from './TranslationResult.ts';
export type { Translatable, Translator } from './Translator.ts';
