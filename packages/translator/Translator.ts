import type { Language } from '@gtx/lang';
import type { TranslationResult } from './TranslationResult.ts';

/** Text to translate together with its language pair. */
export interface Translatable {
  originalText: string;
  fromLanguage: Language;
  toLanguage: Language;
}

/** A machine translation client. */
export interface Translator {
  /** Translate the text, including extra translations, synonyms, definitions and related terms. */
  translate(
    text: string,
    /** The language of the text, or `Language.auto` to detect it. */
    fromLanguage: Language,
    /** The text will be translated into this language. */
    toLanguage: Language,
    /** Custom options. */
    opts?: { signal?: AbortSignal },
  ): Promise<TranslationResult>;
  /** Translate the text, without the extra information. */
  translateLite(
    text: string,
    fromLanguage: Language,
    toLanguage: Language,
    opts?: { signal?: AbortSignal },
  ): Promise<TranslationResult>;
}
