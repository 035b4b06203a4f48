import { deepFreeze } from './utils/freeze.ts';

import type { Language } from '@gtx/lang';
import type { Definitions, ExtraTranslations, Synonyms } from './decode/partOfSpeech.ts';

/** What the service corrected in the request. */
export interface Corrections {
  /** Whether the spelling of the text was corrected. */
  readonly textWasCorrected: boolean;
  /** The whole text with corrections applied. */
  readonly correctedText?: string;
  /** Words that were corrected. */
  readonly correctedWords: readonly string[];
  /** Whether the detected source language differs from the selected one. */
  readonly languageWasCorrected: boolean;
  /** The detected source language, when it differs from the selected one. */
  readonly correctedLanguage?: Language;
  /** Confidence of the service, from 0 to 1. */
  readonly confidence: number;
}

/** Result of a translation. */
export interface TranslationResult {
  readonly originalText: string;
  /** The language of the original text. Detected when the request asked for `Language.auto`. */
  readonly sourceLanguage: Language;
  readonly targetLanguage: Language;
  /** Translated text, sentence by sentence. */
  readonly fragmentedTranslation: readonly string[];
  /** `fragmentedTranslation` joined together. */
  readonly mergedTranslation: string;
  readonly originalTextTranscription?: string;
  readonly translatedTextTranscription?: string;
  readonly corrections: Corrections;
  /** Other translations of the word, or `null` when not requested or not available. */
  readonly extraTranslations: ExtraTranslations | null;
  readonly synonyms: Synonyms | null;
  readonly definitions: Definitions | null;
  /** Related terms. */
  readonly seeAlso: readonly string[] | null;
}

/** Corrections of a request where nothing was corrected. */
export function noCorrections(): Corrections {
  return {
    textWasCorrected: false,
    correctedWords: [],
    languageWasCorrected: false,
    confidence: 0,
  };
}

/** Result for text with nothing to translate. */
export function emptyResult(originalText: string, sourceLanguage: Language, targetLanguage: Language): TranslationResult {
  return deepFreeze({
    originalText,
    sourceLanguage,
    targetLanguage,
    fragmentedTranslation: [],
    mergedTranslation: '',
    corrections: noCorrections(),
    extraTranslations: null,
    synonyms: null,
    definitions: null,
    seeAlso: null,
  });
}
