import { getLanguageByISO, Language } from '@gtx/lang';
import { z } from 'zod';

import { TranslationDecodeError } from '../errors.ts';
import { deepFreeze } from '../utils/freeze.ts';
import { defaultLogger } from '../utils/log.ts';
import {
  definitionsVariant,
  extraTranslationsVariant,
  parsePartOfSpeechBlock,
  synonymsVariant,
} from './partOfSpeech.ts';

import type { Logger } from 'pino';
import type { Corrections, TranslationResult } from '../TranslationResult.ts';

/** Position of each known block in the top-level response array. */
export const slots = {
  main: 0,
  extraTranslations: 1,
  selectedLanguage: 2,
  confidence: 6,
  spelling: 7,
  detectedLanguage: 8,
  synonyms: 11,
  definitions: 12,
  seeAlso: 14,
} as const;

type Slot = keyof typeof slots;

const rowSchema = z.array(z.unknown());

const schemas = {
  main: z.array(rowSchema),
  selectedLanguage: z.string(),
  confidence: z.number(),
  /** `["<b><i>hello</i></b> world", "hello world", ...]` */
  spelling: z.tuple([z.string(), z.string()]).rest(z.unknown()),
  /** `[["de"], null, [0.98], ["de"]]` */
  detectedLanguage: z.tuple([z.tuple([z.string()]).rest(z.unknown())]).rest(z.unknown())
    .transform(([[iso]]) => iso),
  seeAlso: z.tuple([z.array(z.string())]).rest(z.unknown()).transform(([terms]) => terms),
};

/**
 * Validated value of a slot. Absent, `null` and empty values yield `undefined`,
 * and so does a malformed value, which is logged.
 */
function readSlot<T>(
  raw: readonly unknown[],
  slot: Slot,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: Logger,
): T | undefined {
  const value = raw[slots[slot]];

  if (value === undefined || value === null || (Array.isArray(value) && !value.length)) {
    return undefined;
  }

  const result = schema.safeParse(value);

  if (!result.success) {
    logger.warn({ slot, index: slots[slot], issues: result.error.issues }, 'Ignored a malformed response block');
    return undefined;
  }

  return result.data;
}

/**
 * Transcriptions carried by the trailing tuple of the main block.
 * A 3-element tuple only carries the translated transcription in its last element.
 * Otherwise a non-null second-to-last element is the translated transcription and
 * the last one the original transcription; failing that, the last element is the
 * translated transcription.
 */
export function extractTranscription(tuple: readonly unknown[]): { translated?: string; original?: string } {
  const count = tuple.length;
  const text = (value: unknown) => typeof value === 'string' ? value : undefined;

  if (count === 3) {
    return { translated: text(tuple[2]) };
  }

  const secondToLast = tuple[count - 2];

  if (secondToLast !== null && secondToLast !== undefined) {
    return { translated: text(secondToLast), original: text(tuple[count - 1]) };
  }

  return { translated: text(tuple[count - 1]) };
}

/**
 * Split the main block into translated fragments and transcriptions.
 * Fragment rows start with the translated string; the transcription row, when
 * present, is the last one and starts with `null`.
 */
export function decodeMainBlock(rows: readonly (readonly unknown[])[]): {
  fragments: string[];
  translatedTranscription?: string;
  originalTranscription?: string;
} {
  const last = rows.at(-1);
  const hasTranscription = rows.length > 1 && last !== undefined && typeof last[0] !== 'string';

  const fragments = (hasTranscription ? rows.slice(0, -1) : rows)
    .map(([fragment]) => fragment)
    .filter((fragment): fragment is string => typeof fragment === 'string');

  if (!hasTranscription || !last) {
    return { fragments };
  }

  const { translated, original } = extractTranscription(last);
  return { fragments, translatedTranscription: translated, originalTranscription: original };
}

function decodeCorrections(raw: readonly unknown[], logger: Logger): Corrections {
  const spelling = readSlot(raw, 'spelling', schemas.spelling, logger);
  const selected = readSlot(raw, 'selectedLanguage', schemas.selectedLanguage, logger);
  const detected = readSlot(raw, 'detectedLanguage', schemas.detectedLanguage, logger);
  const languageWasCorrected = selected !== undefined && detected !== undefined && selected !== detected;

  return {
    textWasCorrected: !!spelling,
    correctedText: spelling?.[1],
    correctedWords: spelling ? [...spelling[0].matchAll(/<b><i>(.*?)<\/i><\/b>/g)].map((match) => match[1]) : [],
    languageWasCorrected,
    correctedLanguage: languageWasCorrected && detected ? getLanguageByISO(detected) : undefined,
    confidence: readSlot(raw, 'confidence', schemas.confidence, logger) ?? 0,
  };
}

/**
 * Decode the positional JSON array returned by `translate_a/single`.
 * Every block is optional: a missing or malformed block yields its empty default.
 * The result is frozen.
 * Extra translations, synonyms, definitions and see-also terms are only decoded
 * when `includeExtras` is set.
 */
export function decodeResponse(
  raw: unknown,
  originalText: string,
  sourceLanguage: Language,
  targetLanguage: Language,
  includeExtras: boolean,
  logger: Logger = defaultLogger,
): TranslationResult {
  if (!Array.isArray(raw)) {
    throw new TranslationDecodeError('Expected the translation response to be a JSON array');
  }

  const log = logger.child({ ns: 'gtx.decode' });
  const main = decodeMainBlock(readSlot(raw, 'main', schemas.main, log) ?? []);
  const detected = readSlot(raw, 'detectedLanguage', schemas.detectedLanguage, log);

  const detectedLanguage = detected ? getLanguageByISO(detected) : undefined;
  const resolvedSource = sourceLanguage.equals(Language.auto) ? detectedLanguage ?? Language.auto : sourceLanguage;

  return deepFreeze({
    originalText,
    sourceLanguage: resolvedSource,
    targetLanguage,
    fragmentedTranslation: main.fragments,
    mergedTranslation: main.fragments.join(''),
    originalTextTranscription: main.originalTranscription,
    translatedTextTranscription: main.translatedTranscription,
    corrections: decodeCorrections(raw, log),
    extraTranslations: includeExtras
      ? parsePartOfSpeechBlock(raw[slots.extraTranslations], extraTranslationsVariant, log)
      : null,
    synonyms: includeExtras ? parsePartOfSpeechBlock(raw[slots.synonyms], synonymsVariant, log) : null,
    definitions: includeExtras ? parsePartOfSpeechBlock(raw[slots.definitions], definitionsVariant, log) : null,
    seeAlso: includeExtras && raw.length > slots.seeAlso ? readSlot(raw, 'seeAlso', schemas.seeAlso, log) ?? [] : null,
  });
}
