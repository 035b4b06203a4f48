import { z } from 'zod';

import { PartOfSpeechCollection } from './PartOfSpeechCollection.ts';

import type { Logger } from 'pino';

/** Describes how one kind of part-of-speech block is laid out. */
export interface PartOfSpeechVariant<Tag extends string, Entry> {
  name: string;
  tags: readonly Tag[];
  /** Position of the entry list inside each `[partOfSpeech, ...]` item. */
  dataIndex: number;
  entry: z.ZodType<Entry, z.ZodTypeDef, unknown>;
}

const extraTranslationTags = [
  'noun',
  'verb',
  'pronoun',
  'adverb',
  'auxiliaryverb',
  'adjective',
  'conjunction',
  'preposition',
  'interjection',
  'suffix',
  'prefix',
  'abbreviation',
  'phrase',
  'article',
  'particle',
] as const;

const dictionaryTags = [
  'noun',
  'verb',
  'pronoun',
  'adverb',
  'auxiliaryverb',
  'adjective',
  'conjunction',
  'preposition',
  'exclamation',
  'interjection',
  'abbreviation',
  'phrase',
  'prefix',
  'suffix',
  'article',
  'determiner',
  'contraction',
  'number',
] as const;

export type ExtraTranslationTag = typeof extraTranslationTags[number];
export type DictionaryTag = typeof dictionaryTags[number];

/** A translation of the word together with the words it translates back to. */
export interface ExtraTranslation {
  phrase: string;
  phraseTranslations: string[];
  /** Frequency score, when the service provides one. */
  score?: number;
}

/** A dictionary definition. */
export interface Definition {
  explanation: string;
  example?: string;
}

export type ExtraTranslations = PartOfSpeechCollection<ExtraTranslationTag, ExtraTranslation>;
export type Synonyms = PartOfSpeechCollection<DictionaryTag, string[]>;
export type Definitions = PartOfSpeechCollection<DictionaryTag, Definition>;

/** `["hola", ["hello", "hi"], null, 0.5]` */
export const extraTranslationsVariant: PartOfSpeechVariant<ExtraTranslationTag, ExtraTranslation> = {
  name: 'extraTranslations',
  tags: extraTranslationTags,
  dataIndex: 2,
  entry: z.tuple([z.string(), z.array(z.string())]).rest(z.unknown()).transform(
    ([phrase, phraseTranslations, , score]) => ({
      phrase,
      phraseTranslations,
      score: typeof score === 'number' ? score : undefined,
    }),
  ),
};

/** `[["hi", "hey"], "m_en_us1254307.001"]` */
export const synonymsVariant: PartOfSpeechVariant<DictionaryTag, string[]> = {
  name: 'synonyms',
  tags: dictionaryTags,
  dataIndex: 1,
  entry: z.tuple([z.array(z.string())]).rest(z.unknown()).transform(([words]) => words),
};

/** `["used as a greeting", "m_en_us1254307.001", "hello there, Katie!"]` */
export const definitionsVariant: PartOfSpeechVariant<DictionaryTag, Definition> = {
  name: 'definitions',
  tags: dictionaryTags,
  dataIndex: 1,
  entry: z.tuple([z.string()]).rest(z.unknown()).transform(([explanation, , example]) => ({
    explanation,
    example: typeof example === 'string' ? example : undefined,
  })),
};

const itemSchema = z.tuple([z.string()]).rest(z.unknown());

/**
 * Group a block of `[partOfSpeech, ...]` items by part of speech.
 * Returns `null` for an absent or empty block. Unrecognised parts of speech
 * and malformed items are skipped.
 */
export function parsePartOfSpeechBlock<Tag extends string, Entry>(
  block: unknown,
  variant: PartOfSpeechVariant<Tag, Entry>,
  logger: Logger,
): PartOfSpeechCollection<Tag, Entry> | null {
  if (!Array.isArray(block) || !block.length) {
    return null;
  }

  const collection = new PartOfSpeechCollection<Tag, Entry>(variant.tags);
  const entriesSchema = z.array(variant.entry);

  for (const item of block) {
    const parsed = itemSchema.safeParse(item);

    if (!parsed.success) {
      logger.warn({ variant: variant.name, issues: parsed.error.issues }, 'Skipped a malformed part of speech item');
      continue;
    }

    const [partOfSpeech] = parsed.data;
    const tag = collection.resolve(partOfSpeech);

    if (!tag) {
      // The service sometimes sends unnamed parts of speech.
      if (partOfSpeech.trim()) {
        logger.debug({ variant: variant.name, partOfSpeech }, 'Unrecognised part of speech');
      }
      continue;
    }

    const entries = entriesSchema.safeParse(parsed.data[variant.dataIndex]);

    if (!entries.success) {
      logger.warn({ variant: variant.name, partOfSpeech, issues: entries.error.issues }, 'Skipped malformed entries');
      continue;
    }

    collection.add(tag, entries.data);
  }

  return collection;
}
