import { isLanguageSupported, Language } from '@gtx/lang';

import { InvalidTargetLanguageError, LanguageNotSupportedError } from './errors.ts';

/**
 * Data types requested with `dt`: alternate translations, word-by-word breakdown,
 * examples, detected language, dictionary metadata, spelling correction,
 * word class, sentence segmentation, transliteration and the translation itself.
 */
export const DATA_TYPES = ['at', 'bd', 'ex', 'ld', 'md', 'qca', 'rw', 'rm', 'ss', 't'] as const;

/** Throw unless both languages are supported and the target is a concrete language. */
export function assertLanguagePair(source: Language, target: Language): void {
  if (!isLanguageSupported(source)) {
    throw new LanguageNotSupportedError(source);
  }
  if (!isLanguageSupported(target)) {
    throw new LanguageNotSupportedError(target);
  }
  if (target.equals(Language.auto)) {
    throw new InvalidTargetLanguageError();
  }
}

/** Replace every unpaired surrogate with U+FFFD so the text can be percent-encoded. */
export function toWellFormed(text: string): string {
  return text.replace(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g, '\uFFFD');
}

/** URL of the `translate_a/single` request. */
export function buildTranslateUrl(opts: {
  domain: string;
  text: string;
  source: Language;
  target: Language;
  token: string;
}): URL {
  const { domain, text, source, target, token } = opts;

  const params: [string, string][] = [
    ['sl', source.iso639],
    ['tl', target.iso639],
    ['hl', 'en'],
    ['q', text],
    ['tk', token],
    ['client', 't'],
    ...DATA_TYPES.map((dt): [string, string] => ['dt', dt]),
    ['ie', 'UTF-8'],
    ['oe', 'UTF-8'],
    ['otf', '1'],
    ['ssel', '0'],
    ['tsel', '0'],
    ['kc', '7'],
  ];

  const query = params.map(([key, value]) => `${key}=${encodeURIComponent(value)}`).join('&');

  return new URL(`https://${domain}/translate_a/single?${query}`);
}

/** Headers of the `translate_a/single` request. */
export function buildHeaders(opts: { domain: string; userAgent: string; cookie: string }): Record<string, string> {
  return {
    'User-Agent': opts.userAgent,
    'Accept-Language': 'en-US,en;q=0.5',
    'Host': opts.domain,
    'Cookie': opts.cookie,
  };
}
