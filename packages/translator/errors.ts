import type { Language } from '@gtx/lang';

/** The language is not in the supported catalog. */
export class LanguageNotSupportedError extends Error {
  override name = 'LanguageNotSupportedError';

  constructor(readonly language: Language) {
    super(`Language ${language} is not supported`);
  }
}

/** The target language was `Language.auto`. */
export class InvalidTargetLanguageError extends Error {
  override name = 'InvalidTargetLanguageError';

  constructor() {
    super('The target language cannot be auto');
  }
}

/** The service answered with an HTTP error status, which is how it bans an IP address. */
export class IPBannedError extends Error {
  override name = 'IPBannedError';

  constructor(readonly status: number, readonly statusText: string) {
    super(`The translation service rejected the request: ${statusText} (${status}). The IP address may be banned.`);
  }
}

/** The request could not be completed, eg a network failure or a timeout. */
export class TransportError extends Error {
  override name = 'TransportError';

  constructor(cause: unknown) {
    super(`Translation request failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/** The response body could not be read as a translation payload at all. */
export class TranslationDecodeError extends Error {
  override name = 'TranslationDecodeError';
}
