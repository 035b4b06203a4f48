import { cachedTranslationsSizeGauge, translateRequestsCounter } from '@gtx/metrics';
import { LRUCache } from 'lru-cache';

import { decodeResponse } from './decode/decodeResponse.ts';
import { IPBannedError, TransportError, TranslationDecodeError } from './errors.ts';
import { assertLanguagePair, buildHeaders, buildTranslateUrl, toWellFormed } from './request.ts';
import { TokenGenerator } from './token/TokenGenerator.ts';
import { emptyResult } from './TranslationResult.ts';
import { TranslatorSession } from './TranslatorSession.ts';
import { timeoutSignal } from './utils/abort.ts';
import { randomDelay } from './utils/delay.ts';
import { defaultLogger, errorJson } from './utils/log.ts';

import type { Language } from '@gtx/lang';
import type { Logger } from 'pino';
import type { TokenFunction } from './token/tokenFunction.ts';
import type { TranslationResult } from './TranslationResult.ts';
import type { Translatable, Translator } from './Translator.ts';

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:61.0) Gecko/20100101 Firefox/61.0';

interface GoogleTranslatorOpts {
  /** Domain used to execute requests. Default: 'translate.google.com' */
  domain?: string;
  /** Time limit of every outgoing request, in milliseconds. Default: 10000 */
  timeout?: number;
  /** Bounds of the random pause before each translation request, in milliseconds. Default: 200-500 */
  delay?: { min: number; max: number };
  /** `User-Agent` sent with every request. */
  userAgent?: string;
  /** Custom token algorithm. */
  tokenFunction?: TokenFunction;
  /** Keep results in an LRU cache. Disabled by default. */
  cache?: { max: number; ttl: number };
  /** Custom fetch implementation, eg one going through a proxy. */
  fetch?: typeof fetch;
  logger?: Logger;
}

/** Client of the free `translate_a/single` endpoint. */
export class GoogleTranslator implements Translator {
  readonly domain: string;

  private readonly timeout: number;
  private readonly delay: { min: number; max: number };
  private readonly userAgent: string;
  private readonly fetch: typeof fetch;
  private readonly logger: Logger;
  private readonly tokens: TokenGenerator;
  private readonly session: TranslatorSession;
  private readonly cache: LRUCache<string, TranslationResult> | undefined;

  constructor(opts: GoogleTranslatorOpts = {}) {
    this.domain = opts.domain ?? 'translate.google.com';
    this.timeout = opts.timeout ?? 10_000;
    this.delay = opts.delay ?? { min: 200, max: 500 };
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
    this.fetch = opts.fetch ?? globalThis.fetch;
    this.logger = opts.logger ?? defaultLogger;

    const shared = {
      domain: this.domain,
      timeout: this.timeout,
      userAgent: this.userAgent,
      fetch: this.fetch,
      logger: this.logger,
    };

    this.tokens = new TokenGenerator({ ...shared, tokenFunction: opts.tokenFunction });
    this.session = new TranslatorSession(shared);

    if (opts.cache) {
      this.cache = new LRUCache<string, TranslationResult>({ max: opts.cache.max, ttl: opts.cache.ttl });
    }
  }

  /**
   * Translate the text with full information: transcriptions, corrections,
   * extra translations, synonyms, definitions and related terms.
   *
   * @throws {LanguageNotSupportedError} A language is not in the catalog.
   * @throws {InvalidTargetLanguageError} The target language is `Language.auto`.
   * @throws {IPBannedError} The service rejected the request, usually because the IP address is banned.
   * @throws {TransportError} The request failed.
   */
  translate(
    text: string,
    fromLanguage: Language,
    toLanguage: Language,
    opts?: { signal?: AbortSignal },
  ): Promise<TranslationResult> {
    return this.getTranslationResult(text, fromLanguage, toLanguage, true, opts);
  }

  /** Like `translate`, without extra translations, synonyms, definitions and related terms. */
  translateLite(
    text: string,
    fromLanguage: Language,
    toLanguage: Language,
    opts?: { signal?: AbortSignal },
  ): Promise<TranslationResult> {
    return this.getTranslationResult(text, fromLanguage, toLanguage, false, opts);
  }

  translateItem(item: Translatable, opts?: { signal?: AbortSignal }): Promise<TranslationResult> {
    return this.translate(item.originalText, item.fromLanguage, item.toLanguage, opts);
  }

  translateItemLite(item: Translatable, opts?: { signal?: AbortSignal }): Promise<TranslationResult> {
    return this.translateLite(item.originalText, item.fromLanguage, item.toLanguage, opts);
  }

  private async getTranslationResult(
    text: string,
    fromLanguage: Language,
    toLanguage: Language,
    includeExtras: boolean,
    opts?: { signal?: AbortSignal },
  ): Promise<TranslationResult> {
    assertLanguagePair(fromLanguage, toLanguage);

    if (!text.trim()) {
      return emptyResult(text, fromLanguage, toLanguage);
    }

    const cacheKey = `${includeExtras ? 'full' : 'lite'}:${fromLanguage.iso639}:${toLanguage.iso639}:${text}`;
    const cached = this.cache?.get(cacheKey);

    if (cached) {
      return cached;
    }

    // The session cookie keeps the service from blocking us right away.
    await this.session.ensureCookie(opts);

    const response = await this.send(toWellFormed(text), fromLanguage, toLanguage, opts);
    this.session.update(response);

    const body = await response.text();
    let json: unknown;

    try {
      json = JSON.parse(body);
    } catch (e) {
      throw new TranslationDecodeError('Translation response is not valid JSON', { cause: e });
    }

    const result = decodeResponse(json, text, fromLanguage, toLanguage, includeExtras, this.logger);

    if (this.cache) {
      this.cache.set(cacheKey, result);
      cachedTranslationsSizeGauge.set(this.cache.size);
    }

    return result;
  }

  /**
   * Send the translation request. When it fails while the token was signed with an
   * obsolete seed, the whole request is made once more with a fresh token.
   */
  private async send(
    text: string,
    fromLanguage: Language,
    toLanguage: Language,
    opts?: { signal?: AbortSignal },
  ): Promise<Response> {
    const logger = this.logger.child({ ns: 'gtx.translate' });

    for (let attempt = 0;; attempt++) {
      const token = await this.tokens.generate(text, opts);
      const url = buildTranslateUrl({ domain: this.domain, text, source: fromLanguage, target: toLanguage, token });
      const canRetry = attempt === 0;

      await randomDelay(this.delay, opts?.signal);

      let response: Response;

      try {
        response = await this.fetch(url, {
          headers: buildHeaders({ domain: this.domain, userAgent: this.userAgent, cookie: this.session.cookieHeader() }),
          signal: timeoutSignal(this.timeout, opts?.signal),
        });
      } catch (e) {
        if (opts?.signal?.aborted) {
          throw e;
        }

        translateRequestsCounter.inc({ status: 'error' });

        if (canRetry && this.tokens.isSeedObsolete) {
          logger.warn({ error: errorJson(e) }, 'Request failed with an obsolete token seed, retrying');
          continue;
        }

        throw new TransportError(e);
      }

      translateRequestsCounter.inc({ status: String(response.status) });

      if (response.ok) {
        return response;
      }

      await response.body?.cancel();

      if (canRetry && this.tokens.isSeedObsolete) {
        logger.warn({ status: response.status }, 'Request rejected with an obsolete token seed, retrying');
        continue;
      }

      logger.error({ status: response.status }, 'Request rejected by the translation service');
      throw new IPBannedError(response.status, response.statusText);
    }
  }
}
