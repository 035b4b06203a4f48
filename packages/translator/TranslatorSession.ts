import { timeoutSignal } from './utils/abort.ts';
import { defaultLogger, errorJson } from './utils/log.ts';

import type { Logger } from 'pino';

/** Sent while no session cookie has been obtained. */
export const FALLBACK_COOKIE =
  'NID=132=YSV6D_1_0-kurlU0FU1_McKljflccBTuJEM4tGzFWw8nZm90f-P7bzqrFnETlu4LLDf5GMwAD2oiRicTUeP_fftLO7Xy2OH0Vz2MerRlalbfmfHOf1Lrn3EN-_C3Pk2Y; CONSENT=WP.26e489; 1P_JAR=2018-6-18-12; _ga=GA1.3.737450149.1529324066; _gid=GA1.3.606173287.1529324066';

interface TranslatorSessionOpts {
  /** Domain to shake hands with. Default: 'translate.google.com' */
  domain?: string;
  /** Time limit of the handshake, in milliseconds. Default: 10000 */
  timeout?: number;
  /** `User-Agent` of the handshake. */
  userAgent?: string;
  /** Custom fetch implementation. */
  fetch?: typeof fetch;
  logger?: Logger;
}

/** Session cookie of one translator instance. */
export class TranslatorSession {
  private readonly domain: string;
  private readonly timeout: number;
  private readonly userAgent: string | undefined;
  private readonly fetch: typeof fetch;
  private readonly logger: Logger;

  private cookie: string | undefined;

  constructor(opts: TranslatorSessionOpts = {}) {
    this.domain = opts.domain ?? 'translate.google.com';
    this.timeout = opts.timeout ?? 10_000;
    this.userAgent = opts.userAgent;
    this.fetch = opts.fetch ?? globalThis.fetch;
    this.logger = (opts.logger ?? defaultLogger).child({ ns: 'gtx.session' });
  }

  /**
   * Obtain a session cookie from the landing page, unless one is cached.
   * Failures are logged and leave the cookie unset.
   */
  async ensureCookie(opts?: { signal?: AbortSignal }): Promise<void> {
    if (this.cookie !== undefined) {
      return;
    }

    const headers: Record<string, string> = {
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Charset': 'ISO-8859-1,utf-8;q=0.7,*;q=0.7',
      'Accept-Language': 'en-US,en;q=0.5',
    };

    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    try {
      const response = await this.fetch(`https://${this.domain}/`, {
        headers,
        signal: timeoutSignal(this.timeout, opts?.signal),
      });

      this.update(response);
      await response.body?.cancel();
    } catch (e) {
      if (opts?.signal?.aborted) {
        throw e;
      }

      this.logger.warn({ error: errorJson(e) }, 'Session handshake failed, using the fallback cookie');
    }
  }

  /** Value of the `Cookie` request header. */
  cookieHeader(): string {
    return this.cookie ?? FALLBACK_COOKIE;
  }

  /** Replace the cached cookie with the one the response sets, if any. */
  update(response: Response): void {
    const cookie = parseSetCookie(response.headers.getSetCookie());

    if (cookie) {
      this.cookie = cookie;
      this.logger.debug('Session cookie updated');
    }
  }
}

/** Reduce `Set-Cookie` values to a `Cookie` header, eg `NID=1; CONSENT=2`. */
export function parseSetCookie(values: string[]): string | undefined {
  const pairs = values
    .map((value) => value.split(';')[0].trim())
    .filter((pair) => pair.includes('='));

  return pairs.length ? pairs.join('; ') : undefined;
}
