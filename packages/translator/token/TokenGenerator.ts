import { tokenSeedRefreshesCounter } from '@gtx/metrics';

import { timeoutSignal } from '../utils/abort.ts';
import { defaultLogger, errorJson } from '../utils/log.ts';
import { tokenFunction as defaultTokenFunction } from './tokenFunction.ts';

import type { Logger } from 'pino';
import type { TokenFunction, TokenSeed } from './tokenFunction.ts';

interface TokenGeneratorOpts {
  /** Domain whose landing page carries the seed. Default: 'translate.google.com' */
  domain?: string;
  /** Time limit of the seed request, in milliseconds. Default: 10000 */
  timeout?: number;
  /** `User-Agent` of the seed request. */
  userAgent?: string;
  /** Seed used until the first successful refresh. */
  seed?: TokenSeed;
  /** Custom token algorithm. */
  tokenFunction?: TokenFunction;
  /** Custom fetch implementation. */
  fetch?: typeof fetch;
  /** Custom clock. */
  now?: () => number;
  logger?: Logger;
}

const HOUR = 60 * 60 * 1000;

/** Computes the `tk` parameter, keeping the signing seed fresh. */
export class TokenGenerator {
  private readonly domain: string;
  private readonly timeout: number;
  private readonly userAgent: string | undefined;
  private readonly tokenFunction: TokenFunction;
  private readonly fetch: typeof fetch;
  private readonly now: () => number;
  private readonly logger: Logger;

  private seed: TokenSeed;
  private _isSeedObsolete = false;

  constructor(opts: TokenGeneratorOpts = {}) {
    this.domain = opts.domain ?? 'translate.google.com';
    this.timeout = opts.timeout ?? 10_000;
    this.userAgent = opts.userAgent;
    this.seed = opts.seed ?? [406398, 2087938574];
    this.tokenFunction = opts.tokenFunction ?? defaultTokenFunction;
    this.fetch = opts.fetch ?? globalThis.fetch;
    this.now = opts.now ?? Date.now;
    this.logger = (opts.logger ?? defaultLogger).child({ ns: 'gtx.token' });
  }

  /** Whether the last seed refresh failed, so tokens are being signed with an expired seed. */
  get isSeedObsolete(): boolean {
    return this._isSeedObsolete;
  }

  /** Whether the first integer of the seed is not the current hour since the Unix epoch. */
  get isSeedStale(): boolean {
    return this.seed[0] !== Math.floor(this.now() / HOUR);
  }

  /**
   * Token for the text. Refreshes the seed first when it is stale.
   * A failed refresh does not throw: the old seed is used and `isSeedObsolete` is raised.
   */
  async generate(text: string, opts?: { signal?: AbortSignal }): Promise<string> {
    if (this.isSeedStale) {
      await this.refreshSeed(opts?.signal);
    }

    return this.tokenFunction(this.seed, text);
  }

  private async refreshSeed(signal?: AbortSignal): Promise<void> {
    try {
      this.seed = await this.fetchSeed(signal);
      this._isSeedObsolete = false;
      tokenSeedRefreshesCounter.inc({ ok: 'true' });
      this.logger.debug({ seed: this.seed.join('.') }, 'Token seed refreshed');
    } catch (e) {
      if (signal?.aborted) {
        throw e;
      }

      this._isSeedObsolete = true;
      tokenSeedRefreshesCounter.inc({ ok: 'false' });
      this.logger.warn({ error: errorJson(e) }, 'Could not refresh the token seed');
    }
  }

  private async fetchSeed(signal?: AbortSignal): Promise<TokenSeed> {
    const headers: Record<string, string> = {
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
    };

    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    const response = await this.fetch(`https://${this.domain}/`, {
      headers,
      signal: timeoutSignal(this.timeout, signal),
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new Error(`Unexpected response while fetching the token seed: ${response.statusText} (${response.status})`);
    }

    return parseSeed(await response.text());
  }
}

/** Extract the seed from the landing page, eg `tkk:'482211.1730264401'`. */
export function parseSeed(html: string): TokenSeed {
  const match = /tkk[:=]\s*'(\d+)\.(-?\d+)'/i.exec(html);

  if (!match) {
    throw new Error('Token seed not found in the landing page');
  }

  return [Number(match[1]), Number(match[2])];
}
