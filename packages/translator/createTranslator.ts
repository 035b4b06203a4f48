import { pino } from 'pino';

import { GoogleTranslator } from './GoogleTranslator.ts';

import type { GtxConf } from '@gtx/conf';
import type { Logger } from 'pino';

/** Build a translator from the configuration. */
export function createTranslator(
  conf: GtxConf,
  opts: { fetch?: typeof fetch; logger?: Logger } = {},
): GoogleTranslator {
  const { translation } = conf.caches;

  return new GoogleTranslator({
    domain: conf.domain,
    timeout: conf.timeout,
    delay: conf.delay,
    userAgent: conf.userAgent,
    cache: translation.enabled ? { max: translation.max, ttl: translation.ttl } : undefined,
    fetch: opts.fetch,
    logger: opts.logger ?? pino({ name: 'gtx', level: conf.logLevel }),
  });
}
