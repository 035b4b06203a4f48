import { Counter, Gauge } from 'prom-client';

const prefix = 'gtx';

export const translateRequestsCounter: Counter<'status'> = new Counter({
  name: `${prefix}_translate_requests_total`,
  help: 'Total number of requests sent to the translation endpoint',
  labelNames: ['status'],
});

export const tokenSeedRefreshesCounter: Counter<'ok'> = new Counter({
  name: `${prefix}_token_seed_refreshes_total`,
  help: 'Total number of attempts to refresh the token seed',
  labelNames: ['ok'],
});

export const cachedTranslationsSizeGauge: Gauge = new Gauge({
  name: `${prefix}_cached_translations_size`,
  help: 'Number of translation results in cache',
});
