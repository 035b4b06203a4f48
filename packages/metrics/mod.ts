export { cachedTranslationsSizeGauge, tokenSeedRefreshesCounter, translateRequestsCounter } from './metrics.ts';
