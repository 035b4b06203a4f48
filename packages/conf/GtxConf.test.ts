import assert from 'node:assert/strict';
import { test } from 'node:test';

import { GtxConf } from './GtxConf.ts';

test('GtxConf defaults', async (t) => {
  const conf = new GtxConf(new Map<string, string>());

  await t.test('domain', () => {
    assert.equal(conf.domain, 'translate.google.com');
  });

  await t.test('timeout', () => {
    assert.equal(conf.timeout, 10_000);
  });

  await t.test('delay', () => {
    assert.deepEqual(conf.delay, { min: 200, max: 500 });
  });

  await t.test('logLevel', () => {
    assert.equal(conf.logLevel, 'info');
  });

  await t.test('translation cache is disabled', () => {
    assert.deepEqual(conf.caches.translation, { enabled: false, max: 1000, ttl: 21_600_000 });
  });
});

test('GtxConf from env', async (t) => {
  const env = new Map<string, string>([
    ['GTX_DOMAIN', 'translate.google.de'],
    ['GTX_TIMEOUT', '2500'],
    ['GTX_DELAY_MIN', '0'],
    ['GTX_DELAY_MAX', '0'],
    ['LOG_LEVEL', 'silent'],
    ['GTX_CACHE_TRANSLATION_ENABLED', 'true'],
    ['GTX_CACHE_TRANSLATION_MAX', '10'],
  ]);

  const conf = new GtxConf(env);

  await t.test('domain', () => {
    assert.equal(conf.domain, 'translate.google.de');
  });

  await t.test('timeout', () => {
    assert.equal(conf.timeout, 2500);
  });

  await t.test('delay', () => {
    assert.deepEqual(conf.delay, { min: 0, max: 0 });
  });

  await t.test('logLevel', () => {
    assert.equal(conf.logLevel, 'silent');
  });

  await t.test('translation cache', () => {
    assert.deepEqual(conf.caches.translation, { enabled: true, max: 10, ttl: 21_600_000 });
  });
});

test('GtxConf with invalid log level', () => {
  const conf = new GtxConf(new Map([['LOG_LEVEL', 'loud']]));
  assert.throws(() => conf.logLevel);
});

test('GtxConf with inverted delay bounds', () => {
  const env = new Map<string, string>([
    ['GTX_DELAY_MIN', '900'],
    ['GTX_DELAY_MAX', '100'],
  ]);

  assert.throws(
    () => new GtxConf(env),
    { message: 'GTX_DELAY_MIN (900) cannot be greater than GTX_DELAY_MAX (100).' },
  );
});
