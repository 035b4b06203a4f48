import assert from 'node:assert/strict';
import { test } from 'node:test';

import { pino } from 'pino';

import { parseSeed, TokenGenerator } from './TokenGenerator.ts';

import type { TokenFunction } from './tokenFunction.ts';

const logger = pino({ level: 'silent' });

/** Renders the seed into the token so tests can see which one was used. */
const echoSeed: TokenFunction = (seed, text) => `${seed[0]}.${seed[1]}:${text}`;

const landingPage = `<html><script>window.WIZ_global_data = {tkk:'482211.1730264401',lang:'en'};</script></html>`;

test('TokenGenerator fetches the seed on first use', async () => {
  const urls: string[] = [];

  const generator = new TokenGenerator({
    logger,
    tokenFunction: echoSeed,
    fetch: (input) => {
      urls.push(String(input));
      return Promise.resolve(new Response(landingPage));
    },
  });

  assert.equal(await generator.generate('hello'), '482211.1730264401:hello');
  assert.equal(generator.isSeedObsolete, false);
  assert.deepEqual(urls, ['https://translate.google.com/']);
});

const HOUR = 60 * 60 * 1000;

test('TokenGenerator reuses the seed during its hour', async () => {
  let now = 470_000 * HOUR;
  let calls = 0;

  const generator = new TokenGenerator({
    logger,
    domain: 'translate.google.de',
    tokenFunction: echoSeed,
    now: () => now,
    fetch: () => {
      calls++;
      return Promise.resolve(new Response(`tkk:'${469_999 + calls}.${calls * 10}'`));
    },
  });

  assert.equal(await generator.generate('a'), '470000.10:a');
  now += HOUR - 1;
  assert.equal(await generator.generate('b'), '470000.10:b');
  now += 1;
  assert.equal(await generator.generate('c'), '470001.20:c');
  assert.equal(calls, 2);
});

test('TokenGenerator refreshes a seed from a past hour', async () => {
  let now = 470_000 * HOUR;
  let calls = 0;

  const generator = new TokenGenerator({
    logger,
    tokenFunction: echoSeed,
    now: () => now,
    fetch: () => {
      calls++;
      return Promise.resolve(new Response(`tkk:'1.2'`));
    },
  });

  assert.equal(await generator.generate('a'), '1.2:a');
  assert.equal(generator.isSeedStale, true);

  now += 30 * 60 * 1000;

  assert.equal(await generator.generate('b'), '1.2:b');
  assert.equal(calls, 2);
  assert.equal(generator.isSeedObsolete, false);
});

test('TokenGenerator falls back to the old seed when the refresh fails', async () => {
  let fail = true;

  const generator = new TokenGenerator({
    logger,
    seed: [7, 8],
    tokenFunction: echoSeed,
    fetch: () => {
      if (fail) {
        return Promise.reject(new TypeError('fetch failed'));
      }
      return Promise.resolve(new Response(landingPage));
    },
  });

  assert.equal(await generator.generate('hi'), '7.8:hi');
  assert.equal(generator.isSeedObsolete, true);

  fail = false;

  assert.equal(await generator.generate('hi'), '482211.1730264401:hi');
  assert.equal(generator.isSeedObsolete, false);
});

test('TokenGenerator treats an error status as a failed refresh', async () => {
  const generator = new TokenGenerator({
    logger,
    seed: [7, 8],
    tokenFunction: echoSeed,
    fetch: () => Promise.resolve(new Response('Too many requests', { status: 429 })),
  });

  assert.equal(await generator.generate('hi'), '7.8:hi');
  assert.equal(generator.isSeedObsolete, true);
});

test('TokenGenerator rethrows when the caller aborts', async () => {
  const controller = new AbortController();
  const reason = new Error('cancelled');

  const generator = new TokenGenerator({
    logger,
    fetch: () => {
      controller.abort(reason);
      return Promise.reject(reason);
    },
  });

  await assert.rejects(generator.generate('hi', { signal: controller.signal }), reason);
  assert.equal(generator.isSeedObsolete, false);
});

test('parseSeed', () => {
  assert.deepEqual(parseSeed(landingPage), [482211, 1730264401]);
  assert.deepEqual(parseSeed(`TKK='445678.-123'`), [445678, -123]);
  assert.throws(() => parseSeed('<html></html>'), { message: 'Token seed not found in the landing page' });
});
