import assert from 'node:assert/strict';
import { test } from 'node:test';

import { randomDelay, randomInt } from './delay.ts';

test('randomInt stays within the bounds', () => {
  for (let i = 0; i < 100; i++) {
    const n = randomInt(3, 5);
    assert.ok(n >= 3 && n <= 5);
  }

  assert.equal(randomInt(7, 7), 7);
});

test('randomDelay without a pause', async () => {
  await randomDelay({ min: 0, max: 0 });
});

test('randomDelay rejects when the signal aborts', async () => {
  const controller = new AbortController();
  const reason = new Error('cancelled');
  const started = Date.now();

  const delay = randomDelay({ min: 60_000, max: 60_000 }, controller.signal);
  controller.abort(reason);

  await assert.rejects(delay, reason);
  assert.ok(Date.now() - started < 1000);
});

test('randomDelay rejects at once with an aborted signal', async () => {
  const reason = new Error('cancelled');
  await assert.rejects(randomDelay({ min: 0, max: 0 }, AbortSignal.abort(reason)), reason);
});
