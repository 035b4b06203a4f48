import assert from 'node:assert/strict';
import { test } from 'node:test';

import { tokenFunction } from './tokenFunction.ts';

test('tokenFunction of empty text', () => {
  assert.equal(tokenFunction([0, 0], ''), '0.0');
  assert.equal(tokenFunction([5, 0], ''), '474605.474600');
});

test('tokenFunction of a single character', () => {
  assert.equal(tokenFunction([0, 0], 'a'), '50242.50242');
  assert.equal(tokenFunction([0, 1], 'a'), '50243.50243');
});

test('tokenFunction with a realistic seed', () => {
  const seed = [406398, 2087938574] as const;

  assert.equal(tokenFunction(seed, 'hello'), '338590.203232');
  assert.equal(tokenFunction(seed, 'a'.repeat(500)), '274957.131443');
  assert.equal(tokenFunction([482211, 1730264401], 'Bom dia amigos'), '183553.366242');
});

test('tokenFunction of multi-byte text', () => {
  const seed = [406398, 2087938574] as const;

  assert.equal(tokenFunction(seed, '\u00DF'), '264656.146094');
  assert.equal(tokenFunction(seed, '\u20AC'), '632756.1021130');
  assert.equal(tokenFunction(seed, 'Привет, 世界 👋'), '975862.577672');
});

test('tokenFunction encodes a lone surrogate as three bytes', () => {
  assert.equal(tokenFunction([406398, 2087938574], 'abc\uD800'), '270058.142740');
});
