import assert from 'node:assert/strict';
import { test } from 'node:test';

import { Language } from './Language.ts';

test('Language equality is by ISO code', () => {
  assert.equal(new Language('English', 'en').equals(new Language('Inglés', 'EN')), true);
  assert.equal(new Language('English', 'en').equals(new Language('English', 'de')), false);
  assert.equal(new Language('English', 'en').equals(undefined), false);
});

test('Language.auto', () => {
  assert.equal(Language.auto.iso639, 'auto');
  assert.equal(Language.auto.equals(new Language('Detect language', 'auto')), true);
});

test('Language toString', () => {
  assert.equal(String(new Language('German', 'de')), 'German (de)');
});
