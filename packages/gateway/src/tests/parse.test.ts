import test from 'node:test';
import assert from 'node:assert/strict';

import {
  ResponseFormatError,
  parseAuth,
  parseColors,
  parseLanguages,
  parseRecords,
  parseTranslations,
} from '../index.js';

test('parseTranslations builds key -> lang -> value', () => {
  const entries = parseTranslations('{"items":[{"key":"a","values":{"en":"X","fr":"Y"}}]}');
  assert.deepEqual(entries, { a: { en: 'X', fr: 'Y' } });
});

test('parseTranslations accepts the legacy "keys" field and skips malformed items', () => {
  const body = JSON.stringify({
    keys: [
      { key: 'title', values: { en: 'Hi', de: 3 } },
      { key: 5, values: { en: 'bad key' } },
      { key: 'no_values' },
      'junk',
    ],
  });
  assert.deepEqual(parseTranslations(body), { title: { en: 'Hi' } });
});

test('malformed bodies raise ResponseFormatError', () => {
  assert.throws(() => parseTranslations('<html>'), ResponseFormatError);
  assert.throws(() => parseTranslations('[]'), ResponseFormatError);
  assert.throws(() => parseTranslations('{"items":{}}'), ResponseFormatError);
  assert.throws(() => parseColors('{}'), ResponseFormatError);
});

test('parseColors stores hex under the color slot', () => {
  assert.deepEqual(parseColors('{"items":[{"key":"primary","value":"#FF0000"},{"key":"x"}]}'), {
    primary: { color: '#FF0000' },
  });
});

test('parseRecords coerces typed values and epoch timestamps', () => {
  const body = JSON.stringify({
    items: [
      {
        id: 'r1',
        createdAt: 0,
        updatedAt: '2024-03-01T10:00:00.000Z',
        data: {
          name: { type: 'localized', values: { en: 'Tea' } },
          count: 3,
          ratio: 0.5,
          enabled: false,
          label: 'plain',
          missing: null,
        },
      },
    ],
  });

  assert.deepEqual(parseRecords(body), [
    {
      id: 'r1',
      createdAt: '1970-01-01T00:00:00.000Z',
      updatedAt: '2024-03-01T10:00:00.000Z',
      fields: {
        name: { type: 'localized', values: { en: 'Tea' } },
        count: { type: 'int', value: 3 },
        ratio: { type: 'double', value: 0.5 },
        enabled: { type: 'bool', value: false },
        label: { type: 'string', value: 'plain' },
        missing: { type: 'null' },
      },
    },
  ]);
});

test('parseRecords rejects the whole response on an invalid record', () => {
  const body = JSON.stringify({ items: [{ id: 'ok', createdAt: 'a', updatedAt: 'b', data: {} }, { createdAt: 'a' }] });
  assert.throws(() => parseRecords(body), /records: items\[1\]: record.id missing/);
});

test('parseAuth requires a token and defaults the lists', () => {
  assert.deepEqual(parseAuth('{"token":"t1","tabs":["home",4],"availableLanguages":["en","fr"]}'), {
    token: 't1',
    tabs: ['home'],
    stores: [],
    availableLanguages: ['en', 'fr'],
  });
  assert.throws(() => parseAuth('{"tabs":[]}'), /token missing/);
});

test('parseLanguages', () => {
  assert.deepEqual(parseLanguages('{"languages":["en","ar"]}'), ['en', 'ar']);
  assert.throws(() => parseLanguages('{"languages":"en"}'), ResponseFormatError);
});
