import test from 'node:test';
import assert from 'node:assert/strict';

import { ContentCacheStore, COLORS_RESOURCE_ID, type DataRecord } from '../index.js';

function record(id: string, title: string, updatedAt = '2024-01-01T00:00:00.000Z'): DataRecord {
  return {
    id,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt,
    fields: { title: { type: 'string', value: title } },
  };
}

test('get returns undefined for unknown resource, key or slot', () => {
  const store = new ContentCacheStore();
  store.replace('home', { title: { en: 'Hi' } });

  assert.equal(store.get('home', 'title', 'en'), 'Hi');
  assert.equal(store.get('home', 'title', 'fr'), undefined);
  assert.equal(store.get('home', 'missing', 'en'), undefined);
  assert.equal(store.get('nope', 'title', 'en'), undefined);
  assert.equal(store.get('', '', ''), undefined);
});

test('prototype-named keys are plain data', () => {
  const store = new ContentCacheStore();
  assert.equal(store.get('home', 'constructor', 'en'), undefined);
  assert.equal(store.get('__proto__', 'toString', 'en'), undefined);

  store.replace('home', { constructor: { en: 'ctor' } });
  assert.equal(store.get('home', 'constructor', 'en'), 'ctor');
  assert.deepEqual(store.getAll('home', 'en'), { constructor: 'ctor' });
});

test('replace merges additively and overwrites per key', () => {
  const store = new ContentCacheStore();
  store.replace('home', { b: { en: 'B', fr: 'Bé' } });
  store.replace('home', { a: { en: 'X' } });

  assert.equal(store.get('home', 'a', 'en'), 'X');
  assert.equal(store.get('home', 'b', 'en'), 'B');

  store.replace('home', { b: { en: 'B2' } });
  assert.equal(store.get('home', 'b', 'en'), 'B2');
  assert.equal(store.get('home', 'b', 'fr'), undefined);
});

test('getAll resolves one slot and skips keys without it', () => {
  const store = new ContentCacheStore();
  store.replace('home', { title: { en: 'Hi', fr: 'Salut' }, only_en: { en: 'E' } });

  assert.deepEqual(store.getAll('home', 'fr'), { title: 'Salut' });
  assert.deepEqual(store.getAll('home', 'en'), { title: 'Hi', only_en: 'E' });
  assert.deepEqual(store.getAll('other', 'en'), {});
});

test('contains is true only for non-empty resources', () => {
  const store = new ContentCacheStore();
  assert.equal(store.contains('home'), false);

  store.replace('home', {});
  assert.equal(store.contains('home'), false);

  store.replace('home', { a: { en: 'A' } });
  assert.equal(store.contains('home'), true);

  store.replaceRecords('products', []);
  assert.equal(store.contains('products'), false);
  store.replaceRecords('products', [record('p1', 'Tea')]);
  assert.equal(store.contains('products'), true);
});

test('replaceRecords merges by id and marks the store', () => {
  const store = new ContentCacheStore();
  store.replaceRecords('products', [record('p1', 'Tea'), record('p2', 'Coffee')]);
  store.replaceRecords('products', [record('p2', 'Espresso', '2024-02-01T00:00:00.000Z'), record('p3', 'Milk')]);

  const titles = store.getRecords('products').map((r) => [r.id, r.fields.title]);
  assert.deepEqual(titles, [
    ['p1', { type: 'string', value: 'Tea' }],
    ['p2', { type: 'string', value: 'Espresso' }],
    ['p3', { type: 'string', value: 'Milk' }],
  ]);
  assert.equal(store.isStore('products'), true);
  assert.equal(store.getRecord('products', 'p2')?.updatedAt, '2024-02-01T00:00:00.000Z');
  assert.deepEqual(store.getRecords('unknown'), []);
});

test('known registry reports first insertion only', () => {
  const store = new ContentCacheStore();
  assert.equal(store.markKnown('home'), true);
  assert.equal(store.markKnown('home'), false);
  assert.deepEqual(store.knownResources(), ['home']);
});

test('resourceIds and languages', () => {
  const store = new ContentCacheStore();
  store.replace('home', { t: { fr: 'F', en: 'E' } });
  store.replace('empty', {});
  store.replace(COLORS_RESOURCE_ID, { primary: { color: '#FF0000' } });
  store.replaceRecords('products', [record('p1', 'Tea')]);

  assert.deepEqual(store.resourceIds(), ['home', COLORS_RESOURCE_ID, 'products']);
  assert.deepEqual(store.languages(), ['en', 'fr']);
});

test('snapshot and restore round-trip', () => {
  const store = new ContentCacheStore();
  store.replace('home', { title: { en: 'Hi', fr: 'Salut' } });
  store.replaceRecords('products', [record('p1', 'Tea')]);
  store.markStore('empty_store');
  store.markKnown('home');

  const snap = store.snapshot();
  const copy = new ContentCacheStore();
  copy.restore(snap);

  assert.deepEqual(copy.snapshot(), snap);
  assert.deepEqual(snap, {
    entries: { home: { title: { en: 'Hi', fr: 'Salut' } } },
    records: { products: [record('p1', 'Tea')] },
    stores: ['products', 'empty_store'],
    knownResources: ['home'],
  });
});

test('snapshot is detached from later mutations', () => {
  const store = new ContentCacheStore();
  store.replace('home', { a: { en: 'A' } });
  const snap = store.snapshot();

  store.replace('home', { b: { en: 'B' } });
  assert.deepEqual(snap.entries, { home: { a: { en: 'A' } } });
});

test('clear empties everything', () => {
  const store = new ContentCacheStore();
  store.replace('home', { a: { en: 'A' } });
  store.markKnown('home');
  store.clear();

  assert.equal(store.contains('home'), false);
  assert.deepEqual(store.snapshot(), { entries: {}, records: {}, stores: [], knownResources: [] });
});

test('records handed out or handed in are copies of the cached ones', () => {
  const store = new ContentCacheStore();
  const incoming = record('p1', 'Tea');
  store.replaceRecords('products', [incoming]);

  const [first] = store.getRecords('products');
  assert.ok(first);
  first.fields.title = { type: 'string', value: 'Edited' };
  incoming.fields.title = { type: 'string', value: 'Edited too' };
  const single = store.getRecord('products', 'p1');
  assert.ok(single);
  single.updatedAt = '1999-01-01T00:00:00.000Z';

  assert.deepEqual(store.getRecords('products'), [record('p1', 'Tea')]);
  assert.deepEqual(store.snapshot().records, { products: [record('p1', 'Tea')] });
});
