import test from 'node:test';
import assert from 'node:assert/strict';

import { MemoryDocumentStore } from '../server/data/memoryDocumentStore.js';
import { PersistenceError } from '../server/lib/errors.js';
import { entityDoc } from './helpers.js';

test('upsert then get returns the document; missing keys return null', async () => {
  const store = new MemoryDocumentStore();
  await store.upsert('entities', 'AAPL', entityDoc('AAPL', 10));
  assert.deepEqual(await store.get('entities', 'AAPL'), entityDoc('AAPL', 10));
  assert.equal(await store.get('entities', 'MSFT'), null);
  assert.equal(await store.get('rawRecords', 'AAPL'), null);
});

test('upsert replaces the whole document under the same key', async () => {
  const store = new MemoryDocumentStore();
  await store.upsert('entities', 'AAPL', entityDoc('AAPL', 10));
  await store.upsert('entities', 'AAPL', entityDoc('AAPL', 20, { isActive: false }));
  assert.equal(await store.count('entities'), 1);
  assert.deepEqual(await store.get('entities', 'AAPL'), entityDoc('AAPL', 20, { isActive: false }));
});

test('documents are serialized in schema key order', async () => {
  const store = new MemoryDocumentStore();
  await store.upsert('entities', 'AAPL', {
    updatedAt: '2026-01-02T00:00:00.000Z',
    lastAnalyzedDate: null,
    id: 'AAPL',
    isActive: true,
    priorityWeight: 10,
    displayName: 'Apple',
    addedOn: '2026-01-02',
  });
  assert.deepEqual(store.snapshot('entities'), {
    AAPL: '{"id":"AAPL","displayName":"Apple","priorityWeight":10,"isActive":true,"addedOn":"2026-01-02","lastAnalyzedDate":null,"updatedAt":"2026-01-02T00:00:00.000Z"}',
  });
});

test('returned documents do not alias stored state', async () => {
  const store = new MemoryDocumentStore();
  await store.upsert('entities', 'AAPL', entityDoc('AAPL', 10));
  const first = await store.get('entities', 'AAPL');
  assert.ok(first);
  first.priorityWeight = 99;
  assert.equal((await store.get('entities', 'AAPL'))?.priorityWeight, 10);
});

test('query filters, sorts and limits', async () => {
  const store = new MemoryDocumentStore();
  await store.upsert('entities', 'A', entityDoc('A', 5));
  await store.upsert('entities', 'B', entityDoc('B', 50));
  await store.upsert('entities', 'C', entityDoc('C', 20, { isActive: false }));
  await store.upsert('entities', 'D', entityDoc('D', 20));

  const active = await store.query(
    'entities',
    { isActive: true },
    { sort: [{ field: 'priorityWeight', direction: 'desc' }], limit: 2 },
  );
  assert.deepEqual(
    active.map((e) => e.id),
    ['B', 'D'],
  );
  assert.equal(await store.count('entities', { priorityWeight: { $gte: 20 } }), 3);
  // Without a sort, results come back in key order.
  assert.deepEqual(
    (await store.query('entities')).map((e) => e.id),
    ['A', 'B', 'C', 'D'],
  );
});

test('invalid documents are rejected with PersistenceError', async () => {
  const store = new MemoryDocumentStore();
  await assert.rejects(store.upsert('entities', '', entityDoc('', 1)), (err: unknown) => {
    return err instanceof PersistenceError && err.operation === 'upsert' && err.collection === 'entities';
  });
});

test('a closed store rejects every operation', async () => {
  const store = new MemoryDocumentStore();
  await store.close();
  await assert.rejects(store.get('jobRuns', 'x'), {
    name: 'PersistenceError',
    message: 'Persistence get on jobRuns failed: store is closed',
  });
  await assert.rejects(store.ping(), PersistenceError);
});

test('compareAndSet with a null condition only inserts a missing key', async () => {
  const store = new MemoryDocumentStore();
  assert.equal(await store.compareAndSet('entities', 'AAPL', entityDoc('AAPL', 10), null), true);
  assert.equal(await store.compareAndSet('entities', 'AAPL', entityDoc('AAPL', 99), null), false);
  assert.equal((await store.get('entities', 'AAPL'))?.priorityWeight, 10);
});

test('compareAndSet writes only while the guarded field still matches', async () => {
  const store = new MemoryDocumentStore();
  await store.upsert('entities', 'AAPL', entityDoc('AAPL', 10));

  assert.equal(
    await store.compareAndSet('entities', 'AAPL', entityDoc('AAPL', 30), { field: 'priorityWeight', equals: 20 }),
    false,
  );
  assert.equal((await store.get('entities', 'AAPL'))?.priorityWeight, 10);
  assert.equal(
    await store.compareAndSet('entities', 'AAPL', entityDoc('AAPL', 30), { field: 'priorityWeight', equals: 10 }),
    true,
  );
  assert.equal((await store.get('entities', 'AAPL'))?.priorityWeight, 30);
  assert.equal(
    await store.compareAndSet('entities', 'MSFT', entityDoc('MSFT', 1), { field: 'priorityWeight', equals: 1 }),
    false,
  );
});

test('concurrent inserts of one key have exactly one winner', async () => {
  const store = new MemoryDocumentStore();
  const results = await Promise.all(
    [1, 2, 3].map((weight) => store.compareAndSet('entities', 'AAPL', entityDoc('AAPL', weight), null)),
  );
  assert.deepEqual(results, [true, false, false]);
  assert.equal((await store.get('entities', 'AAPL'))?.priorityWeight, 1);
});
