import test from 'node:test';
import assert from 'node:assert/strict';

import { DuplicateEntityError, EntityNotFoundError } from '../server/lib/errors.js';
import { createClock, createServices } from './helpers.js';

function setup() {
  const clock = createClock('2026-03-06T15:00:00.000Z');
  return { clock, ...createServices(clock) };
}

test('add normalizes the id and fills defaults', async () => {
  const { registry } = setup();
  const entity = await registry.add({ id: ' aapl ', priorityWeight: 10 });
  assert.deepEqual(entity, {
    id: 'AAPL',
    displayName: 'AAPL',
    priorityWeight: 10,
    isActive: true,
    addedOn: '2026-03-06',
    lastAnalyzedDate: null,
    updatedAt: '2026-03-06T15:00:00.000Z',
  });
  assert.deepEqual(await registry.get('AAPL'), entity);
});

test('add rejects duplicates and invalid weights', async () => {
  const { registry } = setup();
  await registry.add({ id: 'AAPL', priorityWeight: 10 });
  await assert.rejects(
    registry.add({ id: 'aapl', priorityWeight: 3 }),
    (err: unknown) => err instanceof DuplicateEntityError && err.message === 'Entity already registered: AAPL',
  );
  await assert.rejects(registry.add({ id: 'MSFT', priorityWeight: -1 }), { name: 'ZodError' });
  assert.equal(await registry.get('MSFT'), null);
});

test('listBacklog returns active entities behind the date, highest priority first', async () => {
  const { registry } = setup();
  await registry.upsertMany([
    { id: 'A', priorityWeight: 10 },
    { id: 'B', priorityWeight: 50 },
    { id: 'C', priorityWeight: 50 },
    { id: 'D', priorityWeight: 10 },
    { id: 'E', priorityWeight: 99, isActive: false },
    { id: 'F', priorityWeight: 10 },
  ]);
  await registry.markAnalyzed('B', '2026-03-05');
  await registry.markAnalyzed('D', '2026-03-06');
  await registry.markAnalyzed('F', '2026-03-09');

  const backlog = await registry.listBacklog('2026-03-06');
  assert.deepEqual(
    backlog.map((entity) => entity.id),
    ['B', 'C', 'A'],
  );
  assert.deepEqual(
    (await registry.listActive()).map((entity) => entity.id),
    ['B', 'C', 'A', 'D', 'F'],
  );
});

test('markAnalyzed only moves the marker forward', async () => {
  const { registry } = setup();
  await registry.add({ id: 'AAPL', priorityWeight: 10 });
  assert.equal(await registry.markAnalyzed('AAPL', '2026-03-05'), true);
  assert.equal(await registry.markAnalyzed('AAPL', '2026-03-05'), false);
  assert.equal(await registry.markAnalyzed('AAPL', '2026-03-04'), false);
  assert.equal((await registry.get('AAPL'))?.lastAnalyzedDate, '2026-03-05');
  await assert.rejects(
    registry.markAnalyzed('NOPE', '2026-03-05'),
    (err: unknown) => err instanceof EntityNotFoundError && err.entityId === 'NOPE',
  );
});

test('upsertMany refreshes attributes but keeps progress and onboarding date', async () => {
  const { clock, registry } = setup();
  await registry.add({ id: 'AAPL', priorityWeight: 10 });
  await registry.markAnalyzed('AAPL', '2026-03-05');
  clock.set('2026-03-09T15:00:00.000Z');

  const result = await registry.upsertMany([
    { id: 'aapl', priorityWeight: 5, displayName: 'Apple' },
    { id: 'MSFT', priorityWeight: 1, addedOn: '2026-01-05' },
  ]);
  assert.deepEqual(result, { inserted: 1, updated: 1 });
  assert.deepEqual(await registry.get('AAPL'), {
    id: 'AAPL',
    displayName: 'Apple',
    priorityWeight: 5,
    isActive: true,
    addedOn: '2026-03-06',
    lastAnalyzedDate: '2026-03-05',
    updatedAt: '2026-03-09T15:00:00.000Z',
  });
  assert.equal((await registry.get('MSFT'))?.addedOn, '2026-01-05');
});

test('deactivate hides an entity from the backlog until reactivated', async () => {
  const { registry } = setup();
  await registry.add({ id: 'AAPL', priorityWeight: 10 });
  assert.equal((await registry.deactivate('AAPL')).isActive, false);
  assert.deepEqual(await registry.listBacklog('2026-03-06'), []);
  assert.equal((await registry.activate('AAPL')).isActive, true);
  assert.equal((await registry.listBacklog('2026-03-06')).length, 1);
  await assert.rejects(registry.deactivate('MSFT'), EntityNotFoundError);
});

test('updatePriorityWeight changes backlog order', async () => {
  const { registry } = setup();
  await registry.upsertMany([
    { id: 'A', priorityWeight: 10 },
    { id: 'B', priorityWeight: 20 },
  ]);
  await registry.updatePriorityWeight('A', 30);
  assert.deepEqual(
    (await registry.listBacklog('2026-03-06')).map((entity) => entity.id),
    ['A', 'B'],
  );
});

test('getStatistics summarizes active weights', async () => {
  const { registry } = setup();
  assert.deepEqual(await registry.getStatistics(), {
    total: 0,
    active: 0,
    inactive: 0,
    neverAnalyzed: 0,
    priorityWeight: null,
  });
  await registry.upsertMany([
    { id: 'A', priorityWeight: 10 },
    { id: 'B', priorityWeight: 50 },
    { id: 'C', priorityWeight: 20, isActive: false },
  ]);
  await registry.markAnalyzed('B', '2026-03-05');
  assert.deepEqual(await registry.getStatistics(), {
    total: 3,
    active: 2,
    inactive: 1,
    neverAnalyzed: 1,
    priorityWeight: { min: 10, max: 50, sum: 60, avg: 30 },
  });
});
