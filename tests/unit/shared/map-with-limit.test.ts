import test from 'node:test';
import assert from 'node:assert/strict';
import { mapWithLimit } from '../../../packages/shared/src/concurrency/map-with-limit';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

test('mapWithLimit keeps results in input order', async () => {
  const results = await mapWithLimit([30, 5, 15], 3, async (value) => {
    await delay(value);
    return value * 2;
  });

  assert.deepEqual(results, [60, 10, 30]);
});

test('mapWithLimit never runs more than limit calls at once', async () => {
  let inFlight = 0;
  let peak = 0;

  await mapWithLimit([1, 2, 3, 4, 5, 6], 2, async () => {
    inFlight += 1;
    peak = Math.max(peak, inFlight);
    await delay(5);
    inFlight -= 1;
  });

  assert.equal(peak, 2);
});

test('mapWithLimit rejects with the first failure and stops taking new items', async () => {
  const started: number[] = [];

  await assert.rejects(
    mapWithLimit([0, 1, 2, 3, 4], 1, async (value) => {
      started.push(value);
      if (value === 1) {
        throw new Error('boom');
      }
      return value;
    }),
    { message: 'boom' },
  );

  assert.deepEqual(started, [0, 1]);
});

test('mapWithLimit treats a non-finite limit as one worker', async () => {
  const results = await mapWithLimit(['a', 'b'], Number.NaN, async (value, index) => `${value}${index}`);

  assert.deepEqual(results, ['a0', 'b1']);
});

test('mapWithLimit resolves an empty list without calling fn', async () => {
  let calls = 0;
  const results = await mapWithLimit([], 4, async () => {
    calls += 1;
  });

  assert.deepEqual(results, []);
  assert.equal(calls, 0);
});
