#!/usr/bin/env npx tsx
/**
 * Keyed Lock Tests
 * Verifies: FIFO exclusion per key, independence across keys,
 * release on failure, deadlock-free ordered acquisition
 */

import assert from 'node:assert/strict';
import { KeyedLock } from '../engine/locks.js';
import { lockOrder } from '../engine/registry.js';
import { test, section, finish, sleep, within } from './harness.js';

async function runTests() {
  console.log('\n🔒 === KEYED LOCK TESTS ===');

  section('Exclusion');

  await test('holders of the same key run one after another in call order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const first = lock.withKeys(['k'], async () => {
      order.push('a-start');
      await sleep(10);
      order.push('a-end');
    });
    const second = lock.withKeys(['k'], () => {
      order.push('b');
    });
    await Promise.all([first, second]);
    assert.deepEqual(order, ['a-start', 'a-end', 'b']);
  });

  await test('different keys do not wait for each other', async () => {
    const lock = new KeyedLock();
    let openGate: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const slow = lock.withKeys(['x'], () => gate);
    await within(lock.withKeys(['y'], () => 'done'), 500);
    assert.equal(lock.isLocked('x'), true);
    openGate();
    await slow;
    assert.equal(lock.isLocked('x'), false);
  });

  await test('a throwing holder still releases its keys', async () => {
    const lock = new KeyedLock();
    await assert.rejects(
      lock.withKeys(['k', 'j'], () => {
        throw new Error('boom');
      }),
      /boom/,
    );
    assert.equal(lock.isLocked('k'), false);
    assert.equal(lock.isLocked('j'), false);
    assert.equal(await lock.withKeys(['k'], () => 7), 7);
  });

  await test('release is idempotent', async () => {
    const lock = new KeyedLock();
    const release = await lock.acquire('k');
    release();
    release();
    assert.equal(lock.isLocked('k'), false);
  });

  section('Ordering');

  await test('lock order puts the item lock first, then robots by id', () => {
    assert.deepEqual(lockOrder(['r2', 'r1', 'r2'], true), ['items', 'robot:r1', 'robot:r2']);
    assert.deepEqual(lockOrder(['b', 'a']), ['robot:a', 'robot:b']);
  });

  await test('pairs requested in opposite directions never deadlock', async () => {
    const lock = new KeyedLock();
    let inside = 0;
    let maxInside = 0;
    const jobs = Array.from({ length: 50 }, (_, i) =>
      lock.withKeys(lockOrder(i % 2 === 0 ? ['a', 'b'] : ['b', 'a']), async () => {
        inside++;
        maxInside = Math.max(maxInside, inside);
        await sleep(0);
        inside--;
      }),
    );
    await within(Promise.all(jobs), 2000);
    assert.equal(maxInside, 1);
  });

  finish('Keyed lock');
}

runTests().catch((err) => {
  console.error(err);
  process.exit(1);
});
