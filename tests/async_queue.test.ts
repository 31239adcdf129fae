import test from 'node:test';
import assert from 'node:assert/strict';
import { AsyncQueue } from '../src/core/async_queue';

test('async queue delivers items in order', async () => {
  const q = new AsyncQueue<number>();
  q.push(1);
  q.push(2);
  const a = await q.next();
  const b = await q.next();
  assert.equal(a, 1);
  assert.equal(b, 2);
});

test('async queue waits when empty', async () => {
  const q = new AsyncQueue<number>();
  const p = q.next();
  q.push(7);
  const v = await p;
  assert.equal(v, 7);
});

test('async queue hands items to waiters in the order they asked', async () => {
  const q = new AsyncQueue<string>();
  const first = q.next();
  const second = q.next();
  q.push('a');
  q.push('b');
  assert.deepEqual(await Promise.all([first, second]), ['a', 'b']);
});

test('async queue fail rejects pending and later waiters after draining buffered items', async () => {
  const q = new AsyncQueue<number>();
  const pending = q.next();
  q.fail(new Error('gone'));
  await assert.rejects(pending, /gone/);

  const q2 = new AsyncQueue<number>();
  q2.push(3);
  q2.fail(new Error('closed'));
  q2.push(4);
  assert.equal(await q2.next(), 3);
  await assert.rejects(q2.next(), /closed/);
  assert.equal(q2.isFailed(), true);
});
