/**
 * Keyed Mutex Tests
 */

import { describe, expect, test } from 'vitest';
import { AbortedError } from '@/core/errors';
import { KeyedMutex } from '@/providers/graph/patient-lock';

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('KeyedMutex', () => {
  test('runs tasks for one key in arrival order', async () => {
    const mutex = new KeyedMutex<string>();
    const order: string[] = [];
    const first = gate();

    const a = mutex.runExclusive('p1', async () => {
      order.push('first start');
      await first.wait;
      order.push('first end');
    });
    const b = mutex.runExclusive('p1', async () => {
      order.push('second');
    });

    await tick();
    expect(order).toEqual(['first start']);

    first.open();
    await Promise.all([a, b]);
    expect(order).toEqual(['first start', 'first end', 'second']);
  });

  test('different keys do not wait on each other', async () => {
    const mutex = new KeyedMutex<string>();
    const held = gate();

    const slow = mutex.runExclusive('p1', () => held.wait);
    await expect(mutex.runExclusive('p2', async () => 'done')).resolves.toBe('done');

    held.open();
    await slow;
  });

  test('drops the key once its queue drains', async () => {
    const mutex = new KeyedMutex<string>();
    const held = gate();

    const pending = mutex.runExclusive('p1', () => held.wait);
    expect(mutex.isLocked('p1')).toBe(true);
    expect(mutex.size).toBe(1);

    held.open();
    await pending;
    expect(mutex.isLocked('p1')).toBe(false);
    expect(mutex.size).toBe(0);
  });

  test('releases the lock when the task throws', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(
      mutex.runExclusive('p1', async () => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');
    await expect(mutex.runExclusive('p1', async () => 'next')).resolves.toBe('next');
  });

  test('an aborted waiter leaves the queue intact', async () => {
    const mutex = new KeyedMutex<string>();
    const held = gate();
    let holderDone = false;

    const holder = mutex.runExclusive('p1', async () => {
      await held.wait;
      holderDone = true;
    });

    const controller = new AbortController();
    const waiter = mutex.runExclusive('p1', async () => 'never', controller.signal);
    controller.abort('client left');
    await expect(waiter).rejects.toBeInstanceOf(AbortedError);

    expect(mutex.isLocked('p1')).toBe(true);
    const later = mutex.runExclusive('p1', async () => holderDone);

    held.open();
    await holder;
    await expect(later).resolves.toBe(true);
    expect(mutex.size).toBe(0);
  });

  test('an already fired signal rejects without running the task', async () => {
    const mutex = new KeyedMutex<string>();
    const controller = new AbortController();
    controller.abort('gone');
    let ran = false;

    await expect(
      mutex.runExclusive(
        'p1',
        async () => {
          ran = true;
        },
        controller.signal
      )
    ).rejects.toBeInstanceOf(AbortedError);
    expect(ran).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
