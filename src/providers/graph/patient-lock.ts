/**
 * Keyed Mutex
 *
 * One FIFO lock per key. Tasks for the same key run one at a time in
 * arrival order; tasks for different keys never wait on each other.
 * A key's entry is dropped once its queue drains.
 */

import { AbortedError } from '@/core/errors';

interface Queue {
  tail: Promise<void>;
  /** Tasks holding or waiting for the lock, aborted waiters included until they leave */
  pending: number;
}

export class KeyedMutex<K> {
  private readonly queues = new Map<K, Queue>();

  /** Keys that currently hold or wait for the lock. */
  get size(): number {
    return this.queues.size;
  }

  isLocked(key: K): boolean {
    return this.queues.has(key);
  }

  /**
   * Run `task` while holding the lock for `key`.
   * A signal that fires while waiting rejects with AbortedError and
   * leaves the queue intact for later callers.
   */
  async runExclusive<T>(key: K, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const queue = this.queues.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    const previous = queue.tail;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    // Queue position is taken now, before waiting
    queue.tail = previous.then(() => current);
    queue.pending++;
    this.queues.set(key, queue);

    try {
      await waitFor(previous, signal);
      return await task();
    } finally {
      release();
      queue.pending--;
      if (queue.pending === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }
}

function waitFor(previous: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return previous;
  if (signal.aborted) return Promise.reject(new AbortedError('acquireLock', signal.reason));

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => reject(new AbortedError('acquireLock', signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    previous.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
