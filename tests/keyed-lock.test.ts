import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../server/utils/keyed-lock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks for the same key one at a time, in call order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('cert-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = lock.run('cert-1', async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not hold tasks for other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.run('cert-1', () => gate.promise);
    await expect(lock.run('cert-2', async () => 'free')).resolves.toBe('free');

    gate.resolve();
    await blocked;
  });

  it('releases the key after a failing task', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('cert-1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('cert-1', async () => 'next')).resolves.toBe('next');
    expect(lock.pendingKeys).toBe(0);
  });
});
