import { describe, it, expect } from 'vitest';
import { KeyedSerialQueue } from '../../src/utils/KeyedSerialQueue.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe('KeyedSerialQueue', () => {
  it('should run tasks for one key in order', async () => {
    const queue = new KeyedSerialQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run('k', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = queue.run('k', async () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('should run different keys concurrently', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const order: string[] = [];

    const blocked = queue.run('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await queue.run('b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['b', 'a']);
  });

  it('should not let a failed task block the next one', async () => {
    const queue = new KeyedSerialQueue();
    const failed = queue.run('k', async () => {
      throw new Error('boom');
    });
    const next = queue.run('k', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should forget keys once their work settles', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const task = queue.run('k', () => gate.promise);
    expect(queue.activeKeys).toBe(1);

    gate.resolve();
    await task;
    await new Promise((r) => setTimeout(r, 0));
    expect(queue.activeKeys).toBe(0);
  });
});
