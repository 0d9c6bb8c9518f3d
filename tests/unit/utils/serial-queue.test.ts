import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../../../src/utils/serial-queue.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SerialQueue', () => {
  it('should run tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    const gate = deferred<void>();

    const first = queue.run(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      order.push('second');
      return 2;
    });

    expect(queue.size).toBe(2);
    gate.resolve();

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should keep running after a task fails', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(async () => {
      throw new Error('write failed');
    });
    const next = queue.run(async () => 'ok');

    await expect(failing).rejects.toThrow('write failed');
    await expect(next).resolves.toBe('ok');
  });

  it('should drain once every submitted task has settled', async () => {
    const queue = new SerialQueue();
    const done: number[] = [];

    void queue.run(async () => {
      done.push(1);
    });
    queue.run(async () => {
      throw new Error('ignored');
    }).catch(() => undefined);

    await queue.drain();
    expect(done).toEqual([1]);
    expect(queue.size).toBe(0);
  });
});
