import { describe, it, expect } from 'vitest';
import { Mutex } from '../src/gateway/mutex';

describe('Mutex', () => {
  it('runs holders one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const task = (name: string, ms: number) =>
      mutex.runExclusive(async () => {
        order.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, ms));
        order.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a', 20), task('b', 0), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when a holder rejects', async () => {
    const mutex = new Mutex();

    const failed = mutex.runExclusive(async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive(async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('holds later callers until the current holder settles', async () => {
    const mutex = new Mutex();
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let secondRan = false;

    const held = mutex.runExclusive(() => gate);
    const second = mutex.runExclusive(async () => {
      secondRan = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(secondRan).toBe(false);

    release();
    await Promise.all([held, second]);
    expect(secondRan).toBe(true);
  });
});
