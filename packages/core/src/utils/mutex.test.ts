import { describe, it, expect } from 'vitest';
import { Mutex } from './mutex.js';

describe('Mutex', () => {
  it('is unlocked initially', () => {
    const mutex = new Mutex();
    expect(mutex.isLocked).toBe(false);
    expect(mutex.waiting).toBe(0);
  });

  it('runs callers one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const task = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a'), task('b'), task('c')]);
    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked).toBe(false);
  });

  it('releases the lock when the callback throws', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(mutex.isLocked).toBe(false);
  });

  it('hands the lock to a waiter on release', async () => {
    const mutex = new Mutex();
    await mutex.acquire();
    let acquired = false;
    const pending = mutex.acquire().then(() => {
      acquired = true;
    });
    expect(mutex.waiting).toBe(1);
    mutex.release();
    await pending;
    expect(acquired).toBe(true);
    expect(mutex.isLocked).toBe(true);
    mutex.release();
    expect(mutex.isLocked).toBe(false);
  });
});
