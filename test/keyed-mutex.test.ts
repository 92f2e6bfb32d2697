import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../src/utils/keyed-mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedMutex', () => {
  it('should serialize work for the same key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        events.push('first:start');
        await delay(20);
        events.push('first:end');
      }),
      mutex.runExclusive('a', async () => {
        events.push('second:start');
        await delay(5);
        events.push('second:end');
      }),
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should not block different keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      mutex.runExclusive('b', async () => {
        events.push('b:start');
        await delay(5);
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('should release the lock when the work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('a', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('a')).toBe(false);
    expect(await mutex.runExclusive('a', () => 42)).toBe(42);
  });

  it('should report whether a key is held', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('a');

    expect(mutex.isLocked('a')).toBe(true);
    release();
    expect(mutex.isLocked('a')).toBe(false);
  });
});
