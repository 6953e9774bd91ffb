// Tests for the async mutex

import { describe, it, expect } from 'vitest';
import { Mutex } from './mutex.js';
import { settle } from './clock.js';

describe('Mutex', () => {
  it('should run sections one after another in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push('first:start');
      await settle();
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive(() => {
      events.push('second');
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should release the lock when a section fails', async () => {
    const mutex = new Mutex();

    const failing = mutex.runExclusive(async () => {
      throw new Error('section failed');
    });
    const next = mutex.runExclusive(async () => 'ran');

    await expect(failing).rejects.toThrow('section failed');
    await expect(next).resolves.toBe('ran');
  });

  it('should report whether a section is running or queued', async () => {
    const mutex = new Mutex();
    expect(mutex.isLocked()).toBe(false);

    const run = mutex.runExclusive(() => settle());
    expect(mutex.isLocked()).toBe(true);

    await run;
    expect(mutex.isLocked()).toBe(false);
  });
});
