/**
 * Tests for Async Utilities
 */

import { describe, it, expect } from 'vitest';
import { Mutex } from '@shared/utils/async-utils';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('Mutex', () => {
  it('should run critical sections one at a time, in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    await Promise.all([
      mutex.run(async () => {
        events.push('render:start');
        await sleep(5);
        events.push('render:end');
      }),
      mutex.run(async () => {
        events.push('lookup');
      }),
    ]);

    expect(events).toEqual(['render:start', 'render:end', 'lookup']);
  });

  it('should resolve each caller with its own result', async () => {
    const mutex = new Mutex();

    const results = await Promise.all([1, 2, 3].map((n) => mutex.run(async () => n * 10)));

    expect(results).toEqual([10, 20, 30]);
  });

  it('should count queued sections and unlock when all settle', async () => {
    const mutex = new Mutex();
    expect(mutex.isLocked).toBe(false);

    const first = mutex.run(() => sleep(5));
    const second = mutex.run(() => sleep(1));

    expect(mutex.isLocked).toBe(true);
    expect(mutex.waiting).toBe(1);

    await Promise.all([first, second]);

    expect(mutex.isLocked).toBe(false);
    expect(mutex.waiting).toBe(0);
  });

  it('should pass a rejection to its caller and keep serving the queue', async () => {
    const mutex = new Mutex();

    const failing = mutex.run(async () => {
      throw new Error('renderer crashed');
    });
    const next = mutex.run(async () => 'rendered');

    await expect(failing).rejects.toThrow('renderer crashed');
    await expect(next).resolves.toBe('rendered');
    expect(mutex.isLocked).toBe(false);
  });
});
