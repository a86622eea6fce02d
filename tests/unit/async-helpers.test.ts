import { describe, it, expect } from 'vitest';
import { withTimeout, TimeoutError, PacedQueue } from '../../src/utils/async-helpers.js';

describe('withTimeout', () => {
  it('should resolve if promise completes within timeout', async () => {
    const result = await withTimeout(
      Promise.resolve('success'),
      1000,
      'test operation'
    );
    expect(result).toBe('success');
  });

  it('should throw TimeoutError if promise exceeds timeout', async () => {
    const slowPromise = new Promise((resolve) => {
      setTimeout(() => resolve('too late'), 500);
    });

    await expect(
      withTimeout(slowPromise, 50, 'slow operation')
    ).rejects.toThrow(TimeoutError);
  });

  it('should use the given message', async () => {
    const slowPromise = new Promise((resolve) => {
      setTimeout(() => resolve('too late'), 500);
    });

    await expect(withTimeout(slowPromise, 50, 'custom operation')).rejects.toThrow('custom operation');
  });
});

describe('PacedQueue', () => {
  it('should pause after every call, including failed ones', async () => {
    const events: string[] = [];
    const queue = new PacedQueue(1000, async (ms) => {
      events.push(`pause ${ms}`);
    });

    await queue.run(async () => {
      events.push('first');
    });
    await expect(queue.run(async () => {
      events.push('second');
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(events).toEqual(['first', 'pause 1000', 'second', 'pause 1000']);
  });

  it('should run concurrent callers one at a time', async () => {
    const events: string[] = [];
    const queue = new PacedQueue(10, async () => {
      events.push('pause');
    });

    const task = (name: string) => queue.run(async () => {
      events.push(`${name}:start`);
      await new Promise((r) => setTimeout(r, 20));
      events.push(`${name}:end`);
      return name;
    });

    const results = await Promise.all([task('a'), task('b')]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'pause', 'b:start', 'b:end', 'pause']);
  });

  it('should keep the real gap between calls with the default pause', async () => {
    const starts: number[] = [];
    const queue = new PacedQueue(100);

    await queue.run(async () => { starts.push(Date.now()); });
    await queue.run(async () => { starts.push(Date.now()); });

    const [first = 0, second = 0] = starts;
    expect(second - first).toBeGreaterThanOrEqual(95);
  });
});
