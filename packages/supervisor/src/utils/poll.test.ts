import { describe, it, expect, vi } from 'vitest';
import { pollUntil } from './poll.js';
import { mapSettledWithLimit, withTimeout } from './concurrency.js';

describe('pollUntil', () => {
  it('returns on the first satisfied attempt', async () => {
    const predicate = vi.fn(async () => true);
    const result = await pollUntil(predicate, { timeoutMs: 1000 });
    expect(result.satisfied).toBe(true);
    expect(result.attempts).toBe(1);
  });

  it('keeps polling until the predicate holds', async () => {
    let calls = 0;
    const result = await pollUntil(async () => ++calls >= 3, {
      timeoutMs: 1000,
      initialDelayMs: 1,
      maxDelayMs: 2,
    });
    expect(result.satisfied).toBe(true);
    expect(result.attempts).toBe(3);
  });

  it('gives up after the timeout', async () => {
    const result = await pollUntil(async () => false, {
      timeoutMs: 20,
      initialDelayMs: 5,
    });
    expect(result.satisfied).toBe(false);
    expect(result.attempts).toBeGreaterThanOrEqual(2);
  });

  it('evaluates once with a zero timeout', async () => {
    const predicate = vi.fn(async () => false);
    const result = await pollUntil(predicate, { timeoutMs: 0 });
    expect(result).toMatchObject({ satisfied: false, attempts: 1 });
  });

  it('treats a throwing predicate as not yet satisfied', async () => {
    let calls = 0;
    const result = await pollUntil(async () => {
      calls++;
      if (calls === 1) throw new Error('probe failed');
      return true;
    }, { timeoutMs: 1000, initialDelayMs: 1 });
    expect(result.satisfied).toBe(true);
    expect(result.attempts).toBe(2);
  });
});

describe('mapSettledWithLimit', () => {
  it('never runs more than the limit at once', async () => {
    let inFlight = 0;
    let peak = 0;
    await mapSettledWithLimit([1, 2, 3, 4, 5], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
    });
    expect(peak).toBe(2);
  });

  it('keeps results in input order and isolates rejections', async () => {
    const results = await mapSettledWithLimit(['a', 'b', 'c'], 0, async (item) => {
      if (item === 'b') throw new Error('b failed');
      return item.toUpperCase();
    });
    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(results[1].status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });
});

describe('withTimeout', () => {
  it('resolves with the fallback when the timer wins', async () => {
    const slow = new Promise<string>(resolve => setTimeout(() => resolve('late'), 200));
    await expect(withTimeout(slow, 5, () => 'timed out')).resolves.toBe('timed out');
  });

  it('passes through a fast promise', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, () => 'timed out')).resolves.toBe('ok');
  });
});
