import { describe, expect, test } from 'vitest';

import { RateLimiter } from '../src/runtime/rate-limiter.js';

describe('RateLimiter', () => {
  test('blocks once the window is full and reopens as requests age out', () => {
    let nowMs = 0;
    const limiter = new RateLimiter({ maxRequests: 2, windowSeconds: 60, now: () => nowMs });

    expect(limiter.canRequest()).toBe(true);
    limiter.recordRequest();

    nowMs = 10_000;
    limiter.recordRequest();

    expect(limiter.canRequest()).toBe(false);
    expect(limiter.waitTime()).toBe(50);
    expect(limiter.inWindow()).toBe(2);

    nowMs = 60_000;
    expect(limiter.canRequest()).toBe(true);
    expect(limiter.waitTime()).toBe(0);
    expect(limiter.inWindow()).toBe(1);
  });

  test('rejects a non-positive request budget', () => {
    expect(() => new RateLimiter({ maxRequests: 0 })).toThrow('invalid maxRequests: 0');
  });
});
