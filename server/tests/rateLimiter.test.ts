import { KeyedRateLimiter, SlidingWindowRateLimiter } from '../src/core/rateLimiter';

describe('SlidingWindowRateLimiter', () => {
  test('allows up to the limit inside the window', () => {
    const limiter = new SlidingWindowRateLimiter(2, 1_000);

    expect(limiter.allow(0)).toBe(true);
    expect(limiter.allow(100)).toBe(true);
    expect(limiter.allow(200)).toBe(false);
  });

  test('frees capacity as old requests leave the window', () => {
    const limiter = new SlidingWindowRateLimiter(1, 1_000);

    expect(limiter.allow(0)).toBe(true);
    expect(limiter.allow(1_000)).toBe(false);
    expect(limiter.allow(1_001)).toBe(true);
  });

  test('reports idleness once the window is empty', () => {
    const limiter = new SlidingWindowRateLimiter(1, 1_000);
    limiter.allow(0);

    expect(limiter.isIdle(500)).toBe(false);
    expect(limiter.isIdle(1_001)).toBe(true);
  });
});

describe('KeyedRateLimiter', () => {
  test('limits each key independently', () => {
    const limiter = new KeyedRateLimiter(1, 60_000);

    expect(limiter.allow('10.0.0.1', 0)).toBe(true);
    expect(limiter.allow('10.0.0.1', 10)).toBe(false);
    expect(limiter.allow('10.0.0.2', 10)).toBe(true);
  });

  test('sweeps idle keys periodically', () => {
    const limiter = new KeyedRateLimiter(5, 1_000, 3);

    limiter.allow('a', 0);
    limiter.allow('b', 0);
    expect(limiter.trackedKeys).toBe(2);

    limiter.allow('c', 5_000);

    expect(limiter.trackedKeys).toBe(1);
  });

  test('creates standalone windows with the same limits', () => {
    const window = new KeyedRateLimiter(1, 1_000).create();

    expect(window.allow(0)).toBe(true);
    expect(window.allow(1)).toBe(false);
  });
});
