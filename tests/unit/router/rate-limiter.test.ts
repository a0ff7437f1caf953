import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RateLimiter } from '../../../src/router/rate-limiter.js';

describe('RateLimiter', () => {
  let limiter: RateLimiter;

  beforeEach(() => {
    limiter = new RateLimiter();
  });

  it('returns false for unknown providers', () => {
    expect(limiter.isRateLimited('alpha')).toBe(false);
  });

  it('marks provider as rate-limited', () => {
    limiter.markRateLimited('alpha');
    expect(limiter.isRateLimited('alpha')).toBe(true);
  });

  it('expires after cooldown period', () => {
    vi.useFakeTimers();
    try {
      limiter.markRateLimited('alpha', 60_000);
      expect(limiter.isRateLimited('alpha')).toBe(true);

      vi.advanceTimersByTime(59_999);
      expect(limiter.isRateLimited('alpha')).toBe(true);

      vi.advanceTimersByTime(1);
      expect(limiter.isRateLimited('alpha')).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });

  it('tracks multiple providers independently', () => {
    limiter.markRateLimited('alpha');
    limiter.markRateLimited('beta');

    expect(limiter.isRateLimited('alpha')).toBe(true);
    expect(limiter.isRateLimited('beta')).toBe(true);
    expect(limiter.isRateLimited('gamma')).toBe(false);
  });

  it('limitedAmong returns the cooling subset in input order', () => {
    limiter.markRateLimited('beta');
    limiter.markRateLimited('alpha');

    expect(limiter.limitedAmong(['alpha', 'beta', 'gamma', 'delta'])).toEqual(['alpha', 'beta']);
  });

  it('limitedAmong returns nothing when none rate-limited', () => {
    expect(limiter.limitedAmong(['alpha', 'beta'])).toEqual([]);
  });

  it('exclusionsAmong returns the cooling subset while others remain', () => {
    limiter.markRateLimited('beta');
    expect(limiter.exclusionsAmong(['alpha', 'beta'])).toEqual(['beta']);
  });

  it('exclusionsAmong excludes nobody when every provider is cooling', () => {
    limiter.markRateLimited('alpha');
    limiter.markRateLimited('beta');
    expect(limiter.exclusionsAmong(['alpha', 'beta'])).toEqual([]);
  });

  it('uses the constructor cooldown by default', () => {
    vi.useFakeTimers();
    try {
      const short = new RateLimiter(1000);
      short.markRateLimited('alpha');
      vi.advanceTimersByTime(1000);
      expect(short.isRateLimited('alpha')).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });

  it('clear removes rate-limit for specific provider', () => {
    limiter.markRateLimited('alpha');
    limiter.markRateLimited('beta');

    limiter.clear('alpha');

    expect(limiter.isRateLimited('alpha')).toBe(false);
    expect(limiter.isRateLimited('beta')).toBe(true);
  });

  it('clearAll removes all rate-limits', () => {
    limiter.markRateLimited('alpha');
    limiter.markRateLimited('beta');

    limiter.clearAll();

    expect(limiter.isRateLimited('alpha')).toBe(false);
    expect(limiter.isRateLimited('beta')).toBe(false);
  });

  it('size returns count of active rate-limits', () => {
    expect(limiter.size).toBe(0);

    limiter.markRateLimited('alpha');
    limiter.markRateLimited('beta');
    expect(limiter.size).toBe(2);
  });

  it('size prunes expired entries', () => {
    vi.useFakeTimers();
    try {
      limiter.markRateLimited('alpha', 1000);
      limiter.markRateLimited('beta', 5000);

      vi.advanceTimersByTime(2000);
      expect(limiter.size).toBe(1); // alpha expired, beta still active
    } finally {
      vi.useRealTimers();
    }
  });

  it('supports custom cooldown periods', () => {
    vi.useFakeTimers();
    try {
      limiter.markRateLimited('alpha', 5000); // 5s cooldown

      vi.advanceTimersByTime(4999);
      expect(limiter.isRateLimited('alpha')).toBe(true);

      vi.advanceTimersByTime(1);
      expect(limiter.isRateLimited('alpha')).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });
});
