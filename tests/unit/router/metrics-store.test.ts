import { describe, it, expect } from 'vitest';
import { MetricsStore } from '../../../src/router/metrics-store.js';

describe('MetricsStore', () => {
  it('returns zeroed metrics for unknown keys', () => {
    const store = new MetricsStore();
    expect(store.get('alpha').totalRequests).toBe(0);
    expect(store.has('alpha')).toBe(false);
  });

  it('keeps successes plus failures equal to the total', () => {
    const store = new MetricsStore();
    const outcomes = [true, false, true, true, false, true, true];
    for (const success of outcomes) {
      store.recordOutcome('alpha', { durationMs: 100, success, tokensUsed: 10, cost: 0.001 });
    }

    const m = store.get('alpha');
    expect(m.totalRequests).toBe(outcomes.length);
    expect(m.successfulRequests + m.failedRequests).toBe(m.totalRequests);
    expect(m.successfulRequests).toBe(5);
    expect(m.failedRequests).toBe(2);
  });

  it('computes averages and rates', () => {
    const store = new MetricsStore();
    store.recordOutcome('alpha', { durationMs: 1000, success: true, tokensUsed: 100, cost: 0.002 });
    const m = store.recordOutcome('alpha', { durationMs: 3000, success: false, tokensUsed: 0, cost: 0 });

    expect(m.averageResponseTimeMs).toBe(2000);
    expect(m.successRate).toBe(0.5);
    expect(m.errorRate).toBe(0.5);
    expect(m.totalTokens).toBe(100);
    expect(m.averageTokensPerRequest).toBe(100);
    expect(m.averageCostPerToken).toBeCloseTo(0.00002, 10);
  });

  it('averages tokens only when a sample carries tokens', () => {
    const store = new MetricsStore();
    store.recordOutcome('alpha', { durationMs: 10, success: true, tokensUsed: 100, cost: 0 });
    store.recordOutcome('alpha', { durationMs: 10, success: true, tokensUsed: 200, cost: 0 });
    expect(store.get('alpha').averageTokensPerRequest).toBe(150);
  });

  it('hands out copies', () => {
    const store = new MetricsStore();
    store.recordOutcome('alpha', { durationMs: 10, success: true, tokensUsed: 1, cost: 0 });

    const copy = store.get('alpha');
    copy.totalRequests = 99;
    expect(store.get('alpha').totalRequests).toBe(1);

    const entry = store.snapshot()[0];
    expect(entry?.[0]).toBe('alpha');
    if (entry) entry[1].successfulRequests = 42;
    expect(store.get('alpha').successfulRequests).toBe(1);
  });
});
