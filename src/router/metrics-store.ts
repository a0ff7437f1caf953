import type { OutcomeSample, PerformanceMetrics } from './types.js';

export function emptyMetrics(): PerformanceMetrics {
  return {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalProcessingTimeMs: 0,
    averageResponseTimeMs: 0,
    successRate: 0,
    errorRate: 0,
    totalTokens: 0,
    averageTokensPerRequest: 0,
    totalCost: 0,
    averageCostPerToken: 0,
  };
}

/**
 * Running performance counters per provider (or per synthetic batch key).
 *
 * Every mutation is a synchronous method that never yields to the event loop,
 * so each call is the store's exclusive section. Readers get copies and may
 * observe a state that is one in-flight call behind.
 */
export class MetricsStore {
  private metrics = new Map<string, PerformanceMetrics>();

  recordOutcome(key: string, sample: OutcomeSample): PerformanceMetrics {
    let m = this.metrics.get(key);
    if (!m) {
      m = emptyMetrics();
      this.metrics.set(key, m);
    }

    m.totalRequests++;
    m.totalProcessingTimeMs += sample.durationMs;
    m.averageResponseTimeMs = m.totalProcessingTimeMs / m.totalRequests;

    if (sample.success) {
      m.successfulRequests++;
    } else {
      m.failedRequests++;
    }
    m.successRate = m.successfulRequests / m.totalRequests;
    m.errorRate = m.failedRequests / m.totalRequests;

    if (sample.tokensUsed > 0) {
      m.totalTokens += sample.tokensUsed;
      m.averageTokensPerRequest = m.totalTokens / m.totalRequests;
    }

    if (sample.cost > 0) {
      m.totalCost += sample.cost;
      if (m.totalTokens > 0) {
        m.averageCostPerToken = m.totalCost / m.totalTokens;
      }
    }

    return { ...m };
  }

  /** Copy of the counters; all zeros for a key with no history. */
  get(key: string): PerformanceMetrics {
    const m = this.metrics.get(key);
    return m ? { ...m } : emptyMetrics();
  }

  has(key: string): boolean {
    return this.metrics.has(key);
  }

  snapshot(): Array<[string, PerformanceMetrics]> {
    return Array.from(this.metrics, ([key, m]): [string, PerformanceMetrics] => [key, { ...m }]);
  }

  get size(): number {
    return this.metrics.size;
  }
}
