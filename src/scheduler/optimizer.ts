import type {
  ProcessingOptimization,
  ProcessingPerformance,
  ProcessingRecord,
  ProcessingTrend,
} from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const HIGH_VARIANCE = 1000;
const SLOW_AVERAGE_MS = 5000;
const MIN_SUCCESS_RATE = 0.9;
const MAX_FAILURE_RATE = 0.1;

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

export function variance(values: number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return mean(values.map(v => (v - m) ** 2));
}

function processingTimeTrend(records: ProcessingRecord[], now: number): ProcessingTrend[] {
  const recent = records.filter(r => r.timestamp > now - HOUR_MS);
  const older = records.filter(r => r.timestamp <= now - HOUR_MS);
  if (recent.length === 0 || older.length === 0) return [];

  const recentAvg = mean(recent.map(r => r.processingTimeMs));
  const olderAvg = mean(older.map(r => r.processingTimeMs));
  if (olderAvg === 0) return [];

  return [{
    metric: 'processing-time',
    trend: recentAvg < olderAvg ? 'improving' : 'degrading',
    changePercentage: Math.abs((recentAvg - olderAvg) / olderAvg * 100),
  }];
}

export function summarizeProcessing(records: ProcessingRecord[], now = Date.now()): ProcessingPerformance {
  return {
    totalRequestsProcessed: records.length,
    averageProcessingTimeMs: mean(records.map(r => r.processingTimeMs)),
    averageResponseSize: mean(records.map(r => r.responseSize)),
    successRate: records.length > 0 ? records.filter(r => r.success).length / records.length : 0,
    trends: processingTimeTrend(records, now),
  };
}

/**
 * Derives bottlenecks and an adjusted default strategy from past batch
 * records. Expected improvement is a rough fraction, capped at 0.5.
 */
export function optimizeProcessing(records: ProcessingRecord[], cores: number): ProcessingOptimization {
  const times = records.map(r => r.processingTimeMs);
  const averageMs = mean(times);
  const timeVariance = variance(times);
  const successRate = records.length > 0 ? records.filter(r => r.success).length / records.length : 1;

  const bottlenecks: string[] = [];
  const slow = records.filter(r => r.processingTimeMs > averageMs * 2);
  if (slow.length > 0) {
    bottlenecks.push(`Slow processing: ${slow.length} requests taking >${Math.round(averageMs * 2)}ms`);
  }
  const failureRate = 1 - successRate;
  if (failureRate > MAX_FAILURE_RATE) {
    bottlenecks.push(`High failure rate: ${(failureRate * 100).toFixed(1)}%`);
  }

  const recommendations: string[] = [];
  if (timeVariance > HIGH_VARIANCE) {
    recommendations.push('Consider request batching to reduce processing time variance');
  }
  if (averageMs > SLOW_AVERAGE_MS) {
    recommendations.push('Consider increasing parallelism or optimizing request processing');
  }
  if (successRate < MIN_SUCCESS_RATE) {
    recommendations.push('Investigate and fix processing failures');
  }
  recommendations.push(...bottlenecks.map(b => `Address bottleneck: ${b}`));

  let maxParallelism = Math.max(1, cores);
  let batchSize = 5;
  if (averageMs > SLOW_AVERAGE_MS) maxParallelism = Math.max(1, maxParallelism - 1);
  if (timeVariance > HIGH_VARIANCE) batchSize = Math.max(1, batchSize - 1);

  let improvement = 0;
  if (averageMs > SLOW_AVERAGE_MS) improvement += 0.2;
  if (successRate < MIN_SUCCESS_RATE) improvement += 0.1;

  return {
    recommendedStrategy: {
      maxParallelism,
      batchSize,
      priorityLevel: 'normal',
      estimatedDurationMs: 5 * 60 * 1000,
    },
    recommendations,
    bottlenecks,
    expectedImprovement: Math.min(improvement, 0.5),
  };
}
