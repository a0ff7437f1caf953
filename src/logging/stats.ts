import type { AggregateStats } from './types.js';
import type { PerformanceMetrics } from '../router/types.js';
import { BATCH_KEY_PREFIX } from '../scheduler/parallel.js';

/**
 * Totals across providers. Batch entries are counted separately since the
 * same calls are already recorded under the provider that served them.
 */
export function computeStats(snapshot: Array<[string, PerformanceMetrics]>): AggregateStats {
  const providers = snapshot.filter(([key]) => !key.startsWith(BATCH_KEY_PREFIX));
  const batchItems = snapshot
    .filter(([key]) => key.startsWith(BATCH_KEY_PREFIX))
    .reduce((sum, [, m]) => sum + m.totalRequests, 0);

  let totalRequests = 0;
  let successfulRequests = 0;
  let totalCostUsd = 0;
  let totalTokens = 0;
  let totalTimeMs = 0;

  for (const [, m] of providers) {
    totalRequests += m.totalRequests;
    successfulRequests += m.successfulRequests;
    totalCostUsd += m.totalCost;
    totalTokens += m.totalTokens;
    totalTimeMs += m.totalProcessingTimeMs;
  }

  const providerDistribution: AggregateStats['providerDistribution'] = {};
  for (const [name, m] of providers) {
    providerDistribution[name] = {
      count: m.totalRequests,
      successRate: m.successRate,
      costUsd: m.totalCost,
      tokens: m.totalTokens,
      avgLatencyMs: Math.round(m.averageResponseTimeMs),
      percentOfRequests: totalRequests > 0 ? (m.totalRequests / totalRequests) * 100 : 0,
    };
  }

  return {
    totalRequests,
    successfulRequests,
    failedRequests: totalRequests - successfulRequests,
    successRate: totalRequests > 0 ? successfulRequests / totalRequests : 0,
    totalCostUsd,
    totalTokens,
    avgLatencyMs: totalRequests > 0 ? Math.round(totalTimeMs / totalRequests) : 0,
    providerDistribution,
    batchItems,
  };
}

export function formatStatsTable(stats: AggregateStats): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('=== Model Conductor - Provider Stats ===');
  lines.push('');
  lines.push(`Total requests:       ${stats.totalRequests.toLocaleString('en-US')}`);
  lines.push(`Success rate:         ${(stats.successRate * 100).toFixed(1)}%`);
  lines.push(`Total tokens:         ${stats.totalTokens.toLocaleString('en-US')}`);
  lines.push(`Total cost:           $${stats.totalCostUsd.toFixed(4)}`);
  lines.push('');
  lines.push('Provider Distribution:');

  for (const [name, data] of Object.entries(stats.providerDistribution)) {
    const pct = data.percentOfRequests.toFixed(1);
    const ok = (data.successRate * 100).toFixed(1);
    lines.push(
      `  ${name.padEnd(24)} ${String(data.count).padStart(6)} requests   ` +
      `${ok.padStart(5)}% ok   $${data.costUsd.toFixed(4).padStart(9)}   (${pct}%)`,
    );
  }

  lines.push('');
  lines.push(`Avg latency:          ${stats.avgLatencyMs.toLocaleString('en-US')}ms`);
  lines.push(`Batch items:          ${stats.batchItems.toLocaleString('en-US')}`);
  lines.push('');

  return lines.join('\n');
}
