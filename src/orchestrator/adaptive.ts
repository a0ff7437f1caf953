import type { MetricsStore } from '../router/metrics-store.js';
import type { SelectionRuleSet } from '../router/rules.js';
import type {
  Bottleneck,
  OptimizationRecommendation,
  OptimizationResult,
  PerformancePattern,
} from './types.js';
import { errorMessage } from '../router/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('adaptive');

export const BOTTLENECK_THRESHOLDS = {
  maxAverageResponseTimeMs: 5000,
  minSuccessRate: 0.9,
  maxAverageCostPerToken: 0.01,
} as const;

const SLOW_PROVIDER_MS = 3000;
const EXPENSIVE_COST_PER_TOKEN = 0.005;

export function analyzePerformancePatterns(metrics: MetricsStore): PerformancePattern[] {
  return metrics.snapshot().map(([providerName, m]) => ({
    providerName,
    averageResponseTimeMs: m.averageResponseTimeMs,
    successRate: m.successRate,
    averageCostPerToken: m.averageCostPerToken,
    requestVolume: m.totalRequests,
  }));
}

export function identifyBottlenecks(patterns: PerformancePattern[]): Bottleneck[] {
  const bottlenecks: Bottleneck[] = [];

  for (const p of patterns) {
    if (p.averageResponseTimeMs > BOTTLENECK_THRESHOLDS.maxAverageResponseTimeMs) {
      bottlenecks.push({
        providerName: p.providerName,
        kind: 'latency',
        value: p.averageResponseTimeMs,
        description: `High response time for ${p.providerName}: ${Math.round(p.averageResponseTimeMs)}ms`,
      });
    }
    if (p.successRate < BOTTLENECK_THRESHOLDS.minSuccessRate) {
      bottlenecks.push({
        providerName: p.providerName,
        kind: 'success-rate',
        value: p.successRate,
        description: `Low success rate for ${p.providerName}: ${(p.successRate * 100).toFixed(1)}%`,
      });
    }
    if (p.averageCostPerToken > BOTTLENECK_THRESHOLDS.maxAverageCostPerToken) {
      bottlenecks.push({
        providerName: p.providerName,
        kind: 'cost',
        value: p.averageCostPerToken,
        description: `High cost for ${p.providerName}: $${p.averageCostPerToken.toFixed(4)} per token`,
      });
    }
  }

  return bottlenecks;
}

export function generateRecommendations(
  patterns: PerformancePattern[],
  bottlenecks: Bottleneck[],
): OptimizationRecommendation[] {
  const recommendations = bottlenecks.map((b): OptimizationRecommendation => ({
    type: 'performance',
    priority: 'high',
    description: b.description,
    estimatedImpact: 'medium',
  }));

  const slow = patterns.filter(p => p.averageResponseTimeMs > SLOW_PROVIDER_MS);
  if (slow.length > 0) {
    recommendations.push({
      type: 'performance',
      priority: 'medium',
      description: `Consider caching for slow providers: ${slow.map(p => p.providerName).join(', ')}`,
      estimatedImpact: 'high',
    });
  }

  const expensive = patterns.filter(p => p.averageCostPerToken > EXPENSIVE_COST_PER_TOKEN);
  if (expensive.length > 0) {
    recommendations.push({
      type: 'cost',
      priority: 'medium',
      description: `Consider alternative providers for cost optimization: ${expensive.map(p => p.providerName).join(', ')}`,
      estimatedImpact: 'high',
    });
  }

  return recommendations;
}

/**
 * Caller-triggered feedback loop: reads the metrics store, derives
 * bottlenecks and recommendations, and refreshes the dynamic selection rules.
 */
export class AdaptiveRuleEngine {
  private readonly metrics: MetricsStore;
  private readonly rules: SelectionRuleSet;
  private sequence = 0;

  constructor(metrics: MetricsStore, rules: SelectionRuleSet) {
    this.metrics = metrics;
    this.rules = rules;
  }

  analyzeAndOptimize(now = Date.now()): OptimizationResult {
    log.info('Analyzing provider performance');

    try {
      const performanceAnalysis = analyzePerformancePatterns(this.metrics);
      const bottlenecks = identifyBottlenecks(performanceAnalysis);
      const recommendations = generateRecommendations(performanceAnalysis, bottlenecks);
      const { added, pruned } = this.updateRules(recommendations, now);

      log.info(
        `Analysis complete: ${bottlenecks.length} bottlenecks, ${recommendations.length} recommendations, ` +
        `${added.length} rules added, ${pruned} pruned`,
      );

      return {
        success: true,
        performanceAnalysis,
        bottlenecks,
        recommendations,
        rulesAdded: added,
        rulesPruned: pruned,
      };
    } catch (err) {
      log.error('Error in performance analysis', err);
      return {
        success: false,
        errorMessage: errorMessage(err),
        performanceAnalysis: [],
        bottlenecks: [],
        recommendations: [],
        rulesAdded: [],
        rulesPruned: 0,
      };
    }
  }

  /**
   * Prunes expired dynamic rules, then installs one per high-priority
   * performance recommendation. The installed condition is `always`: a slot
   * for a future heuristic, not a filter.
   */
  updateRules(
    recommendations: OptimizationRecommendation[],
    now = Date.now(),
  ): { added: string[]; pruned: number } {
    const pruned = this.rules.pruneStale(now);
    const added: string[] = [];

    for (const rec of recommendations) {
      if (rec.type !== 'performance' || rec.priority !== 'high') continue;

      this.sequence++;
      const name = `performance-optimization-${now}-${this.sequence}`;
      this.rules.add({
        name,
        priority: 1,
        condition: { kind: 'always' },
        isDynamic: true,
        lastUpdated: now,
        origin: rec.description,
      });
      added.push(name);
    }

    return { added, pruned };
  }
}
