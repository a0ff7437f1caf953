import type {
  CapabilityProfile,
  CompletionRequest,
  PerformanceMetrics,
  RankedCandidate,
  ScoreBreakdown,
} from './types.js';
import type { CapabilityRegistry } from './capability-registry.js';
import type { MetricsStore } from './metrics-store.js';
import type { SelectionRuleSet } from './rules.js';
import { NoCandidateAvailableError } from './errors.js';

const WEIGHTS = {
  capability: 0.4,
  performance: 0.3,
  cost: 0.2,
  reliability: 0.1,
} as const;

// Score for providers with no recorded requests.
const NEUTRAL_SCORE = 0.5;

// Latency at which the response-time component bottoms out.
const LATENCY_CEILING_MS = 10_000;

export function capabilityMatch(profile: CapabilityProfile, request: CompletionRequest): number {
  const languageMatch = request.requiredLanguages.length === 0
    || request.requiredLanguages.some(lang => profile.supportedLanguages.has(lang));
  const taskMatch = profile.supportedTasks.has(request.taskType);
  const complexityMatch = profile.maxComplexity >= request.complexityLevel;

  return ((languageMatch ? 1 : 0) + (taskMatch ? 1 : 0) + (complexityMatch ? 1 : 0)) / 3;
}

export function performanceScore(metrics: PerformanceMetrics): number {
  if (metrics.totalRequests === 0) return NEUTRAL_SCORE;
  const responseTimeScore = Math.max(0, 1 - metrics.averageResponseTimeMs / LATENCY_CEILING_MS);
  return (responseTimeScore + metrics.successRate) / 2;
}

export function costEfficiency(metrics: PerformanceMetrics): number {
  if (metrics.totalRequests === 0) return NEUTRAL_SCORE;
  return Math.min(1, 1 / (metrics.averageCostPerToken + 0.001));
}

export function reliability(metrics: PerformanceMetrics): number {
  if (metrics.totalRequests === 0) return NEUTRAL_SCORE;
  const uptimeScore = Math.max(0, 1 - metrics.errorRate);
  return (metrics.successRate + uptimeScore) / 2;
}

export function scoreProvider(
  profile: CapabilityProfile,
  metrics: PerformanceMetrics,
  request: CompletionRequest,
): ScoreBreakdown {
  const breakdown = {
    capabilityMatch: capabilityMatch(profile, request),
    performanceScore: performanceScore(metrics),
    costEfficiency: costEfficiency(metrics),
    reliability: reliability(metrics),
  };

  return {
    ...breakdown,
    total:
      WEIGHTS.capability * breakdown.capabilityMatch +
      WEIGHTS.performance * breakdown.performanceScore +
      WEIGHTS.cost * breakdown.costEfficiency +
      WEIGHTS.reliability * breakdown.reliability,
  };
}

/**
 * Scores every registered provider not in `excluded`, best first. Equal
 * scores keep registration order. Matching rules are reported per candidate
 * and do not change the score.
 */
export function rankCandidates(
  request: CompletionRequest,
  registry: CapabilityRegistry,
  metrics: MetricsStore,
  excluded: ReadonlySet<string> = new Set(),
  rules?: SelectionRuleSet,
): RankedCandidate[] {
  const candidates: RankedCandidate[] = [];

  for (const [providerName, profile] of registry.entries()) {
    if (excluded.has(providerName)) continue;
    candidates.push({
      providerName,
      score: scoreProvider(profile, metrics.get(providerName), request),
      matchedRules: rules ? rules.matching(request, profile) : [],
    });
  }

  // Array.prototype.sort is stable, so ties stay in registration order.
  return candidates.sort((a, b) => b.score.total - a.score.total);
}

export function selectOptimal(
  request: CompletionRequest,
  registry: CapabilityRegistry,
  metrics: MetricsStore,
  excluded: ReadonlySet<string> = new Set(),
  rules?: SelectionRuleSet,
): string {
  const [best] = rankCandidates(request, registry, metrics, excluded, rules);
  if (!best) {
    throw new NoCandidateAvailableError(excluded);
  }
  return best.providerName;
}
