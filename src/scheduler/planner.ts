import os from 'node:os';
import type { CompletionRequest } from '../router/types.js';
import type {
  PriorityLevel,
  ProcessingStrategy,
  RequestAnalysis,
  ResourceAllocation,
  ResourceLimits,
  ResourceSnapshot,
} from './types.js';

export const MAX_BATCH_SIZE = 10;
const HIGH_CPU_PERCENT = 80;
const BUSY_CPU_PERCENT = 70;
const HIGH_COMPLEXITY = 0.7;
const DEFAULT_ITEM_MS = 1000;
const DEFAULT_MEMORY_BYTES = 1024 * 1024 * 1024;

export function hostParallelism(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Blend of average input length (saturating at 1000 chars), largest token
 * budget (saturating at 4000) and the share of requests carrying metadata.
 */
export function complexityScore(requests: readonly CompletionRequest[]): number {
  if (requests.length === 0) return 0;

  const avgLength = requests.reduce((sum, r) => sum + r.input.length, 0) / requests.length;
  const maxTokens = Math.max(...requests.map(r => r.maxTokens));
  const withMetadata = requests.filter(r => r.metadata && Object.keys(r.metadata).length > 0).length;

  const lengthScore = Math.min(avgLength / 1000, 1);
  const tokenScore = Math.min(maxTokens / 4000, 1);
  const metadataScore = withMetadata / requests.length;

  return (lengthScore + tokenScore + metadataScore) / 3;
}

export function analyzeRequests(requests: readonly CompletionRequest[]): RequestAnalysis {
  const lengths = requests.map(r => r.input.length);
  const requestTypes: Record<string, number> = {};
  for (const r of requests) {
    const type = r.metadata?.['type'] ?? 'unknown';
    requestTypes[type] = (requestTypes[type] ?? 0) + 1;
  }

  return {
    totalRequests: requests.length,
    averageInputLength: lengths.length > 0 ? lengths.reduce((a, b) => a + b, 0) / lengths.length : 0,
    maxInputLength: lengths.length > 0 ? Math.max(...lengths) : 0,
    minInputLength: lengths.length > 0 ? Math.min(...lengths) : 0,
    requestTypes,
    complexityScore: complexityScore(requests),
  };
}

export function priorityFor(score: number): PriorityLevel {
  if (score > 0.8) return 'high';
  if (score > 0.5) return 'normal';
  return 'low';
}

export function optimalParallelism(
  analysis: RequestAnalysis,
  snapshot: ResourceSnapshot,
  cores: number,
): number {
  let parallelism = Math.max(1, cores);

  // Low CPU leaves it as is: there is no meaningful ceiling to grow towards.
  if (snapshot.cpuUtilization > HIGH_CPU_PERCENT) {
    parallelism = Math.max(1, Math.floor(parallelism / 2));
  }

  if (analysis.complexityScore > HIGH_COMPLEXITY) {
    parallelism = Math.max(1, Math.floor(parallelism / 2));
  }

  return Math.max(1, parallelism);
}

export function optimalBatchSize(totalRequests: number, parallelism: number): number {
  return Math.min(MAX_BATCH_SIZE, Math.max(1, Math.floor(totalRequests / parallelism)));
}

/** Shortest input first; equal lengths keep submission order. */
export function processingOrder(requests: readonly CompletionRequest[]): CompletionRequest[] {
  return [...requests].sort((a, b) => a.input.length - b.input.length);
}

export function resourceAllocation(analysis: RequestAnalysis, limits: ResourceLimits): ResourceAllocation {
  const cpuLimit = limits.maxByResourceType.cpu;
  return {
    maxCpuPercentage: Math.min(HIGH_CPU_PERCENT, cpuLimit !== undefined ? cpuLimit / 100 : 50),
    maxMemoryBytes: limits.maxByResourceType.memory ?? DEFAULT_MEMORY_BYTES,
    maxConcurrentRequests: Math.min(MAX_BATCH_SIZE, analysis.totalRequests),
    priorityLevel: priorityFor(analysis.complexityScore),
  };
}

export function estimateDurationMs(totalRequests: number, parallelism: number, snapshot: ResourceSnapshot): number {
  const estimate = (totalRequests * DEFAULT_ITEM_MS) / parallelism;
  return snapshot.cpuUtilization > BUSY_CPU_PERCENT ? estimate * 1.5 : estimate;
}

export function planStrategy(
  requests: readonly CompletionRequest[],
  snapshot: ResourceSnapshot,
  limits: ResourceLimits = { maxByResourceType: {} },
  cores = hostParallelism(),
): ProcessingStrategy {
  const analysis = analyzeRequests(requests);
  const maxParallelism = optimalParallelism(analysis, snapshot, cores);

  return Object.freeze({
    maxParallelism,
    batchSize: optimalBatchSize(analysis.totalRequests, maxParallelism),
    processingOrder: Object.freeze(processingOrder(requests)),
    resourceAllocation: Object.freeze(resourceAllocation(analysis, limits)),
    estimatedDurationMs: estimateDurationMs(analysis.totalRequests, maxParallelism, snapshot),
    priorityLevel: priorityFor(analysis.complexityScore),
  });
}

export function defaultStrategy(
  requests: readonly CompletionRequest[] = [],
  cores = hostParallelism(),
): ProcessingStrategy {
  return Object.freeze({
    maxParallelism: Math.max(1, cores),
    batchSize: 5,
    processingOrder: Object.freeze([...requests]),
    resourceAllocation: Object.freeze({
      maxCpuPercentage: 50,
      maxMemoryBytes: DEFAULT_MEMORY_BYTES,
      maxConcurrentRequests: Math.min(MAX_BATCH_SIZE, requests.length),
      priorityLevel: 'normal' as const,
    }),
    estimatedDurationMs: 5 * 60 * 1000,
    priorityLevel: 'normal' as const,
  });
}
