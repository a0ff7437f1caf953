import type { CompletionRequest, CompletionResponse } from '../router/types.js';

export type PriorityLevel = 'low' | 'normal' | 'high';

export type ResourceType = 'cpu' | 'memory' | 'storage';

/** Utilization percentages, 0..100. */
export interface ResourceSnapshot {
  cpuUtilization: number;
  memoryUtilization: number;
  diskUtilization: number;
}

export interface ResourceLimits {
  maxByResourceType: Partial<Record<ResourceType, number>>;
}

export interface ResourceMonitor {
  snapshot(): Promise<ResourceSnapshot>;
}

export interface ResourceManager {
  limits(): Promise<ResourceLimits>;
}

export interface ResourceAllocation {
  maxCpuPercentage: number;
  maxMemoryBytes: number;
  maxConcurrentRequests: number;
  priorityLevel: PriorityLevel;
}

export interface ProcessingStrategy {
  readonly maxParallelism: number;
  readonly batchSize: number;
  readonly processingOrder: readonly CompletionRequest[];
  readonly resourceAllocation: Readonly<ResourceAllocation>;
  readonly estimatedDurationMs: number;
  readonly priorityLevel: PriorityLevel;
}

export interface RequestAnalysis {
  totalRequests: number;
  averageInputLength: number;
  maxInputLength: number;
  minInputLength: number;
  requestTypes: Record<string, number>;
  complexityScore: number;
}

export type ItemProcessor = (
  request: CompletionRequest,
  signal: AbortSignal | undefined,
) => Promise<CompletionResponse>;

export interface ProcessingRecord {
  key: string;
  requestType: string;
  processingTimeMs: number;
  responseSize: number;
  success: boolean;
  /** Epoch milliseconds. */
  timestamp: number;
}

export type TrendDirection = 'improving' | 'degrading';

export interface ProcessingTrend {
  metric: string;
  trend: TrendDirection;
  changePercentage: number;
}

export interface ProcessingPerformance {
  totalRequestsProcessed: number;
  averageProcessingTimeMs: number;
  averageResponseSize: number;
  successRate: number;
  trends: ProcessingTrend[];
}

export interface ProcessingOptimization {
  recommendedStrategy: Pick<ProcessingStrategy, 'maxParallelism' | 'batchSize' | 'priorityLevel' | 'estimatedDurationMs'>;
  recommendations: string[];
  bottlenecks: string[];
  expectedImprovement: number;
}
