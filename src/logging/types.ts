export interface ProviderStats {
  count: number;
  successRate: number;
  costUsd: number;
  tokens: number;
  avgLatencyMs: number;
  percentOfRequests: number;
}

export interface AggregateStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  totalCostUsd: number;
  totalTokens: number;
  avgLatencyMs: number;
  providerDistribution: Record<string, ProviderStats>;
  /** Items recorded by the batch scheduler; also counted under their provider. */
  batchItems: number;
}
