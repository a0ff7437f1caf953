export interface CapabilityProfile {
  readonly supportedLanguages: ReadonlySet<string>;
  readonly supportedTasks: ReadonlySet<string>;
  /** 1..5 */
  readonly maxComplexity: number;
  readonly maxTokens: number;
  readonly costPerToken: number;
}

/** Plain-data form accepted at registration (arrays from JSON, or sets). */
export interface CapabilityProfileInput {
  supportedLanguages: Iterable<string>;
  supportedTasks: Iterable<string>;
  maxComplexity: number;
  maxTokens: number;
  costPerToken: number;
}

export interface PerformanceMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalProcessingTimeMs: number;
  averageResponseTimeMs: number;
  successRate: number;
  errorRate: number;
  totalTokens: number;
  averageTokensPerRequest: number;
  totalCost: number;
  averageCostPerToken: number;
}

export interface OutcomeSample {
  durationMs: number;
  success: boolean;
  tokensUsed: number;
  cost: number;
}

export type PostProcessingType = 'formatting' | 'validation' | 'enhancement';

export interface PostProcessingOption {
  type: PostProcessingType;
  parameters: Record<string, string>;
}

export interface PostProcessingResult {
  type: PostProcessingType;
  success: boolean;
  errorMessage?: string;
  processingTimeMs: number;
}

export interface CompletionRequest {
  input: string;
  requiredLanguages: string[];
  taskType: string;
  complexityLevel: number;
  maxTokens: number;
  temperature: number;
  postProcessing: PostProcessingOption[];
  metadata?: Record<string, string>;
}

export interface CompletionResponse {
  content: string;
  success: boolean;
  errorMessage?: string;
  modelUsed: string;
  processingTimeMs: number;
  tokensUsed: number;
  cost: number;
  fallbackUsed: boolean;
  attempts: number;
  postProcessingResults: PostProcessingResult[];
}

export type RuleCondition =
  | { kind: 'min-complexity'; level: number }
  | { kind: 'budget-long-output'; minMaxTokens: number; maxCostPerToken: number }
  | { kind: 'always' };

export interface SelectionRule {
  name: string;
  /** Lower value takes precedence. */
  priority: number;
  condition: RuleCondition;
  isDynamic: boolean;
  /** Epoch milliseconds. */
  lastUpdated: number;
  /** Recommendation text that produced a dynamic rule. */
  origin?: string;
}

export interface ScoreBreakdown {
  capabilityMatch: number;
  performanceScore: number;
  costEfficiency: number;
  reliability: number;
  total: number;
}

export interface RankedCandidate {
  providerName: string;
  score: ScoreBreakdown;
  matchedRules: string[];
}

export interface ProviderOutput {
  content: string;
  tokensUsed: number;
  cost: number;
}

/** An interchangeable backend. Rejects on failure. */
export interface Provider {
  readonly name: string;
  execute(request: CompletionRequest, signal?: AbortSignal): Promise<ProviderOutput>;
}
