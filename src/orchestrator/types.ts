export type ExtractionMethod = 'content' | 'processing-time' | 'model' | 'static';

export interface WorkflowPlaceholder {
  name: string;
  sourceStep: string;
  extractionMethod: ExtractionMethod;
  staticValue?: string;
}

export interface WorkflowStep {
  name: string;
  description?: string;
  isCritical: boolean;
  taskType: string;
  complexityLevel: number;
  requiredLanguages?: string[];
  maxTokens?: number;
  temperature?: number;
  inputTemplate: string;
  placeholders: WorkflowPlaceholder[];
}

export interface Workflow {
  name: string;
  steps: WorkflowStep[];
}

export interface StepResult {
  stepName: string;
  success: boolean;
  content: string;
  processingTimeMs: number;
  modelUsed: string;
  errorMessage?: string;
  cost: number;
}

export type WorkflowContext = Map<string, StepResult>;

export type WorkflowState =
  | { status: 'pending' }
  | { status: 'running'; stepIndex: number }
  | { status: 'completed' }
  | { status: 'aborted'; failedStep: string };

export interface WorkflowResult {
  workflowName: string;
  success: boolean;
  state: WorkflowState;
  stepResults: StepResult[];
  context: WorkflowContext;
  totalCost: number;
  totalProcessingTimeMs: number;
}

export type OptimizationType = 'performance' | 'cost';
export type OptimizationPriority = 'low' | 'medium' | 'high';
export type BottleneckKind = 'latency' | 'success-rate' | 'cost';

export interface PerformancePattern {
  providerName: string;
  averageResponseTimeMs: number;
  successRate: number;
  averageCostPerToken: number;
  requestVolume: number;
}

export interface Bottleneck {
  providerName: string;
  kind: BottleneckKind;
  value: number;
  description: string;
}

export interface OptimizationRecommendation {
  type: OptimizationType;
  priority: OptimizationPriority;
  description: string;
  estimatedImpact: 'low' | 'medium' | 'high';
}

export interface OptimizationResult {
  success: boolean;
  errorMessage?: string;
  performanceAnalysis: PerformancePattern[];
  bottlenecks: Bottleneck[];
  recommendations: OptimizationRecommendation[];
  rulesAdded: string[];
  rulesPruned: number;
}
