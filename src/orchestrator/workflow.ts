import { performance } from 'node:perf_hooks';
import type { CompletionRequest } from '../router/types.js';
import type { ExecutionCoordinator } from './executor.js';
import type {
  StepResult,
  Workflow,
  WorkflowContext,
  WorkflowPlaceholder,
  WorkflowResult,
  WorkflowState,
  WorkflowStep,
} from './types.js';
import { errorMessage } from '../router/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workflow');

const DEFAULT_STEP_MAX_TOKENS = 4096;
const DEFAULT_STEP_TEMPERATURE = 0.7;

export type CompletionExecutor = Pick<ExecutionCoordinator, 'executeWithFallback'>;

function extractValue(placeholder: WorkflowPlaceholder, source: StepResult): string {
  switch (placeholder.extractionMethod) {
    case 'content':
      return source.content;
    case 'processing-time':
      return String(source.processingTimeMs);
    case 'model':
      return source.modelUsed;
    case 'static':
      return placeholder.staticValue ?? '';
  }
}

/**
 * Substitutes `{name}` tokens. Placeholders whose source step has no result
 * in the context stay in the text as written.
 */
export function resolveStepInput(step: WorkflowStep, context: WorkflowContext): string {
  let input = step.inputTemplate;

  for (const placeholder of step.placeholders) {
    let value: string;
    if (placeholder.extractionMethod === 'static') {
      value = placeholder.staticValue ?? '';
    } else {
      const source = context.get(placeholder.sourceStep);
      if (!source) {
        log.debug(`Placeholder {${placeholder.name}} unresolved: no result for step "${placeholder.sourceStep}"`);
        continue;
      }
      value = extractValue(placeholder, source);
    }
    input = input.split(`{${placeholder.name}}`).join(value);
  }

  return input;
}

export function buildStepRequest(step: WorkflowStep, input: string): CompletionRequest {
  return {
    input,
    requiredLanguages: step.requiredLanguages ?? [],
    taskType: step.taskType,
    complexityLevel: step.complexityLevel,
    maxTokens: step.maxTokens ?? DEFAULT_STEP_MAX_TOKENS,
    temperature: step.temperature ?? DEFAULT_STEP_TEMPERATURE,
    postProcessing: [],
  };
}

export class WorkflowEngine {
  private readonly executor: CompletionExecutor;

  constructor(executor: CompletionExecutor) {
    this.executor = executor;
  }

  async run(workflow: Workflow, signal?: AbortSignal): Promise<WorkflowResult> {
    log.info(`Executing workflow "${workflow.name}" with ${workflow.steps.length} steps`);

    const start = performance.now();
    const results: StepResult[] = [];
    const context: WorkflowContext = new Map();
    let state: WorkflowState = { status: 'pending' };

    for (const [stepIndex, step] of workflow.steps.entries()) {
      state = { status: 'running', stepIndex };
      log.debug(`Executing workflow step ${stepIndex + 1}/${workflow.steps.length}: ${step.name}`);

      const result = await this.executeStep(step, context, signal);
      results.push(result);
      context.set(step.name, result);

      if (!result.success && step.isCritical) {
        log.warn(`Critical workflow step failed: ${step.name}`);
        state = { status: 'aborted', failedStep: step.name };
        break;
      }
    }

    if (state.status !== 'aborted') {
      state = { status: 'completed' };
    }

    // results[i] was produced by steps[i]
    const success = results.every((r, i) => r.success || !workflow.steps[i]?.isCritical);

    return {
      workflowName: workflow.name,
      success,
      state,
      stepResults: results,
      context,
      totalCost: results.reduce((sum, r) => sum + r.cost, 0),
      totalProcessingTimeMs: Math.round(performance.now() - start),
    };
  }

  private async executeStep(
    step: WorkflowStep,
    context: WorkflowContext,
    signal: AbortSignal | undefined,
  ): Promise<StepResult> {
    const start = performance.now();

    try {
      const request = buildStepRequest(step, resolveStepInput(step, context));
      const response = await this.executor.executeWithFallback(request, signal);

      return {
        stepName: step.name,
        success: response.success,
        content: response.content,
        processingTimeMs: Math.round(performance.now() - start),
        modelUsed: response.modelUsed,
        errorMessage: response.errorMessage,
        cost: response.cost,
      };
    } catch (err) {
      log.error(`Error executing workflow step: ${step.name}`, err);
      return {
        stepName: step.name,
        success: false,
        content: '',
        processingTimeMs: Math.round(performance.now() - start),
        modelUsed: '',
        errorMessage: errorMessage(err),
        cost: 0,
      };
    }
  }
}
