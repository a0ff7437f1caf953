import { describe, it, expect } from 'vitest';
import { WorkflowEngine, buildStepRequest, resolveStepInput } from '../../../src/orchestrator/workflow.js';
import { ExecutionCoordinator } from '../../../src/orchestrator/executor.js';
import { CapabilityRegistry } from '../../../src/router/capability-registry.js';
import { MetricsStore } from '../../../src/router/metrics-store.js';
import type { StepResult, Workflow, WorkflowContext, WorkflowStep } from '../../../src/orchestrator/types.js';
import { FakeProvider, makeProfile } from '../fixtures.js';

function step(name: string, overrides: Partial<WorkflowStep> = {}): WorkflowStep {
  return {
    name,
    isCritical: false,
    taskType: 'code-generation',
    complexityLevel: 2,
    inputTemplate: `run ${name}`,
    placeholders: [],
    ...overrides,
  };
}

function echoEngine() {
  const provider = new FakeProvider('alpha', (request) => {
    if (request.input.includes('FAIL')) throw new Error('provider refused');
    return { content: `echo:${request.input}`, tokensUsed: 4, cost: 0.25 };
  });
  const coordinator = new ExecutionCoordinator({
    registry: new CapabilityRegistry([['alpha', makeProfile()]]),
    metrics: new MetricsStore(),
    providers: new Map([['alpha', provider]]),
    defaultProvider: 'alpha',
  });
  return { provider, engine: new WorkflowEngine(coordinator) };
}

describe('resolveStepInput', () => {
  const previous: StepResult = {
    stepName: 'draft',
    success: true,
    content: 'first draft',
    processingTimeMs: 120,
    modelUsed: 'alpha',
    cost: 0,
  };
  const context: WorkflowContext = new Map([['draft', previous]]);

  it('substitutes every extraction method', () => {
    const input = resolveStepInput(step('review', {
      inputTemplate: 'Review {text} ({ms}ms on {model}) as {role}; again: {text}',
      placeholders: [
        { name: 'text', sourceStep: 'draft', extractionMethod: 'content' },
        { name: 'ms', sourceStep: 'draft', extractionMethod: 'processing-time' },
        { name: 'model', sourceStep: 'draft', extractionMethod: 'model' },
        { name: 'role', sourceStep: '', extractionMethod: 'static', staticValue: 'editor' },
      ],
    }), context);

    expect(input).toBe('Review first draft (120ms on alpha) as editor; again: first draft');
  });

  it('leaves placeholders with no source result untouched', () => {
    const input = resolveStepInput(step('review', {
      inputTemplate: 'Compare {text} with {other}',
      placeholders: [
        { name: 'text', sourceStep: 'draft', extractionMethod: 'content' },
        { name: 'other', sourceStep: 'missing', extractionMethod: 'content' },
      ],
    }), context);

    expect(input).toBe('Compare first draft with {other}');
  });
});

describe('buildStepRequest', () => {
  it('fills defaults for optional step settings', () => {
    const request = buildStepRequest(step('plan'), 'hello');
    expect(request).toEqual({
      input: 'hello',
      requiredLanguages: [],
      taskType: 'code-generation',
      complexityLevel: 2,
      maxTokens: 4096,
      temperature: 0.7,
      postProcessing: [],
    });
  });
});

describe('WorkflowEngine', () => {
  it('aborts after a failed critical step and keeps earlier results', async () => {
    const { engine, provider } = echoEngine();
    const workflow: Workflow = {
      name: 'three-steps',
      steps: [
        step('one'),
        step('two', { isCritical: true, inputTemplate: 'FAIL here' }),
        step('three'),
      ],
    };

    const result = await engine.run(workflow);

    expect(result.stepResults).toHaveLength(2);
    expect(result.stepResults.map(r => r.success)).toEqual([true, false]);
    expect(result.state).toEqual({ status: 'aborted', failedStep: 'two' });
    expect(result.success).toBe(false);
    expect(provider.inputs).toEqual(['run one', 'FAIL here']);
    expect(result.stepResults[1]?.errorMessage).toBe('provider refused');
  });

  it('continues past a failed non-critical step', async () => {
    const { engine } = echoEngine();
    const result = await engine.run({
      name: 'tolerant',
      steps: [step('one', { inputTemplate: 'FAIL quietly' }), step('two')],
    });

    expect(result.stepResults).toHaveLength(2);
    expect(result.state).toEqual({ status: 'completed' });
    expect(result.success).toBe(true);
  });

  it('threads earlier results into later steps', async () => {
    const { engine, provider } = echoEngine();
    const result = await engine.run({
      name: 'chain',
      steps: [
        step('outline', { inputTemplate: 'Outline' }),
        step('expand', {
          inputTemplate: 'Expand {outline} using {model} in {tone}',
          placeholders: [
            { name: 'outline', sourceStep: 'outline', extractionMethod: 'content' },
            { name: 'model', sourceStep: 'outline', extractionMethod: 'model' },
            { name: 'tone', sourceStep: '', extractionMethod: 'static', staticValue: 'plain' },
          ],
        }),
      ],
    });

    expect(provider.inputs[1]).toBe('Expand echo:Outline using alpha in plain');
    expect(result.context.get('expand')?.content).toBe('echo:Expand echo:Outline using alpha in plain');
    expect(result.totalCost).toBe(0.5);
  });

  it('turns an executor exception into a failed step', async () => {
    const engine = new WorkflowEngine({
      executeWithFallback: async () => {
        throw new Error('executor crashed');
      },
    });

    const result = await engine.run({ name: 'broken', steps: [step('only', { isCritical: true })] });

    expect(result.stepResults).toEqual([
      expect.objectContaining({ stepName: 'only', success: false, errorMessage: 'executor crashed', cost: 0 }),
    ]);
    expect(result.state).toEqual({ status: 'aborted', failedStep: 'only' });
  });
});
