import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Conductor } from '../conductor.js';
import type { CompletionRequest } from '../router/types.js';
import type { Workflow } from '../orchestrator/types.js';
import { formatStatsTable } from '../logging/stats.js';
import { errorMessage } from '../router/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('tools');

const postProcessingSchema = z.object({
  type: z.enum(['formatting', 'validation', 'enhancement']),
  parameters: z.record(z.string()).optional().default({}),
});

const requestShape = {
  input: z.string().min(1).describe('Prompt text sent to the selected provider'),
  requiredLanguages: z.array(z.string()).optional().default([])
    .describe('Languages the provider must support; empty means any'),
  taskType: z.string().min(1).describe('Task category, e.g. "code-generation"'),
  complexityLevel: z.number().int().min(1).max(5).optional().default(3)
    .describe('Required complexity, 1..5'),
  maxTokens: z.number().int().positive().optional().default(4096)
    .describe('Maximum tokens to generate'),
  temperature: z.number().min(0).max(1).optional().default(0.7)
    .describe('Sampling temperature'),
  postProcessing: z.array(postProcessingSchema).optional().default([])
    .describe('Post-processing passes applied in order'),
  metadata: z.record(z.string()).optional(),
};

const requestSchema = z.object(requestShape);

const placeholderSchema = z.object({
  name: z.string().min(1),
  sourceStep: z.string(),
  extractionMethod: z.enum(['content', 'processing-time', 'model', 'static']),
  staticValue: z.string().optional(),
});

const stepSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  isCritical: z.boolean().optional().default(false),
  taskType: z.string().min(1),
  complexityLevel: z.number().int().min(1).max(5).optional().default(3),
  requiredLanguages: z.array(z.string()).optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(1).optional(),
  inputTemplate: z.string(),
  placeholders: z.array(placeholderSchema).optional().default([]),
});

type RequestArgs = z.infer<typeof requestSchema>;

function toRequest(args: RequestArgs): CompletionRequest {
  return {
    input: args.input,
    requiredLanguages: args.requiredLanguages,
    taskType: args.taskType,
    complexityLevel: args.complexityLevel,
    maxTokens: args.maxTokens,
    temperature: args.temperature,
    postProcessing: args.postProcessing,
    ...(args.metadata ? { metadata: args.metadata } : {}),
  };
}

function jsonResult(value: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorResult(tool: string, err: unknown) {
  log.error(`${tool} failed`, err);
  return {
    content: [{ type: 'text' as const, text: `${tool} error: ${errorMessage(err)}` }],
    isError: true,
  };
}

export type MetricsFormat = 'json' | 'table';

/** Body of the get_metrics tool. */
export function metricsResult(
  conductor: Pick<Conductor, 'stats' | 'metrics' | 'rules'>,
  format: MetricsFormat,
) {
  try {
    const stats = conductor.stats();
    if (format === 'table') {
      return { content: [{ type: 'text' as const, text: formatStatsTable(stats) }] };
    }
    return jsonResult({
      stats,
      metrics: Object.fromEntries(conductor.metrics.snapshot()),
      rules: conductor.rules.list(),
    });
  } catch (err) {
    return errorResult('get_metrics', err);
  }
}

export function registerTools(server: McpServer, conductor: Conductor): void {
  // Tool 1: execute_request - select, call, fall back once, post-process
  server.tool(
    'execute_request',
    'Send a prompt to the best-scoring provider for its capability needs, falling back to the next best once on failure.',
    requestShape,
    async (args) => {
      try {
        const response = await conductor.execute(toRequest(args));
        return jsonResult(response);
      } catch (err) {
        return errorResult('execute_request', err);
      }
    },
  );

  // Tool 2: explain_selection - diagnostic, no provider call
  server.tool(
    'explain_selection',
    'Rank providers for a request and show each score component, without calling any provider.',
    requestShape,
    async (args) => {
      try {
        return jsonResult({ candidates: conductor.explain(toRequest(args)) });
      } catch (err) {
        return errorResult('explain_selection', err);
      }
    },
  );

  // Tool 3: run_workflow - sequential steps with placeholders
  server.tool(
    'run_workflow',
    'Run a multi-step workflow. Step inputs may reference earlier step results through {name} placeholders; a failed critical step aborts the run.',
    {
      name: z.string().min(1).describe('Workflow name'),
      steps: z.array(stepSchema).min(1).describe('Steps in execution order'),
    },
    async ({ name, steps }) => {
      try {
        const workflow: Workflow = { name, steps };
        const result = await conductor.runWorkflow(workflow);
        return jsonResult({ ...result, context: Object.fromEntries(result.context) });
      } catch (err) {
        return errorResult('run_workflow', err);
      }
    },
  );

  // Tool 4: run_batch - resource-aware parallel processing
  server.tool(
    'run_batch',
    'Process a batch of requests in parallel, sized to host load and request complexity. Item failures do not affect siblings.',
    {
      requests: z.array(requestSchema).min(1).describe('Requests to process'),
    },
    async ({ requests }) => {
      try {
        const { strategy, responses } = await conductor.runBatch(requests.map(toRequest));
        return jsonResult({
          strategy: {
            maxParallelism: strategy.maxParallelism,
            batchSize: strategy.batchSize,
            priorityLevel: strategy.priorityLevel,
            estimatedDurationMs: strategy.estimatedDurationMs,
          },
          responses,
        });
      } catch (err) {
        return errorResult('run_batch', err);
      }
    },
  );

  // Tool 5: analyze_performance - adaptive rule refresh
  server.tool(
    'analyze_performance',
    'Analyze recorded provider performance, report bottlenecks and recommendations, and refresh dynamic selection rules.',
    {
      includeBatch: z.boolean().optional().default(false)
        .describe('Also report batch processing performance and tuning advice'),
    },
    async ({ includeBatch }) => {
      try {
        const analysis = conductor.analyzePerformance();
        if (!includeBatch) {
          return jsonResult(analysis);
        }
        return jsonResult({
          ...analysis,
          batch: {
            performance: conductor.scheduler.getPerformance(),
            optimization: conductor.scheduler.optimize(),
          },
        });
      } catch (err) {
        return errorResult('analyze_performance', err);
      }
    },
  );

  // Tool 6: get_metrics - per-provider counters
  server.tool(
    'get_metrics',
    'Get recorded performance metrics per provider, either as JSON or as a formatted table.',
    {
      format: z.enum(['json', 'table']).optional().default('json')
        .describe('Output format'),
    },
    async ({ format }) => metricsResult(conductor, format),
  );

  // Tool 7: update_capabilities - replace or add a provider profile
  server.tool(
    'update_capabilities',
    'Replace a provider\'s capability profile, or add a new provider bound to an upstream model.',
    {
      name: z.string().min(1).describe('Provider name'),
      supportedLanguages: z.array(z.string()),
      supportedTasks: z.array(z.string()),
      maxComplexity: z.number().int().min(1).max(5),
      maxTokens: z.number().int().positive(),
      costPerToken: z.number().nonnegative(),
      provider: z.enum(['anthropic', 'minimax']).optional()
        .describe('Upstream API, required for a new provider'),
      modelId: z.string().min(1).optional()
        .describe('Upstream model id, required for a new provider'),
    },
    async ({ name, provider, modelId, ...profile }) => {
      try {
        const binding = provider && modelId ? { provider, modelId } : undefined;
        const updated = conductor.updateCapabilities(name, profile, binding);
        return jsonResult({
          name,
          supportedLanguages: [...updated.supportedLanguages],
          supportedTasks: [...updated.supportedTasks],
          maxComplexity: updated.maxComplexity,
          maxTokens: updated.maxTokens,
          costPerToken: updated.costPerToken,
        });
      } catch (err) {
        return errorResult('update_capabilities', err);
      }
    },
  );
}
