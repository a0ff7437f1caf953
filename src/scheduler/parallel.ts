import { performance } from 'node:perf_hooks';
import type { CompletionRequest, CompletionResponse } from '../router/types.js';
import type { MetricsStore } from '../router/metrics-store.js';
import type {
  ItemProcessor,
  ProcessingOptimization,
  ProcessingPerformance,
  ProcessingRecord,
  ProcessingStrategy,
  ResourceManager,
  ResourceMonitor,
} from './types.js';
import { defaultStrategy, hostParallelism, planStrategy } from './planner.js';
import { optimizeProcessing, summarizeProcessing } from './optimizer.js';
import { Semaphore } from './semaphore.js';
import { errorMessage } from '../router/errors.js';
import { hashPrompt } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('scheduler');

export const BATCH_KEY_PREFIX = 'batch:';

export function batchMetricsKey(request: CompletionRequest): string {
  return `${BATCH_KEY_PREFIX}${hashPrompt(request.input)}_${request.maxTokens}`;
}

export function partition<T>(items: readonly T[], size: number): T[][] {
  const groups: T[][] = [];
  const step = Math.max(1, Math.floor(size));
  for (let i = 0; i < items.length; i += step) {
    groups.push(items.slice(i, i + step));
  }
  return groups;
}

/**
 * Requests in the strategy's order. Requests are matched by identity, so pass
 * the same objects the strategy was planned with; any other request, even a
 * value-equal copy, goes last in submission order.
 */
export function orderByStrategy(
  requests: readonly CompletionRequest[],
  strategy: ProcessingStrategy,
): CompletionRequest[] {
  const rank = new Map(strategy.processingOrder.map((r, i) => [r, i] as const));
  return [...requests].sort(
    (a, b) => (rank.get(a) ?? Number.MAX_SAFE_INTEGER) - (rank.get(b) ?? Number.MAX_SAFE_INTEGER),
  );
}

export interface ParallelSchedulerOptions {
  metrics: MetricsStore;
  monitor: ResourceMonitor;
  manager: ResourceManager;
  /** Host core count; defaults to os.availableParallelism(). */
  cores?: number;
}

export class ParallelScheduler {
  private readonly metrics: MetricsStore;
  private readonly monitor: ResourceMonitor;
  private readonly manager: ResourceManager;
  private readonly cores: number;
  private records = new Map<string, ProcessingRecord>();

  constructor(options: ParallelSchedulerOptions) {
    this.metrics = options.metrics;
    this.monitor = options.monitor;
    this.manager = options.manager;
    this.cores = options.cores ?? hostParallelism();
  }

  /**
   * Queries the resource monitor and manager once, then plans. Falls back to
   * the default strategy when either query fails.
   */
  async determineStrategy(requests: readonly CompletionRequest[]): Promise<ProcessingStrategy> {
    log.info(`Determining processing strategy for ${requests.length} requests`);

    try {
      const [snapshot, limits] = await Promise.all([this.monitor.snapshot(), this.manager.limits()]);
      const strategy = planStrategy(requests, snapshot, limits, this.cores);
      log.info(
        `Strategy: ${strategy.maxParallelism} parallel, batch size ${strategy.batchSize}, ` +
        `priority ${strategy.priorityLevel} (cpu ${snapshot.cpuUtilization.toFixed(1)}%)`,
      );
      return strategy;
    } catch (err) {
      log.error('Error determining processing strategy, using default', err);
      return defaultStrategy(requests, this.cores);
    }
  }

  /**
   * Runs the requests in `strategy.processingOrder`, in groups of `batchSize`.
   * Groups run one after another; within a group, items share a gate of
   * `maxParallelism` permits that spans the whole call. Cancellation is
   * honoured at group boundaries only, returning the results gathered so far.
   */
  async execute(
    requests: readonly CompletionRequest[],
    strategy: ProcessingStrategy,
    processor: ItemProcessor,
    signal?: AbortSignal,
  ): Promise<CompletionResponse[]> {
    const groups = partition(orderByStrategy(requests, strategy), strategy.batchSize);
    const gate = new Semaphore(strategy.maxParallelism);
    const results: CompletionResponse[] = [];

    log.info(`Processing ${requests.length} requests in ${groups.length} groups`);

    for (const [index, group] of groups.entries()) {
      if (signal?.aborted) {
        log.warn(`Cancelled before group ${index + 1}/${groups.length}; returning ${results.length} results`);
        break;
      }

      const groupResults = await Promise.all(
        group.map(request => gate.run(() => this.processItem(request, processor, signal))),
      );
      results.push(...groupResults);
    }

    log.info(`Parallel processing completed for ${results.length} requests`);
    return results;
  }

  getPerformance(now = Date.now()): ProcessingPerformance {
    return summarizeProcessing(Array.from(this.records.values()), now);
  }

  optimize(records: ProcessingRecord[] = Array.from(this.records.values())): ProcessingOptimization {
    return optimizeProcessing(records, this.cores);
  }

  private async processItem(
    request: CompletionRequest,
    processor: ItemProcessor,
    signal: AbortSignal | undefined,
  ): Promise<CompletionResponse> {
    const t0 = performance.now();
    let response: CompletionResponse;

    try {
      response = await processor(request, signal);
    } catch (err) {
      log.warn(`Batch item failed: ${errorMessage(err)}`);
      response = {
        content: '',
        success: false,
        errorMessage: errorMessage(err),
        modelUsed: '',
        processingTimeMs: 0,
        tokensUsed: 0,
        cost: 0,
        fallbackUsed: false,
        attempts: 1,
        postProcessingResults: [],
      };
    }

    const durationMs = performance.now() - t0;
    const key = batchMetricsKey(request);
    this.metrics.recordOutcome(key, {
      durationMs,
      success: response.success,
      tokensUsed: response.tokensUsed,
      cost: response.cost,
    });
    this.records.set(key, {
      key,
      requestType: request.metadata?.['type'] ?? 'unknown',
      processingTimeMs: durationMs,
      responseSize: response.content.length,
      success: response.success,
      timestamp: Date.now(),
    });

    return response;
  }
}
