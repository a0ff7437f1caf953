import { performance } from 'node:perf_hooks';
import type { CompletionRequest, CompletionResponse, Provider } from '../router/types.js';
import type { CapabilityRegistry } from '../router/capability-registry.js';
import type { MetricsStore } from '../router/metrics-store.js';
import type { SelectionRuleSet } from '../router/rules.js';
import type { RateLimiter } from '../router/rate-limiter.js';
import { selectOptimal } from '../router/engine.js';
import {
  NoCandidateAvailableError,
  ProviderExecutionError,
  errorMessage,
} from '../router/errors.js';
import { applyPostProcessing } from './post-processing.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('executor');

// One attempt on the selected provider plus one fallback.
export const MAX_ATTEMPTS = 2;

export interface ExecutionCoordinatorOptions {
  registry: CapabilityRegistry;
  metrics: MetricsStore;
  providers: ReadonlyMap<string, Provider>;
  /** Used when selection finds no eligible candidate. */
  defaultProvider: string;
  rules?: SelectionRuleSet;
  rateLimiter?: RateLimiter;
}

export class ExecutionCoordinator {
  private readonly registry: CapabilityRegistry;
  private readonly metrics: MetricsStore;
  private readonly providers: ReadonlyMap<string, Provider>;
  private readonly defaultProvider: string;
  private readonly rules: SelectionRuleSet | undefined;
  private readonly rateLimiter: RateLimiter | undefined;

  constructor(options: ExecutionCoordinatorOptions) {
    this.registry = options.registry;
    this.metrics = options.metrics;
    this.providers = options.providers;
    this.defaultProvider = options.defaultProvider;
    this.rules = options.rules;
    this.rateLimiter = options.rateLimiter;
  }

  /**
   * Runs the request on the best provider, falling back once to the next best
   * on failure. Never throws: an exhausted fallback comes back as a failed
   * response with `fallbackUsed` set.
   */
  async executeWithFallback(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const start = performance.now();
    const excluded = this.initialExclusions();

    let providerName = this.selectInitial(request, excluded);
    let attempts = 0;
    let lastError = '';

    while (attempts < MAX_ATTEMPTS) {
      attempts++;
      log.debug(`Attempt ${attempts} on ${providerName}`);

      try {
        const response = await this.invoke(providerName, request, signal);
        const finished: CompletionResponse = {
          ...response,
          processingTimeMs: Math.round(performance.now() - start),
          fallbackUsed: attempts > 1,
          attempts,
        };
        return applyPostProcessing(finished, request.postProcessing);
      } catch (err) {
        lastError = errorMessage(err);
        log.warn(`Provider ${providerName} failed: ${lastError}`);

        if (err instanceof ProviderExecutionError && err.status === 429) {
          this.rateLimiter?.markRateLimited(providerName);
        }
        excluded.add(providerName);

        if (attempts >= MAX_ATTEMPTS) break;

        const fallback = this.selectFallback(request, excluded);
        if (fallback === undefined || fallback === providerName) {
          log.warn(`No fallback available after ${providerName} failed`);
          break;
        }
        log.info(`Falling back from ${providerName} to ${fallback}`);
        providerName = fallback;
      }
    }

    return {
      content: '',
      success: false,
      errorMessage: lastError,
      modelUsed: providerName,
      processingTimeMs: Math.round(performance.now() - start),
      tokensUsed: 0,
      cost: 0,
      fallbackUsed: true,
      attempts,
      postProcessingResults: [],
    };
  }

  /**
   * Invokes one provider and records the outcome. Rejects with the provider's
   * failure after recording it.
   */
  private async invoke(
    providerName: string,
    request: CompletionRequest,
    signal: AbortSignal | undefined,
  ): Promise<CompletionResponse> {
    const provider = this.providers.get(providerName);
    const t0 = performance.now();

    try {
      if (!provider) {
        throw new ProviderExecutionError(providerName, `No provider bound for ${providerName}`);
      }
      const output = await provider.execute(request, signal);
      const durationMs = performance.now() - t0;
      this.metrics.recordOutcome(providerName, {
        durationMs,
        success: true,
        tokensUsed: output.tokensUsed,
        cost: output.cost,
      });
      this.rateLimiter?.clear(providerName);

      return {
        content: output.content,
        success: true,
        modelUsed: providerName,
        processingTimeMs: Math.round(durationMs),
        tokensUsed: output.tokensUsed,
        cost: output.cost,
        fallbackUsed: false,
        attempts: 1,
        postProcessingResults: [],
      };
    } catch (err) {
      this.metrics.recordOutcome(providerName, {
        durationMs: performance.now() - t0,
        success: false,
        tokensUsed: 0,
        cost: 0,
      });
      throw err;
    }
  }

  private initialExclusions(): Set<string> {
    if (!this.rateLimiter) return new Set();
    return new Set(this.rateLimiter.exclusionsAmong(this.registry.names()));
  }

  private selectInitial(request: CompletionRequest, excluded: ReadonlySet<string>): string {
    try {
      return selectOptimal(request, this.registry, this.metrics, excluded, this.rules);
    } catch (err) {
      if (err instanceof NoCandidateAvailableError) {
        log.warn(`${err.message}; using default provider ${this.defaultProvider}`);
        return this.defaultProvider;
      }
      throw err;
    }
  }

  private selectFallback(request: CompletionRequest, excluded: ReadonlySet<string>): string | undefined {
    try {
      return selectOptimal(request, this.registry, this.metrics, excluded, this.rules);
    } catch (err) {
      if (err instanceof NoCandidateAvailableError) return undefined;
      throw err;
    }
  }
}
