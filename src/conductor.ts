import type { ConductorConfig } from './config/types.js';
import type { CatalogEntry } from './config/catalog.js';
import type {
  CapabilityProfile,
  CapabilityProfileInput,
  CompletionRequest,
  CompletionResponse,
  Provider,
  RankedCandidate,
} from './router/types.js';
import type { Workflow, WorkflowResult, OptimizationResult } from './orchestrator/types.js';
import type { ProcessingStrategy, ResourceManager, ResourceMonitor } from './scheduler/types.js';
import type { AggregateStats } from './logging/types.js';
import type { ApiProvider } from './proxy/types.js';
import type { DispatchFn } from './proxy/dispatcher.js';
import { CapabilityRegistry } from './router/capability-registry.js';
import { MetricsStore } from './router/metrics-store.js';
import { SelectionRuleSet } from './router/rules.js';
import { RateLimiter } from './router/rate-limiter.js';
import { rankCandidates } from './router/engine.js';
import { ExecutionCoordinator } from './orchestrator/executor.js';
import { WorkflowEngine } from './orchestrator/workflow.js';
import { AdaptiveRuleEngine } from './orchestrator/adaptive.js';
import { ParallelScheduler } from './scheduler/parallel.js';
import { StaticResourceManager, SystemResourceMonitor } from './scheduler/resources.js';
import { HttpProvider } from './proxy/provider.js';
import { dispatch } from './proxy/dispatcher.js';
import { computeStats } from './logging/stats.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('conductor');

export interface ConductorDeps {
  /** Pre-built providers by name; catalog entries without one get an HttpProvider. */
  providers?: Iterable<Provider>;
  monitor?: ResourceMonitor;
  manager?: ResourceManager;
  cores?: number;
  send?: DispatchFn;
}

export interface UpstreamBinding {
  provider: ApiProvider;
  modelId: string;
}

export interface BatchResult {
  strategy: ProcessingStrategy;
  responses: CompletionResponse[];
}

/**
 * The assembled core: one registry, metrics store, rule set and rate limiter
 * shared by the coordinator, the workflow engine, the adaptive loop and the
 * batch scheduler.
 */
export class Conductor {
  readonly registry: CapabilityRegistry;
  readonly metrics: MetricsStore;
  readonly rules: SelectionRuleSet;
  readonly rateLimiter: RateLimiter;
  readonly coordinator: ExecutionCoordinator;
  readonly workflows: WorkflowEngine;
  readonly adaptive: AdaptiveRuleEngine;
  readonly scheduler: ParallelScheduler;
  private readonly providers: Map<string, Provider>;
  private readonly config: ConductorConfig;
  private readonly send: DispatchFn;

  constructor(config: ConductorConfig, catalog: CatalogEntry[], deps: ConductorDeps = {}) {
    this.config = config;
    this.send = deps.send ?? dispatch;
    this.registry = new CapabilityRegistry(catalog.map(entry => [entry.name, entry] as const));
    this.metrics = new MetricsStore();
    this.rules = new SelectionRuleSet();
    this.rateLimiter = new RateLimiter(config.rateLimit.cooldownMs);

    this.providers = new Map();
    for (const provider of deps.providers ?? []) {
      this.providers.set(provider.name, provider);
    }
    for (const entry of catalog) {
      if (!this.providers.has(entry.name)) {
        this.providers.set(entry.name, new HttpProvider(entry, config, this.registry, this.send));
      }
    }

    if (!this.registry.has(config.defaultProvider)) {
      log.warn(`Default provider ${config.defaultProvider} is not in the catalog`);
    }

    this.coordinator = new ExecutionCoordinator({
      registry: this.registry,
      metrics: this.metrics,
      providers: this.providers,
      defaultProvider: config.defaultProvider,
      rules: this.rules,
      rateLimiter: this.rateLimiter,
    });
    this.workflows = new WorkflowEngine(this.coordinator);
    this.adaptive = new AdaptiveRuleEngine(this.metrics, this.rules);
    this.scheduler = new ParallelScheduler({
      metrics: this.metrics,
      monitor: deps.monitor ?? new SystemResourceMonitor(),
      manager: deps.manager ?? new StaticResourceManager({
        cpu: config.resources.maxCpu,
        memory: config.resources.maxMemoryBytes,
        storage: config.resources.maxStorageBytes,
      }),
      cores: deps.cores,
    });
  }

  execute(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    return this.coordinator.executeWithFallback(request, signal);
  }

  /** Ranking the next call would see, without calling anyone. */
  explain(request: CompletionRequest): RankedCandidate[] {
    const excluded = new Set(this.rateLimiter.exclusionsAmong(this.registry.names()));
    return rankCandidates(request, this.registry, this.metrics, excluded, this.rules);
  }

  runWorkflow(workflow: Workflow, signal?: AbortSignal): Promise<WorkflowResult> {
    return this.workflows.run(workflow, signal);
  }

  async runBatch(requests: CompletionRequest[], signal?: AbortSignal): Promise<BatchResult> {
    const strategy = await this.scheduler.determineStrategy(requests);
    const responses = await this.scheduler.execute(
      requests,
      strategy,
      (request, itemSignal) => this.coordinator.executeWithFallback(request, itemSignal),
      signal,
    );
    return { strategy, responses };
  }

  analyzePerformance(): OptimizationResult {
    return this.adaptive.analyzeAndOptimize();
  }

  stats(): AggregateStats {
    return computeStats(this.metrics.snapshot());
  }

  /**
   * Replaces or adds a capability profile. A new name needs an upstream
   * binding unless a provider is already bound under it.
   */
  updateCapabilities(
    name: string,
    input: CapabilityProfileInput,
    binding?: UpstreamBinding,
  ): CapabilityProfile {
    if (!this.providers.has(name) && !binding) {
      throw new Error(`No provider bound for ${name}; supply provider and modelId`);
    }
    const profile = this.registry.update(name, input);
    if (binding) {
      this.providers.set(name, new HttpProvider({ name, ...binding }, this.config, this.registry, this.send));
    }
    return profile;
  }
}

export function createConductor(
  config: ConductorConfig,
  catalog: CatalogEntry[],
  deps?: ConductorDeps,
): Conductor {
  return new Conductor(config, catalog, deps);
}
