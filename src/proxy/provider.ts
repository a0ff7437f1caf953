import type { CompletionRequest, Provider, ProviderOutput } from '../router/types.js';
import type { CapabilityRegistry } from '../router/capability-registry.js';
import type { ConductorConfig } from '../config/types.js';
import type { CatalogEntry } from '../config/catalog.js';
import type { DispatchFn } from './dispatcher.js';
import { dispatch } from './dispatcher.js';
import { ProviderExecutionError, errorMessage } from '../router/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('provider');

/**
 * A catalog entry bound to its upstream API. Token budget and price are read
 * from the registry on every call, so capability updates apply immediately.
 */
export class HttpProvider implements Provider {
  readonly name: string;
  private readonly entry: Pick<CatalogEntry, 'name' | 'provider' | 'modelId'>;
  private readonly config: ConductorConfig;
  private readonly registry: Pick<CapabilityRegistry, 'get'>;
  private readonly send: DispatchFn;

  constructor(
    entry: Pick<CatalogEntry, 'name' | 'provider' | 'modelId'>,
    config: ConductorConfig,
    registry: Pick<CapabilityRegistry, 'get'>,
    send: DispatchFn = dispatch,
  ) {
    this.name = entry.name;
    this.entry = entry;
    this.config = config;
    this.registry = registry;
    this.send = send;
  }

  async execute(request: CompletionRequest, signal?: AbortSignal): Promise<ProviderOutput> {
    const profile = this.registry.get(this.name);
    const maxTokens = profile ? Math.min(request.maxTokens, profile.maxTokens) : request.maxTokens;

    try {
      const response = await this.send({
        provider: this.entry.provider,
        modelId: this.entry.modelId,
        messages: [{ role: 'user', content: request.input }],
        maxTokens,
        temperature: request.temperature,
      }, this.config, signal);

      const tokensUsed = response.inputTokens + response.outputTokens;
      log.debug(`${this.name}: ${tokensUsed} tokens in ${response.latencyMs}ms (${response.finishReason})`);

      return {
        content: response.content,
        tokensUsed,
        cost: tokensUsed * (profile?.costPerToken ?? 0),
      };
    } catch (err) {
      if (err instanceof ProviderExecutionError) throw err;
      throw new ProviderExecutionError(this.name, `${this.name} request failed: ${errorMessage(err)}`);
    }
  }
}
