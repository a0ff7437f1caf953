import type {
  CapabilityProfileInput,
  CompletionRequest,
  Provider,
  ProviderOutput,
} from '../../src/router/types.js';
import type { ConductorConfig } from '../../src/config/types.js';

export function makeRequest(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    input: 'Write a function that reverses a string',
    requiredLanguages: ['python'],
    taskType: 'code-generation',
    complexityLevel: 3,
    maxTokens: 500,
    temperature: 0.7,
    postProcessing: [],
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<CapabilityProfileInput> = {}): CapabilityProfileInput {
  return {
    supportedLanguages: ['python', 'typescript'],
    supportedTasks: ['code-generation', 'summarization'],
    maxComplexity: 5,
    maxTokens: 8000,
    costPerToken: 0.00001,
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<ConductorConfig> = {}): ConductorConfig {
  return {
    defaultProvider: 'alpha',
    anthropic: { apiKey: 'test-key', baseUrl: 'https://anthropic.test', authType: 'api-key' },
    minimax: { apiKey: 'test-key', baseUrl: 'https://minimax.test' },
    logging: { level: 'error' },
    capabilityCatalogPath: 'data/capability-catalog.json',
    rateLimit: { cooldownMs: 60_000 },
    resources: {},
    ...overrides,
  };
}

type Handler = (request: CompletionRequest, call: number) => ProviderOutput | Promise<ProviderOutput>;

/** In-process provider. Throws whatever the handler throws. */
export class FakeProvider implements Provider {
  readonly name: string;
  calls = 0;
  readonly inputs: string[] = [];
  private readonly handler: Handler;

  constructor(name: string, handler: Handler = () => ({ content: `reply from ${name}`, tokensUsed: 10, cost: 0.0001 })) {
    this.name = name;
    this.handler = handler;
  }

  async execute(request: CompletionRequest): Promise<ProviderOutput> {
    this.calls++;
    this.inputs.push(request.input);
    return this.handler(request, this.calls);
  }
}

export function failingProvider(name: string, message = `${name} unavailable`): FakeProvider {
  return new FakeProvider(name, () => {
    throw new Error(message);
  });
}
