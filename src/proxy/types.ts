import { ProviderExecutionError } from '../router/errors.js';

/** Upstream wire protocols a catalog entry can name. Both speak Messages. */
export type ApiProvider = 'anthropic' | 'minimax';

export interface ProxyMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ProxyRequest {
  provider: ApiProvider;
  modelId: string;
  messages: ProxyMessage[];
  systemPrompt?: string;
  maxTokens: number;
  temperature?: number;
}

export interface ProxyResponse {
  content: string;
  inputTokens: number;
  outputTokens: number;
  modelId: string;
  provider: ApiProvider;
  latencyMs: number;
  finishReason: string;
}

/**
 * Error thrown by proxy modules when an upstream API returns an error.
 * Carries the HTTP status code so callers can react (e.g., 429 rate limiting).
 */
export class ProxyError extends ProviderExecutionError {
  readonly status: number;

  constructor(provider: string, status: number, body: string) {
    super(provider, `${provider} API error (${status}): ${body}`, status);
    this.name = 'ProxyError';
    this.status = status;
  }
}
