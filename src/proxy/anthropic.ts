import type { ProxyRequest, ProxyResponse } from './types.js';
import { ProxyError } from './types.js';
import type { ConductorConfig } from '../config/types.js';
import { performance } from 'node:perf_hooks';
import { buildAnthropicAuthHeaders } from './anthropic-auth.js';
import { buildMessagesBody, parseMessagesResponse } from './messages.js';

export async function callAnthropic(
  request: ProxyRequest,
  config: ConductorConfig,
  signal?: AbortSignal,
): Promise<ProxyResponse> {
  if (!config.anthropic.apiKey) {
    throw new ProxyError('Anthropic', 401, 'No Anthropic API key configured');
  }

  const url = `${config.anthropic.baseUrl}/v1/messages`;
  const startMs = performance.now();

  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...buildAnthropicAuthHeaders(config.anthropic),
      'anthropic-version': '2023-06-01',
    },
    body: JSON.stringify(buildMessagesBody(request)),
    signal,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new ProxyError('Anthropic', response.status, errorText);
  }

  const payload: unknown = await response.json();
  return parseMessagesResponse('Anthropic', 'anthropic', request.modelId, payload, performance.now() - startMs);
}
