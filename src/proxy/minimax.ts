import type { ProxyRequest, ProxyResponse } from './types.js';
import { ProxyError } from './types.js';
import type { ConductorConfig } from '../config/types.js';
import { performance } from 'node:perf_hooks';
import { buildMessagesBody, parseMessagesResponse } from './messages.js';

// MiniMax exposes an Anthropic-compatible Messages endpoint with bearer auth.
export async function callMinimax(
  request: ProxyRequest,
  config: ConductorConfig,
  signal?: AbortSignal,
): Promise<ProxyResponse> {
  if (!config.minimax.apiKey) {
    throw new ProxyError('MiniMax', 401, 'No MiniMax API key configured');
  }

  const url = `${config.minimax.baseUrl}/v1/messages`;
  const startMs = performance.now();

  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${config.minimax.apiKey}`,
      'anthropic-version': '2023-06-01',
    },
    body: JSON.stringify(buildMessagesBody(request)),
    signal,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new ProxyError('MiniMax', response.status, errorText);
  }

  const payload: unknown = await response.json();
  return parseMessagesResponse('MiniMax', 'minimax', request.modelId, payload, performance.now() - startMs);
}
