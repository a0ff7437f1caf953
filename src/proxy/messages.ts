import { z } from 'zod';
import type { ApiProvider, ProxyRequest, ProxyResponse } from './types.js';
import { ProxyError } from './types.js';

const messagesResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  }).passthrough()),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
  stop_reason: z.string().nullable().optional(),
});

export function buildMessagesBody(request: ProxyRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: request.modelId,
    max_tokens: request.maxTokens,
    messages: request.messages.map(m => ({ role: m.role, content: m.content })),
  };
  if (request.systemPrompt) {
    body.system = request.systemPrompt;
  }
  if (request.temperature !== undefined) {
    body.temperature = request.temperature;
  }
  return body;
}

/**
 * Parses a Messages API reply. Only `text` blocks are kept; `thinking` and
 * tool blocks are dropped.
 */
export function parseMessagesResponse(
  label: string,
  provider: ApiProvider,
  modelId: string,
  payload: unknown,
  latencyMs: number,
): ProxyResponse {
  const parsed = messagesResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ProxyError(label, 502, `Malformed response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  const data = parsed.data;

  const content = data.content
    .filter(c => c.type === 'text' && c.text)
    .map(c => c.text ?? '')
    .join('');

  return {
    content,
    inputTokens: data.usage.input_tokens,
    outputTokens: data.usage.output_tokens,
    modelId,
    provider,
    latencyMs: Math.round(latencyMs),
    finishReason: data.stop_reason ?? 'unknown',
  };
}
