import type { ProxyRequest, ProxyResponse } from './types.js';
import type { ConductorConfig } from '../config/types.js';
import { callAnthropic } from './anthropic.js';
import { callMinimax } from './minimax.js';

export type DispatchFn = (
  request: ProxyRequest,
  config: ConductorConfig,
  signal?: AbortSignal,
) => Promise<ProxyResponse>;

export const dispatch: DispatchFn = async (request, config, signal) => {
  switch (request.provider) {
    case 'anthropic':
      return callAnthropic(request, config, signal);
    case 'minimax':
      return callMinimax(request, config, signal);
  }
};
