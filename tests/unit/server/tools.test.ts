import { describe, it, expect, vi } from 'vitest';
import { createConductor } from '../../../src/conductor.js';
import { metricsResult } from '../../../src/server/tools.js';
import type { ResourceMonitor } from '../../../src/scheduler/types.js';
import { FakeProvider, makeConfig, makeRequest } from '../fixtures.js';

const idleHost: ResourceMonitor = {
  snapshot: async () => ({ cpuUtilization: 5, memoryUtilization: 10, diskUtilization: 10 }),
};

function build() {
  return createConductor(
    makeConfig(),
    [{
      name: 'alpha',
      provider: 'anthropic',
      modelId: 'alpha-model',
      supportedLanguages: ['python'],
      supportedTasks: ['code-generation'],
      maxComplexity: 5,
      maxTokens: 8000,
      costPerToken: 0.00001,
    }],
    { providers: [new FakeProvider('alpha')], monitor: idleHost, cores: 2 },
  );
}

describe('metricsResult', () => {
  it('reports stats and raw metrics as JSON', async () => {
    const conductor = build();
    await conductor.execute(makeRequest());

    const result = metricsResult(conductor, 'json');

    expect('isError' in result).toBe(false);
    const body: unknown = JSON.parse(result.content[0]?.text ?? '');
    expect(body).toMatchObject({ stats: { totalRequests: 1, successfulRequests: 1 } });
  });

  it('renders the table format', () => {
    const result = metricsResult(build(), 'table');
    expect(result.content[0]?.text.split('\n')[1]).toBe('=== Model Conductor - Provider Stats ===');
  });

  it('returns an error result when stats cannot be computed', () => {
    const conductor = build();
    vi.spyOn(conductor, 'stats').mockImplementation(() => {
      throw new Error('metrics unavailable');
    });

    const result = metricsResult(conductor, 'json');

    expect(result).toEqual({
      content: [{ type: 'text', text: 'get_metrics error: metrics unavailable' }],
      isError: true,
    });
  });
});
