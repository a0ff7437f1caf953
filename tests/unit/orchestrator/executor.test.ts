import { describe, it, expect } from 'vitest';
import { ExecutionCoordinator, MAX_ATTEMPTS } from '../../../src/orchestrator/executor.js';
import { CapabilityRegistry } from '../../../src/router/capability-registry.js';
import { MetricsStore } from '../../../src/router/metrics-store.js';
import { RateLimiter } from '../../../src/router/rate-limiter.js';
import { ProviderExecutionError } from '../../../src/router/errors.js';
import type { Provider } from '../../../src/router/types.js';
import { FakeProvider, failingProvider, makeProfile, makeRequest } from '../fixtures.js';

function setup(providers: Provider[], registered = providers.map(p => p.name)) {
  const registry = new CapabilityRegistry(registered.map(name => [name, makeProfile()] as const));
  const metrics = new MetricsStore();
  const rateLimiter = new RateLimiter();
  const coordinator = new ExecutionCoordinator({
    registry,
    metrics,
    providers: new Map(providers.map(p => [p.name, p] as const)),
    defaultProvider: 'alpha',
    rateLimiter,
  });
  return { registry, metrics, rateLimiter, coordinator };
}

describe('ExecutionCoordinator', () => {
  it('returns the first provider\'s reply when it succeeds', async () => {
    const alpha = new FakeProvider('alpha');
    const beta = new FakeProvider('beta');
    const { coordinator, metrics } = setup([alpha, beta]);

    const response = await coordinator.executeWithFallback(makeRequest());

    expect(response.success).toBe(true);
    expect(response.content).toBe('reply from alpha');
    expect(response.modelUsed).toBe('alpha');
    expect(response.attempts).toBe(1);
    expect(response.fallbackUsed).toBe(false);
    expect(response.tokensUsed).toBe(10);
    expect(beta.calls).toBe(0);
    expect(metrics.get('alpha').successfulRequests).toBe(1);
  });

  it('falls back to the next best provider once', async () => {
    const alpha = failingProvider('alpha');
    const beta = new FakeProvider('beta');
    const { coordinator, metrics } = setup([alpha, beta]);

    const response = await coordinator.executeWithFallback(makeRequest());

    expect(response.success).toBe(true);
    expect(response.modelUsed).toBe('beta');
    expect(response.attempts).toBe(2);
    expect(response.fallbackUsed).toBe(true);
    expect(metrics.get('alpha').failedRequests).toBe(1);
    expect(metrics.get('beta').successfulRequests).toBe(1);
  });

  it('never makes more than two attempts', async () => {
    const providers = [failingProvider('alpha'), failingProvider('beta'), failingProvider('gamma')];
    const { coordinator } = setup(providers);

    const response = await coordinator.executeWithFallback(makeRequest());

    const totalCalls = providers.reduce((sum, p) => sum + p.calls, 0);
    expect(totalCalls).toBe(MAX_ATTEMPTS);
    expect(response.success).toBe(false);
    expect(response.fallbackUsed).toBe(true);
    expect(response.attempts).toBe(2);
    expect(response.errorMessage).toBe('beta unavailable');
    expect(response.modelUsed).toBe('beta');
  });

  it('stops after one attempt when no other provider exists', async () => {
    const alpha = failingProvider('alpha');
    const { coordinator } = setup([alpha]);

    const response = await coordinator.executeWithFallback(makeRequest());

    expect(alpha.calls).toBe(1);
    expect(response.success).toBe(false);
    expect(response.attempts).toBe(1);
    expect(response.fallbackUsed).toBe(true);
    expect(response.errorMessage).toBe('alpha unavailable');
  });

  it('uses the default provider when the registry is empty', async () => {
    const alpha = new FakeProvider('alpha');
    const { coordinator } = setup([alpha], []);

    const response = await coordinator.executeWithFallback(makeRequest());

    expect(response.success).toBe(true);
    expect(response.modelUsed).toBe('alpha');
  });

  it('treats a registered provider with no binding as a failure', async () => {
    const beta = new FakeProvider('beta');
    const { coordinator } = setup([beta], ['ghost', 'beta']);

    const response = await coordinator.executeWithFallback(makeRequest());

    expect(response.success).toBe(true);
    expect(response.modelUsed).toBe('beta');
    expect(response.fallbackUsed).toBe(true);
  });

  it('puts a provider that answered 429 on cooldown', async () => {
    const alpha = new FakeProvider('alpha', () => {
      throw new ProviderExecutionError('alpha', 'rate limited', 429);
    });
    const beta = new FakeProvider('beta');
    const { coordinator, rateLimiter } = setup([alpha, beta]);

    await coordinator.executeWithFallback(makeRequest());

    expect(rateLimiter.isRateLimited('alpha')).toBe(true);
    expect(rateLimiter.isRateLimited('beta')).toBe(false);
  });

  it('skips cooling providers while others remain', async () => {
    const alpha = new FakeProvider('alpha');
    const beta = new FakeProvider('beta');
    const { coordinator, rateLimiter } = setup([alpha, beta]);
    rateLimiter.markRateLimited('alpha');

    const response = await coordinator.executeWithFallback(makeRequest());

    expect(response.modelUsed).toBe('beta');
    expect(response.fallbackUsed).toBe(false);
    expect(alpha.calls).toBe(0);
  });

  it('still calls a cooling provider when every provider is cooling', async () => {
    const alpha = new FakeProvider('alpha');
    const { coordinator, rateLimiter } = setup([alpha]);
    rateLimiter.markRateLimited('alpha');

    const response = await coordinator.executeWithFallback(makeRequest());

    expect(response.success).toBe(true);
    expect(rateLimiter.isRateLimited('alpha')).toBe(false);
  });

  it('does not fall back when post-processing validation rejects the reply', async () => {
    const alpha = new FakeProvider('alpha', () => ({ content: 'not json', tokensUsed: 5, cost: 0 }));
    const beta = new FakeProvider('beta');
    const { coordinator } = setup([alpha, beta]);

    const response = await coordinator.executeWithFallback(makeRequest({
      postProcessing: [{ type: 'validation', parameters: { validationType: 'json' } }],
    }));

    expect(response.success).toBe(false);
    expect(response.errorMessage).toBe('Content validation failed');
    expect(response.attempts).toBe(1);
    expect(response.fallbackUsed).toBe(false);
    expect(beta.calls).toBe(0);
    expect(response.postProcessingResults).toEqual([
      expect.objectContaining({ type: 'validation', success: false, errorMessage: 'Content validation failed' }),
    ]);
  });
});
