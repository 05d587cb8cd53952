import { beforeEach, describe, expect, test } from 'vitest';

import { EndpointRegistry, registerEndpointsFromConfig } from '../src/runtime/endpoint-registry.js';
import { EndpointsExhaustedError } from '../src/shared/errors.js';

describe('EndpointRegistry', () => {
  let nowMs: number;
  let sleeps: number[];
  let registry: EndpointRegistry;

  beforeEach(() => {
    nowMs = 1_000_000;
    sleeps = [];
    registry = new EndpointRegistry({
      now: () => nowMs,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
    registry.addEndpoint({
      name: 'primary',
      baseUrl: 'http://primary.test/v1/',
      apiKey: 'test-secret',
      model: 'model-a',
      priority: 2,
    });
    registry.addEndpoint({
      name: 'secondary',
      baseUrl: 'http://secondary.test/v1',
      apiKey: 'test-secret',
      model: 'model-b',
      priority: 1,
    });
  });

  test('three consecutive failures move selection to the next endpoint', () => {
    expect(registry.selectEndpoint('priority')?.name).toBe('primary');

    registry.recordFailure('primary');
    registry.recordFailure('primary');
    expect(registry.selectEndpoint('priority')?.name).toBe('primary');

    registry.recordFailure('primary');

    expect(registry.getEndpoint('primary')?.status).toBe('failed');
    expect(registry.selectEndpoint('priority')?.name).toBe('secondary');
  });

  test('a failed endpoint comes back after the cool-down', () => {
    for (let index = 0; index < 3; index += 1) {
      registry.recordFailure('primary');
    }

    nowMs += 59_999;
    expect(registry.isEndpointAvailable('primary')).toBe(false);

    nowMs += 1;
    expect(registry.selectEndpoint()?.name).toBe('primary');
    expect(registry.getEndpoint('primary')).toEqual(
      expect.objectContaining({ status: 'active', failureCount: 0, totalFailureCount: 3 }),
    );
  });

  test('a success resets the consecutive failure count', () => {
    registry.recordFailure('primary');
    registry.recordFailure('primary');
    registry.recordSuccess('primary', 0.5);
    registry.recordFailure('primary');

    expect(registry.getEndpoint('primary')).toEqual(
      expect.objectContaining({ status: 'active', failureCount: 1, totalFailureCount: 3, successCount: 1 }),
    );
  });

  test('rate-limited endpoints are skipped until their window clears', () => {
    registry.addEndpoint({
      name: 'tiny',
      baseUrl: 'http://tiny.test',
      apiKey: 'test-secret',
      model: 'model-c',
      priority: 5,
      maxRequestsPerMinute: 1,
    });

    expect(registry.selectEndpoint()?.name).toBe('tiny');
    registry.recordRequest('tiny');

    expect(registry.getAvailableEndpoints().map((endpoint) => endpoint.name)).toEqual(['primary', 'secondary']);
    expect(registry.getEndpoint('tiny')?.status).toBe('rate_limited');

    nowMs += 60_000;
    expect(registry.selectEndpoint()?.name).toBe('tiny');
    expect(registry.getEndpoint('tiny')?.status).toBe('active');
  });

  test('selection strategies pick by latency, usage, and random draw', () => {
    const randomRegistry = new EndpointRegistry({ now: () => nowMs, random: () => 0.99 });
    randomRegistry.addEndpoint({ name: 'a', baseUrl: 'http://a.test', apiKey: 'test-secret', model: 'm', priority: 2 });
    randomRegistry.addEndpoint({ name: 'b', baseUrl: 'http://b.test', apiKey: 'test-secret', model: 'm', priority: 1 });
    expect(randomRegistry.selectEndpoint('random')?.name).toBe('b');

    registry.recordSuccess('primary', 2);
    registry.recordSuccess('secondary', 0.5);
    expect(registry.selectEndpoint('least_latency')?.name).toBe('secondary');
    expect(registry.selectEndpoint('round_robin')?.name).toBe('primary');

    registry.recordSuccess('primary', 2);
    expect(registry.selectEndpoint('round_robin')?.name).toBe('secondary');
  });

  test('addEndpoint replaces an endpoint of the same name and removeEndpoint drops it', () => {
    registry.recordFailure('primary');
    registry.addEndpoint({
      name: 'primary',
      baseUrl: 'http://primary.test/v2',
      apiKey: 'test-secret',
      model: 'model-c',
      priority: 3,
    });

    expect(registry.getEndpoint('primary')).toEqual(
      expect.objectContaining({ model: 'model-c', priority: 3, failureCount: 0 }),
    );
    expect(registry.listEndpoints().map((endpoint) => endpoint.name)).toEqual(['primary', 'secondary']);

    expect(registry.removeEndpoint('secondary')).toBe(true);
    expect(registry.removeEndpoint('secondary')).toBe(false);
    expect(registry.listEndpoints().map((endpoint) => endpoint.name)).toEqual(['primary']);
    expect(registry.getEndpoint('secondary')).toBeNull();
  });

  test('excluded endpoints are never selected', () => {
    expect(registry.selectEndpoint('priority', ['primary'])?.name).toBe('secondary');
    expect(registry.selectEndpoint('priority', ['primary', 'secondary'])).toBeNull();
  });

  test('callWithRetry moves to the next endpoint after a failure', async () => {
    const attempted: string[] = [];

    const outcome = await registry.callWithRetry(async (endpoint) => {
      attempted.push(endpoint.name);
      if (endpoint.name === 'primary') {
        throw new Error('primary down');
      }

      return `answer from ${endpoint.baseUrl}`;
    });

    expect(outcome.result).toBe('answer from http://secondary.test/v1');
    expect(outcome.endpoint.name).toBe('secondary');
    expect(attempted).toEqual(['primary', 'secondary']);
    expect(sleeps).toEqual([1_000]);

    const stats = registry.getStats();
    expect(stats.totalEndpoints).toBe(2);
    expect(stats.endpoints.primary).toEqual({
      status: 'active',
      priority: 2,
      successCount: 0,
      failureCount: 1,
      consecutiveFailures: 1,
      successRate: 0,
      avgLatency: 0,
      rateLimit: '1/60',
    });
    expect(stats.endpoints.secondary).toEqual(
      expect.objectContaining({ successCount: 1, successRate: 1, rateLimit: '1/60' }),
    );
  });

  test('callWithRetry raises once every attempt has failed', async () => {
    const call = registry.callWithRetry(
      async (endpoint) => {
        throw new Error(`${endpoint.name} down`);
      },
      { maxRetries: 2 },
    );

    await expect(call).rejects.toBeInstanceOf(EndpointsExhaustedError);
    await expect(call).rejects.toThrow('all API endpoints failed after 2 attempts. Last error: Error: secondary down');
    expect(sleeps).toEqual([1_000]);
  });

  test('callWithRetry backs off when nothing is available', async () => {
    registry.removeEndpoint('primary');
    registry.removeEndpoint('secondary');

    await expect(registry.callWithRetry(async () => 'never', { maxRetries: 3, backoffFactor: 2 })).rejects.toThrow(
      'all API endpoints failed after 3 attempts',
    );
    expect(sleeps).toEqual([1_000, 2_000]);
  });

  test('registerEndpointsFromConfig adds each configured endpoint with a trimmed base url', () => {
    const configured = new EndpointRegistry();
    registerEndpointsFromConfig(configured, [
      {
        name: 'deepseek',
        baseUrl: 'https://deepseek.test/v1/',
        apiKey: 'test-secret',
        model: 'deepseek-chat',
        priority: 2,
        maxRequestsPerMinute: 100,
        timeoutSeconds: 30,
      },
    ]);

    expect(configured.getEndpoint('deepseek')).toEqual(
      expect.objectContaining({ baseUrl: 'https://deepseek.test/v1', maxRequestsPerMinute: 100, status: 'active' }),
    );
    expect(configured.getStats().endpoints.deepseek?.rateLimit).toBe('0/100');
  });

  test('resetStats clears counters and reactivates endpoints', () => {
    for (let index = 0; index < 3; index += 1) {
      registry.recordFailure('primary');
    }

    registry.resetStats();

    expect(registry.getStats().endpoints.primary).toEqual(
      expect.objectContaining({ status: 'active', failureCount: 0, consecutiveFailures: 0, successRate: 1 }),
    );
  });
});
