import { setTimeout as sleep } from 'node:timers/promises';

import type { EndpointConfig } from '../shared/config.js';
import { describeError, EndpointsExhaustedError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { noopLogger } from '../shared/logger.js';
import { RateLimiter } from './rate-limiter.js';

export const endpointStatuses = ['active', 'degraded', 'rate_limited', 'failed'] as const;
export type EndpointStatus = (typeof endpointStatuses)[number];

export const selectionStrategies = ['priority', 'random', 'least_latency', 'round_robin'] as const;
export type SelectionStrategy = (typeof selectionStrategies)[number];

const failureCooldownMs = 60_000;
const failureThreshold = 3;
const maxRateLimitWaitSeconds = 5;

export interface ApiEndpointInput {
  name: string;
  baseUrl: string;
  apiKey: string;
  model: string;
  priority?: number;
  maxRequestsPerMinute?: number;
  timeoutSeconds?: number;
}

export interface ApiEndpoint {
  readonly name: string;
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly priority: number;
  readonly maxRequestsPerMinute: number;
  readonly timeoutSeconds: number;
  status: EndpointStatus;
  lastSuccess: number;
  lastFailure: number;
  failureCount: number;
  totalFailureCount: number;
  successCount: number;
  totalLatency: number;
}

export interface EndpointStats {
  status: EndpointStatus;
  priority: number;
  successCount: number;
  failureCount: number;
  consecutiveFailures: number;
  successRate: number;
  avgLatency: number;
  rateLimit: string;
}

export interface RegistryStats {
  totalEndpoints: number;
  endpoints: Record<string, EndpointStats>;
}

export interface CallWithRetryOptions {
  maxRetries?: number;
  strategy?: SelectionStrategy;
  backoffFactor?: number;
}

export interface CallWithRetryResult<T> {
  result: T;
  endpoint: ApiEndpoint;
}

export interface EndpointRegistryOptions {
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function endpointAvgLatency(endpoint: ApiEndpoint): number {
  if (endpoint.successCount === 0) {
    return 0;
  }

  return endpoint.totalLatency / endpoint.successCount;
}

export function endpointSuccessRate(endpoint: ApiEndpoint): number {
  const total = endpoint.successCount + endpoint.totalFailureCount;
  if (total === 0) {
    return 1;
  }

  return endpoint.successCount / total;
}

/**
 * Holds the configured text-generation endpoints, their health counters and
 * their rate limiters, and decides which endpoint a caller should use next.
 *
 * All counter updates happen synchronously on the event loop, so overlapping
 * `callWithRetry` invocations never lose an update; they can still observe
 * each other's results between awaits.
 */
export class EndpointRegistry {
  private readonly endpoints = new Map<string, ApiEndpoint>();
  private readonly rateLimiters = new Map<string, RateLimiter>();
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: EndpointRegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.random = options.random ?? Math.random;
  }

  addEndpoint(input: ApiEndpointInput): ApiEndpoint {
    const endpoint: ApiEndpoint = {
      name: input.name,
      baseUrl: input.baseUrl.replace(/\/+$/u, ''),
      apiKey: input.apiKey.trim(),
      model: input.model.trim(),
      priority: input.priority ?? 1,
      maxRequestsPerMinute: input.maxRequestsPerMinute ?? 60,
      timeoutSeconds: input.timeoutSeconds ?? 30,
      status: 'active',
      lastSuccess: this.now(),
      lastFailure: 0,
      failureCount: 0,
      totalFailureCount: 0,
      successCount: 0,
      totalLatency: 0,
    };

    this.endpoints.set(endpoint.name, endpoint);
    this.rateLimiters.set(
      endpoint.name,
      new RateLimiter({
        maxRequests: endpoint.maxRequestsPerMinute,
        windowSeconds: 60,
        now: this.now,
      }),
    );

    this.logger.info({
      event: 'endpoint_added',
      endpoint: endpoint.name,
      priority: endpoint.priority,
      max_requests_per_minute: endpoint.maxRequestsPerMinute,
    });

    return endpoint;
  }

  removeEndpoint(name: string): boolean {
    const removed = this.endpoints.delete(name);
    this.rateLimiters.delete(name);

    if (removed) {
      this.logger.info({ event: 'endpoint_removed', endpoint: name });
    }

    return removed;
  }

  getEndpoint(name: string): ApiEndpoint | null {
    return this.endpoints.get(name) ?? null;
  }

  listEndpoints(): ApiEndpoint[] {
    return [...this.endpoints.values()];
  }

  getAvailableEndpoints(exclude: readonly string[] = []): ApiEndpoint[] {
    const excluded = new Set(exclude);
    const available: ApiEndpoint[] = [];

    for (const endpoint of this.endpoints.values()) {
      if (excluded.has(endpoint.name)) {
        continue;
      }

      if (!this.releaseCooldown(endpoint)) {
        continue;
      }

      const limiter = this.rateLimiters.get(endpoint.name);
      if (limiter && !limiter.canRequest()) {
        endpoint.status = 'rate_limited';
        continue;
      }

      if (endpoint.status === 'rate_limited') {
        endpoint.status = 'active';
      }

      available.push(endpoint);
    }

    return available.sort(compareEndpoints);
  }

  isEndpointAvailable(name: string): boolean {
    const endpoint = this.endpoints.get(name);
    if (!endpoint) {
      return false;
    }

    if (!this.releaseCooldown(endpoint)) {
      return false;
    }

    const limiter = this.rateLimiters.get(name);
    if (limiter && !limiter.canRequest()) {
      endpoint.status = 'rate_limited';
      return false;
    }

    return true;
  }

  selectEndpoint(strategy: SelectionStrategy = 'priority', exclude: readonly string[] = []): ApiEndpoint | null {
    const available = this.getAvailableEndpoints(exclude);
    if (available.length === 0) {
      return null;
    }

    switch (strategy) {
      case 'random':
        return available[Math.floor(this.random() * available.length)] ?? available[0] ?? null;
      case 'least_latency':
        return minBy(available, (endpoint) => endpointAvgLatency(endpoint) || Number.POSITIVE_INFINITY);
      case 'round_robin':
        return minBy(available, (endpoint) => endpoint.successCount + endpoint.totalFailureCount);
      default:
        return available[0] ?? null;
    }
  }

  async callWithRetry<T>(
    fn: (endpoint: ApiEndpoint) => Promise<T>,
    options: CallWithRetryOptions = {},
  ): Promise<CallWithRetryResult<T>> {
    const maxRetries = options.maxRetries ?? 3;
    const strategy = options.strategy ?? 'priority';
    const backoffFactor = options.backoffFactor ?? 1.5;

    const triedEndpoints: string[] = [];
    let lastError: unknown;

    for (let attempt = 0; attempt < maxRetries; attempt += 1) {
      const endpoint = this.selectEndpoint(strategy, triedEndpoints);
      if (!endpoint) {
        this.logger.warn({
          event: 'endpoint_none_available',
          attempt: attempt + 1,
          max_retries: maxRetries,
        });

        if (attempt < maxRetries - 1) {
          await this.sleep(backoffFactor ** attempt * 1000);
        }
        continue;
      }

      triedEndpoints.push(endpoint.name);

      const limiter = this.rateLimiters.get(endpoint.name);
      if (limiter && !limiter.canRequest()) {
        const waitSeconds = limiter.waitTime();
        if (waitSeconds > 0) {
          this.logger.info({
            event: 'endpoint_rate_limit_wait',
            endpoint: endpoint.name,
            wait_seconds: Math.min(waitSeconds, maxRateLimitWaitSeconds),
          });
          await this.sleep(Math.min(waitSeconds, maxRateLimitWaitSeconds) * 1000);
        }
      }

      limiter?.recordRequest();

      const startedAt = this.now();
      try {
        const result = await fn(endpoint);
        const latencySeconds = (this.now() - startedAt) / 1000;
        this.recordSuccess(endpoint.name, latencySeconds);

        this.logger.info({
          event: 'endpoint_call_succeeded',
          endpoint: endpoint.name,
          latency_seconds: latencySeconds,
        });

        return { result, endpoint };
      } catch (error) {
        lastError = error;
        this.recordFailure(endpoint.name);

        this.logger.warn({
          event: 'endpoint_call_failed',
          endpoint: endpoint.name,
          attempt: attempt + 1,
          max_retries: maxRetries,
          error_message: describeError(error),
        });

        if (attempt < maxRetries - 1) {
          await this.sleep(backoffFactor ** attempt * 1000);
        }
      }
    }

    const exhausted = new EndpointsExhaustedError(maxRetries, lastError);
    this.logger.error({ event: 'endpoints_exhausted', error_message: exhausted.message });
    throw exhausted;
  }

  recordRequest(name: string): void {
    this.rateLimiters.get(name)?.recordRequest();
  }

  recordSuccess(name: string, latencySeconds: number): void {
    const endpoint = this.endpoints.get(name);
    if (!endpoint) {
      return;
    }

    endpoint.successCount += 1;
    endpoint.totalLatency += latencySeconds;
    endpoint.lastSuccess = this.now();
    endpoint.failureCount = 0;
    endpoint.status = 'active';
  }

  recordFailure(name: string): void {
    const endpoint = this.endpoints.get(name);
    if (!endpoint) {
      return;
    }

    endpoint.failureCount += 1;
    endpoint.totalFailureCount += 1;
    endpoint.lastFailure = this.now();

    if (endpoint.failureCount >= failureThreshold && endpoint.status !== 'failed') {
      endpoint.status = 'failed';
      this.logger.error({
        event: 'endpoint_marked_failed',
        endpoint: endpoint.name,
        consecutive_failures: endpoint.failureCount,
      });
    }
  }

  getStats(): RegistryStats {
    const endpoints: Record<string, EndpointStats> = {};

    for (const endpoint of this.endpoints.values()) {
      const limiter = this.rateLimiters.get(endpoint.name);
      endpoints[endpoint.name] = {
        status: endpoint.status,
        priority: endpoint.priority,
        successCount: endpoint.successCount,
        failureCount: endpoint.totalFailureCount,
        consecutiveFailures: endpoint.failureCount,
        successRate: endpointSuccessRate(endpoint),
        avgLatency: endpointAvgLatency(endpoint),
        rateLimit: `${limiter?.inWindow() ?? 0}/${endpoint.maxRequestsPerMinute}`,
      };
    }

    return {
      totalEndpoints: this.endpoints.size,
      endpoints,
    };
  }

  resetStats(): void {
    for (const endpoint of this.endpoints.values()) {
      endpoint.successCount = 0;
      endpoint.failureCount = 0;
      endpoint.totalFailureCount = 0;
      endpoint.totalLatency = 0;
      endpoint.status = 'active';
    }

    this.logger.info({ event: 'endpoint_stats_reset' });
  }

  // false while a failed endpoint is cooling down; reactivates it once the window has passed
  private releaseCooldown(endpoint: ApiEndpoint): boolean {
    if (endpoint.status !== 'failed') {
      return true;
    }

    if (this.now() - endpoint.lastFailure < failureCooldownMs) {
      return false;
    }

    endpoint.status = 'active';
    endpoint.failureCount = 0;

    this.logger.info({ event: 'endpoint_reactivated', endpoint: endpoint.name });
    return true;
  }
}

export function registerEndpointsFromConfig(registry: EndpointRegistry, endpoints: readonly EndpointConfig[]): void {
  for (const endpoint of endpoints) {
    registry.addEndpoint(endpoint);
  }
}

function compareEndpoints(left: ApiEndpoint, right: ApiEndpoint): number {
  if (left.priority !== right.priority) {
    return right.priority - left.priority;
  }

  const successRateDelta = endpointSuccessRate(right) - endpointSuccessRate(left);
  if (successRateDelta !== 0) {
    return successRateDelta;
  }

  return endpointAvgLatency(left) - endpointAvgLatency(right);
}

function minBy<T>(values: readonly T[], score: (value: T) => number): T | null {
  let best: T | null = null;
  let bestScore = Number.POSITIVE_INFINITY;

  for (const value of values) {
    const valueScore = score(value);
    if (best === null || valueScore < bestScore) {
      best = value;
      bestScore = valueScore;
    }
  }

  return best;
}
