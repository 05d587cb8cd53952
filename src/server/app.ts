import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';

import type { EndpointRegistry } from '../runtime/endpoint-registry.js';
import type { ProviderRouter } from '../runtime/provider-router.js';
import {
  type ApiErrorResponse,
  providersHealthResponseSchema,
  schedulerJobParamsSchema,
  schedulerJobsResponseSchema,
  triggerSchedulerJobResponseSchema,
} from '../shared/api-contracts.js';
import { toErrorMessage } from '../shared/errors.js';
import { registerTaskRoutes } from './app-task-routes.js';
import type { IntervalScheduler } from './interval-scheduler.js';
import type { TaskStore } from './task-store.js';

interface AppOptions {
  taskStore: TaskStore;
  scheduler?: IntervalScheduler;
  router?: ProviderRouter;
  endpointRegistry?: EndpointRegistry;
  logger?: FastifyBaseLogger;
}

export function createApp(options: AppOptions): FastifyInstance {
  let app: FastifyInstance;

  if (options.logger) {
    app = Fastify({
      loggerInstance: options.logger,
      disableRequestLogging: true,
    });
  } else {
    app = Fastify({ logger: false });
  }

  const requestStartedAt = new WeakMap<object, bigint>();

  app.addHook('onRequest', async (request) => {
    requestStartedAt.set(request, process.hrtime.bigint());
  });

  app.addHook('onError', async (request, reply, error) => {
    request.log.error({
      event: 'http_request_failed',
      request_id: request.id,
      method: request.method,
      route: request.routeOptions.url,
      status_code: reply.statusCode,
      err: error,
    });
  });

  app.addHook('onResponse', async (request, reply) => {
    const startedAt = requestStartedAt.get(request);
    requestStartedAt.delete(request);

    request.log.info({
      event: 'http_request_completed',
      request_id: request.id,
      method: request.method,
      route: request.routeOptions.url,
      url: request.url,
      status_code: reply.statusCode,
      duration_ms: startedAt === undefined ? null : Number(process.hrtime.bigint() - startedAt) / 1_000_000,
    });
  });

  app.get('/healthz', async () => {
    return { ok: true };
  });

  registerTaskRoutes(app, {
    taskStore: options.taskStore,
    errorResponse,
    toErrorMessage,
  });

  app.get('/v1/scheduler/jobs', async (_request, reply) => {
    const scheduler = options.scheduler;
    if (!scheduler) {
      return reply.status(501).send(errorResponse('scheduler_unavailable', 'scheduler is not configured'));
    }

    return reply.send(
      schedulerJobsResponseSchema.parse({
        jobs: scheduler.snapshot().map((job) => ({
          name: job.name,
          interval_seconds: job.intervalSeconds,
          enabled: job.enabled,
          last_run_at: epochMsToIso(job.lastRun),
          tags: job.tags,
          metadata: job.metadata,
        })),
      }),
    );
  });

  app.post('/v1/scheduler/jobs/:name/trigger', async (request, reply) => {
    const scheduler = options.scheduler;
    if (!scheduler) {
      return reply.status(501).send(errorResponse('scheduler_unavailable', 'scheduler is not configured'));
    }

    const paramsResult = schedulerJobParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(errorResponse('invalid_job_name', paramsResult.error.issues[0]?.message));
    }

    const name = paramsResult.data.name;
    const job = scheduler.snapshot().find((candidate) => candidate.name === name);
    if (!job) {
      return reply.status(404).send(errorResponse('scheduler_job_not_found', `job ${name} not found`));
    }

    if (!job.enabled) {
      return reply.status(409).send(errorResponse('scheduler_job_disabled', `job ${name} is disabled`));
    }

    try {
      const result = await scheduler.triggerNow(name);
      return reply.send(triggerSchedulerJobResponseSchema.parse({ name, result: result ?? null }));
    } catch (error) {
      return reply.status(500).send(errorResponse('scheduler_job_failed', toErrorMessage(error)));
    }
  });

  app.get('/v1/providers/health', async (_request, reply) => {
    const router = options.router;
    if (!router) {
      return reply.status(501).send(errorResponse('providers_unavailable', 'provider router is not configured'));
    }

    const providers = Object.fromEntries(
      Object.entries(router.healthSnapshot()).map(([name, health]) => [
        name,
        {
          ok: health.ok,
          last_error: health.lastError,
          last_checked_at: epochMsToIso(health.lastTs),
        },
      ]),
    );

    const endpointStats = options.endpointRegistry?.getStats().endpoints ?? {};
    const endpoints = Object.fromEntries(
      Object.entries(endpointStats).map(([name, stats]) => [
        name,
        {
          status: stats.status,
          priority: stats.priority,
          success_count: stats.successCount,
          failure_count: stats.failureCount,
          consecutive_failures: stats.consecutiveFailures,
          success_rate: stats.successRate,
          avg_latency_seconds: stats.avgLatency,
          rate_limit: stats.rateLimit,
        },
      ]),
    );

    return reply.send(providersHealthResponseSchema.parse({ providers, endpoints }));
  });

  return app;
}

function epochMsToIso(value: number): string | null {
  return value > 0 ? new Date(value).toISOString() : null;
}

function errorResponse(code: string, message?: string): ApiErrorResponse {
  return {
    error: {
      code,
      message: message ?? 'request failed',
    },
  };
}
