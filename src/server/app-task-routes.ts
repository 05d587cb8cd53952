import type { FastifyInstance } from 'fastify';

import {
  type ApiErrorResponse,
  cleanupExpiredResponseSchema,
  publishTaskRequestSchema,
  readyTasksQuerySchema,
  submitTaskRequestSchema,
  type TaskResponse,
  taskListQuerySchema,
  taskListResponseSchema,
  taskParamsSchema,
  taskResponseSchema,
  taskStatsResponseSchema,
} from '../shared/api-contracts.js';
import { TaskStateError } from '../shared/errors.js';
import { submitTask } from './task-handlers.js';
import type { TaskStore } from './task-store.js';
import type { TaskRecord } from './task-types.js';

interface TaskRoutesDependencies {
  taskStore: TaskStore;
  errorResponse: (code: string, message?: string) => ApiErrorResponse;
  toErrorMessage: (error: unknown) => string;
}

export function registerTaskRoutes(app: FastifyInstance, dependencies: TaskRoutesDependencies): void {
  const { taskStore, errorResponse, toErrorMessage } = dependencies;

  app.post('/v1/tasks', async (request, reply) => {
    const bodyResult = publishTaskRequestSchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.status(400).send(errorResponse('invalid_task_payload', bodyResult.error.issues[0]?.message));
    }

    const body = bodyResult.data;

    try {
      const task = await taskStore.publish({
        name: body.name,
        payload: body.payload,
        priority: body.priority,
        scheduleSeconds: body.schedule_seconds ?? null,
        tags: body.tags,
        timeoutSeconds: body.timeout_seconds ?? null,
        expiresInSeconds: body.expires_in_seconds ?? null,
        dependsOn: body.depends_on,
        maxRetries: body.max_retries,
        callbackUrl: body.callback_url ?? null,
      });

      return reply.status(201).send(taskResponseSchema.parse({ task: taskResponse(task) }));
    } catch (error) {
      return reply.status(400).send(errorResponse('task_publish_error', toErrorMessage(error)));
    }
  });

  app.post('/v1/tasks/submit', async (request, reply) => {
    const bodyResult = submitTaskRequestSchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.status(400).send(errorResponse('invalid_task_payload', bodyResult.error.issues[0]?.message));
    }

    const body = bodyResult.data;

    try {
      const task = await submitTask(taskStore, {
        taskType: body.task_type,
        action: body.action,
        params: body.params,
        context: body.context ?? null,
        outputFormat: body.output_format,
        storageTarget: body.storage_target ?? null,
        notifyOnComplete: body.notify_on_complete,
        priority: body.priority,
        scheduleSeconds: body.schedule_seconds ?? null,
        tags: body.tags,
        timeoutSeconds: body.timeout_seconds ?? null,
        expiresInSeconds: body.expires_in_seconds ?? null,
        dependsOn: body.depends_on,
        maxRetries: body.max_retries,
        callbackUrl: body.callback_url ?? null,
      });

      return reply.status(201).send(taskResponseSchema.parse({ task: taskResponse(task) }));
    } catch (error) {
      return reply.status(400).send(errorResponse('task_submit_error', toErrorMessage(error)));
    }
  });

  app.get('/v1/tasks', async (request, reply) => {
    const queryResult = taskListQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      return reply.status(400).send(errorResponse('invalid_task_query', queryResult.error.issues[0]?.message));
    }

    const tasks = await taskStore.listTasks({
      status: queryResult.data.status,
      tags: queryResult.data.tag,
      priorityMin: queryResult.data.priority_min,
      limit: queryResult.data.limit,
    });

    return reply.send(taskListResponseSchema.parse({ tasks: tasks.map(taskResponse) }));
  });

  app.get('/v1/tasks/ready', async (request, reply) => {
    const queryResult = readyTasksQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      return reply.status(400).send(errorResponse('invalid_task_query', queryResult.error.issues[0]?.message));
    }

    const tasks = await taskStore.getReadyTasks(queryResult.data.limit);
    return reply.send(taskListResponseSchema.parse({ tasks: tasks.map(taskResponse) }));
  });

  app.get('/v1/tasks/stats', async (_request, reply) => {
    const stats = await taskStore.getStats();

    return reply.send(
      taskStatsResponseSchema.parse({
        total: stats.total,
        by_status: stats.byStatus,
        by_priority: stats.byPriority,
        expired: stats.expired,
        avg_completion_seconds: stats.avgCompletionSeconds,
      }),
    );
  });

  app.post('/v1/tasks/cleanup-expired', async (_request, reply) => {
    const cleaned = await taskStore.cleanupExpired();
    return reply.send(cleanupExpiredResponseSchema.parse({ cleaned }));
  });

  app.get('/v1/tasks/:task_id', async (request, reply) => {
    const paramsResult = taskParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(errorResponse('invalid_task_id', paramsResult.error.issues[0]?.message));
    }

    const task = await taskStore.getTask(paramsResult.data.task_id);
    if (!task) {
      return reply.status(404).send(errorResponse('task_not_found', `task ${paramsResult.data.task_id} not found`));
    }

    return reply.send(taskResponseSchema.parse({ task: taskResponse(task) }));
  });

  app.post('/v1/tasks/:task_id/retry', async (request, reply) => {
    const paramsResult = taskParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(errorResponse('invalid_task_id', paramsResult.error.issues[0]?.message));
    }

    const taskId = paramsResult.data.task_id;
    const existing = await taskStore.getTask(taskId);
    if (!existing) {
      return reply.status(404).send(errorResponse('task_not_found', `task ${taskId} not found`));
    }

    const retried = await taskStore.retryTask(taskId);
    if (!retried) {
      return reply
        .status(409)
        .send(
          errorResponse(
            'task_not_retryable',
            `task ${taskId} cannot be retried (status ${existing.status}, retries ${existing.retryCount}/${existing.maxRetries})`,
          ),
        );
    }

    return reply.send(taskResponseSchema.parse({ task: taskResponse(retried) }));
  });

  app.post('/v1/tasks/:task_id/cancel', async (request, reply) => {
    const paramsResult = taskParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(errorResponse('invalid_task_id', paramsResult.error.issues[0]?.message));
    }

    const taskId = paramsResult.data.task_id;

    try {
      const cancelled = await taskStore.cancelTask(taskId);
      if (!cancelled) {
        return reply.status(404).send(errorResponse('task_not_found', `task ${taskId} not found`));
      }

      return reply.send(taskResponseSchema.parse({ task: taskResponse(cancelled) }));
    } catch (error) {
      if (error instanceof TaskStateError) {
        return reply.status(409).send(errorResponse('task_state_conflict', error.message));
      }

      throw error;
    }
  });
}

export function taskResponse(task: TaskRecord): TaskResponse {
  return {
    task_id: task.taskId,
    name: task.name,
    payload: task.payload,
    status: task.status,
    priority: task.priority,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    started_at: task.startedAt,
    completed_at: task.completedAt,
    schedule_seconds: task.scheduleSeconds,
    tags: task.tags,
    result: task.result,
    error: task.error,
    retry_count: task.retryCount,
    max_retries: task.maxRetries,
    timeout_seconds: task.timeoutSeconds,
    expires_at: task.expiresAt,
    depends_on: task.dependsOn,
    callback_url: task.callbackUrl,
    callback_attempts: task.callbackAttempts,
    callback_last_error: task.callbackLastError,
  };
}
