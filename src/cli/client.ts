import type { z } from 'zod';

import {
  cleanupExpiredResponseSchema,
  type PublishTaskRequest,
  providersHealthResponseSchema,
  type SubmitTaskRequest,
  schedulerJobsResponseSchema,
  taskListResponseSchema,
  taskResponseSchema,
  taskStatsResponseSchema,
  triggerSchedulerJobResponseSchema,
} from '../shared/api-contracts.js';

export type ApiTaskResponse = z.infer<typeof taskResponseSchema>;
export type ApiTaskListResponse = z.infer<typeof taskListResponseSchema>;
export type ApiTaskStatsResponse = z.infer<typeof taskStatsResponseSchema>;
export type ApiCleanupExpiredResponse = z.infer<typeof cleanupExpiredResponseSchema>;
export type ApiSchedulerJobsResponse = z.infer<typeof schedulerJobsResponseSchema>;
export type ApiTriggerSchedulerJobResponse = z.infer<typeof triggerSchedulerJobResponseSchema>;
export type ApiProvidersHealthResponse = z.infer<typeof providersHealthResponseSchema>;

export interface ListTasksQuery {
  status?: string;
  tags?: string[];
  priorityMin?: number;
  limit?: number;
}

export async function healthcheck(apiUrl: string): Promise<void> {
  const response = await fetch(`${apiUrl}/healthz`);
  if (!response.ok) {
    throw new Error(`health check failed with status ${response.status}`);
  }
}

export async function publishTask(apiUrl: string, payload: PublishTaskRequest): Promise<ApiTaskResponse> {
  const response = await fetch(`${apiUrl}/v1/tasks`, jsonPost(payload));
  return parseApiResponse(response, taskResponseSchema);
}

export async function submitTask(apiUrl: string, payload: SubmitTaskRequest): Promise<ApiTaskResponse> {
  const response = await fetch(`${apiUrl}/v1/tasks/submit`, jsonPost(payload));
  return parseApiResponse(response, taskResponseSchema);
}

export async function listTasks(apiUrl: string, query: ListTasksQuery = {}): Promise<ApiTaskListResponse> {
  const searchParams = new URLSearchParams();

  if (query.status) {
    searchParams.set('status', query.status);
  }

  for (const tag of query.tags ?? []) {
    searchParams.append('tag', tag);
  }

  if (query.priorityMin !== undefined) {
    searchParams.set('priority_min', String(query.priorityMin));
  }

  if (query.limit !== undefined) {
    searchParams.set('limit', String(query.limit));
  }

  const queryString = searchParams.toString();
  const response = await fetch(`${apiUrl}/v1/tasks${queryString ? `?${queryString}` : ''}`);
  return parseApiResponse(response, taskListResponseSchema);
}

export async function listReadyTasks(apiUrl: string, limit?: number): Promise<ApiTaskListResponse> {
  const suffix = limit === undefined ? '' : `?limit=${limit}`;
  const response = await fetch(`${apiUrl}/v1/tasks/ready${suffix}`);
  return parseApiResponse(response, taskListResponseSchema);
}

export async function getTask(apiUrl: string, taskId: string): Promise<ApiTaskResponse> {
  const response = await fetch(`${apiUrl}/v1/tasks/${encodeURIComponent(taskId)}`);
  return parseApiResponse(response, taskResponseSchema);
}

export async function retryTask(apiUrl: string, taskId: string): Promise<ApiTaskResponse> {
  const response = await fetch(`${apiUrl}/v1/tasks/${encodeURIComponent(taskId)}/retry`, { method: 'POST' });
  return parseApiResponse(response, taskResponseSchema);
}

export async function cancelTask(apiUrl: string, taskId: string): Promise<ApiTaskResponse> {
  const response = await fetch(`${apiUrl}/v1/tasks/${encodeURIComponent(taskId)}/cancel`, { method: 'POST' });
  return parseApiResponse(response, taskResponseSchema);
}

export async function getTaskStats(apiUrl: string): Promise<ApiTaskStatsResponse> {
  const response = await fetch(`${apiUrl}/v1/tasks/stats`);
  return parseApiResponse(response, taskStatsResponseSchema);
}

export async function cleanupExpiredTasks(apiUrl: string): Promise<ApiCleanupExpiredResponse> {
  const response = await fetch(`${apiUrl}/v1/tasks/cleanup-expired`, { method: 'POST' });
  return parseApiResponse(response, cleanupExpiredResponseSchema);
}

export async function listSchedulerJobs(apiUrl: string): Promise<ApiSchedulerJobsResponse> {
  const response = await fetch(`${apiUrl}/v1/scheduler/jobs`);
  return parseApiResponse(response, schedulerJobsResponseSchema);
}

export async function triggerSchedulerJob(apiUrl: string, name: string): Promise<ApiTriggerSchedulerJobResponse> {
  const response = await fetch(`${apiUrl}/v1/scheduler/jobs/${encodeURIComponent(name)}/trigger`, {
    method: 'POST',
  });
  return parseApiResponse(response, triggerSchedulerJobResponseSchema);
}

export async function getProvidersHealth(apiUrl: string): Promise<ApiProvidersHealthResponse> {
  const response = await fetch(`${apiUrl}/v1/providers/health`);
  return parseApiResponse(response, providersHealthResponseSchema);
}

function jsonPost(payload: unknown): RequestInit {
  return {
    method: 'POST',
    headers: {
      'content-type': 'application/json',
    },
    body: JSON.stringify(payload),
  };
}

async function parseApiResponse<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.infer<T>> {
  const responseBody = await parseJsonResponse(response);

  if (!response.ok) {
    const message =
      responseBody && typeof responseBody === 'object'
        ? extractErrorMessage(responseBody, response.status)
        : `request failed with status ${response.status}`;
    throw new Error(message);
  }

  return schema.parse(responseBody);
}

async function parseJsonResponse(response: Response): Promise<unknown> {
  return response.json().catch(() => null);
}

function extractErrorMessage(responseBody: object, status: number): string {
  const fallback = `request failed with status ${status}`;
  if (!('error' in responseBody)) {
    return fallback;
  }

  const error = responseBody.error;
  if (!error || typeof error !== 'object') {
    return fallback;
  }

  return 'message' in error && typeof error.message === 'string' ? error.message : fallback;
}
