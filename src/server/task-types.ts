import { taskPriorities, type taskStatuses } from '../shared/api-contracts.js';

export type TaskPriorityName = keyof typeof taskPriorities;
export type TaskPriority = (typeof taskPriorities)[TaskPriorityName];

export type TaskStatus = (typeof taskStatuses)[number];

export const terminalTaskStatuses: readonly TaskStatus[] = ['completed', 'failed', 'cancelled', 'expired'];

// Statuses a deadline sweep may move to `expired`.
export const expirableTaskStatuses: readonly TaskStatus[] = ['pending', 'acknowledged', 'running'];

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return terminalTaskStatuses.includes(status);
}

export function isTaskPriority(value: number): value is TaskPriority {
  return Object.values(taskPriorities).some((priority) => priority === value);
}

export type TaskResult = Record<string, unknown>;

export interface TaskRecord {
  taskId: string;
  name: string;
  payload: Record<string, unknown>;
  status: TaskStatus;
  priority: TaskPriority;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  completedAt: string | null;
  scheduleSeconds: number | null;
  tags: string[];
  result: TaskResult | null;
  error: string | null;
  retryCount: number;
  maxRetries: number;
  timeoutSeconds: number | null;
  expiresAt: string | null;
  dependsOn: string[];
  callbackUrl: string | null;
  callbackAttempts: number;
  callbackLastError: string | null;
}

export interface PublishTaskInput {
  name: string;
  payload?: Record<string, unknown>;
  priority?: TaskPriority;
  // Recurrence hint stored with the task; recurring work runs through the interval scheduler.
  scheduleSeconds?: number | null;
  tags?: string[];
  timeoutSeconds?: number | null;
  expiresInSeconds?: number | null;
  dependsOn?: string[];
  maxRetries?: number;
  callbackUrl?: string | null;
}

export interface ListTasksFilter {
  status?: TaskStatus;
  tags?: string[];
  priorityMin?: TaskPriority;
  limit?: number;
}

export interface UpdateTaskStatusInput {
  result?: TaskResult | null;
  error?: string | null;
}

export interface TaskStats {
  total: number;
  byStatus: Record<TaskStatus, number>;
  byPriority: Record<string, number>;
  expired: number;
  avgCompletionSeconds: number;
}
