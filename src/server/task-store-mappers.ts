import { z } from 'zod';

import { isTaskPriority, type TaskPriority, type TaskRecord, type TaskStatus } from './task-types.js';

export interface TaskRow {
  seq: number;
  task_id: string;
  name: string;
  payload: string;
  status: TaskStatus;
  priority: number;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
  schedule_seconds: number | null;
  tags: string;
  result: string | null;
  error: string | null;
  retry_count: number;
  max_retries: number;
  timeout_seconds: number | null;
  expires_at: string | null;
  depends_on: string;
  callback_url: string | null;
  callback_attempts: number;
  callback_last_error: string | null;
}

const jsonObjectSchema = z.record(z.unknown());
const stringListSchema = z.array(z.string());

export function mapTaskRow(row: TaskRow): TaskRecord {
  return {
    taskId: row.task_id,
    name: row.name,
    payload: parseJsonColumn(row.task_id, 'payload', row.payload, jsonObjectSchema),
    status: row.status,
    priority: parsePriority(row.task_id, row.priority),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    scheduleSeconds: row.schedule_seconds,
    tags: parseJsonColumn(row.task_id, 'tags', row.tags, stringListSchema),
    result: row.result === null ? null : parseJsonColumn(row.task_id, 'result', row.result, jsonObjectSchema),
    error: row.error,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    timeoutSeconds: row.timeout_seconds,
    expiresAt: row.expires_at,
    dependsOn: parseJsonColumn(row.task_id, 'depends_on', row.depends_on, stringListSchema),
    callbackUrl: row.callback_url,
    callbackAttempts: row.callback_attempts,
    callbackLastError: row.callback_last_error,
  };
}

function parsePriority(taskId: string, value: number): TaskPriority {
  if (!isTaskPriority(value)) {
    throw new Error(`task ${taskId} has unsupported priority ${value}`);
  }

  return value;
}

function parseJsonColumn<T>(taskId: string, column: string, serialized: string, schema: z.ZodType<T>): T {
  let parsed: unknown;

  try {
    parsed = JSON.parse(serialized);
  } catch (error) {
    throw new Error(
      `failed to parse task ${taskId} ${column}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`task ${taskId} ${column} has an unexpected shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }

  return result.data;
}
