import { taskPriorities } from '../shared/api-contracts.js';
import { TaskStateError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { noopLogger } from '../shared/logger.js';
import type { SqliteDatabase } from './sqlite.js';
import { callbackEnvelopeForTask, type CallbackNotifier, HttpCallbackNotifier } from './task-callback.js';
import { mapTaskRow, type TaskRow } from './task-store-mappers.js';
import {
  expirableTaskStatuses,
  isTaskPriority,
  isTerminalTaskStatus,
  type ListTasksFilter,
  type PublishTaskInput,
  type TaskRecord,
  type TaskStats,
  type TaskStatus,
  type UpdateTaskStatusInput,
} from './task-types.js';

export interface TaskStore {
  publish(input: PublishTaskInput): Promise<TaskRecord>;
  publishBatch(inputs: PublishTaskInput[]): Promise<TaskRecord[]>;
  getTask(taskId: string): Promise<TaskRecord | null>;
  listTasks(filter?: ListTasksFilter): Promise<TaskRecord[]>;
  updateStatus(taskId: string, status: TaskStatus, input?: UpdateTaskStatusInput): Promise<TaskRecord | null>;
  claimTask(taskId: string): Promise<TaskRecord | null>;
  retryTask(taskId: string): Promise<TaskRecord | null>;
  requeueTask(taskId: string, reason: string): Promise<TaskRecord | null>;
  cancelTask(taskId: string): Promise<TaskRecord | null>;
  cleanupExpired(): Promise<number>;
  getReadyTasks(limit?: number): Promise<TaskRecord[]>;
  recoverInterruptedTasks(): Promise<number>;
  getStats(): Promise<TaskStats>;
}

export interface SqliteTaskStoreOptions {
  notifier?: CallbackNotifier;
  logger?: Logger;
  now?: () => Date;
}

const orderByReadiness = 'ORDER BY priority DESC, created_at ASC, seq ASC';

export class SqliteTaskStore implements TaskStore {
  private readonly notifier: CallbackNotifier;
  private readonly logger: Logger;
  private readonly now: () => Date;

  // Every operation runs after the previous one settles, including awaited callback delivery.
  private operationTail: Promise<void> = Promise.resolve();

  constructor(
    private readonly database: SqliteDatabase,
    options: SqliteTaskStoreOptions = {},
  ) {
    this.notifier = options.notifier ?? new HttpCallbackNotifier();
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  async publish(input: PublishTaskInput): Promise<TaskRecord> {
    const [task] = await this.publishBatch([input]);
    if (!task) {
      throw new Error('task was published but could not be loaded');
    }

    return task;
  }

  async publishBatch(inputs: PublishTaskInput[]): Promise<TaskRecord[]> {
    return this.exclusive(() => {
      const publishedAt = this.now();
      const insertAll = this.database.transaction((pending: PublishTaskInput[]) =>
        pending.map((input) => this.insertTask(input, publishedAt)),
      );

      const tasks = insertAll.immediate(inputs);

      for (const task of tasks) {
        this.logger.info({
          event: 'task_published',
          task_id: task.taskId,
          task_name: task.name,
          priority: task.priority,
          depends_on: task.dependsOn,
          expires_at: task.expiresAt,
        });
      }

      return tasks;
    });
  }

  async getTask(taskId: string): Promise<TaskRecord | null> {
    return this.exclusive(() => this.loadTask(taskId));
  }

  async listTasks(filter: ListTasksFilter = {}): Promise<TaskRecord[]> {
    return this.exclusive(() => {
      const clauses: string[] = [];
      const params: Array<string | number> = [];

      if (filter.status) {
        clauses.push('status = ?');
        params.push(filter.status);
      }

      if (filter.priorityMin !== undefined) {
        clauses.push('priority >= ?');
        params.push(filter.priorityMin);
      }

      if (filter.tags && filter.tags.length > 0) {
        clauses.push(`EXISTS (SELECT 1 FROM json_each(tasks.tags) WHERE json_each.value IN (${placeholders(filter.tags)}))`);
        params.push(...filter.tags);
      }

      const whereClause = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
      const limitClause = filter.limit && filter.limit > 0 ? 'LIMIT ?' : '';
      if (limitClause) {
        params.push(Math.trunc(filter.limit ?? 0));
      }

      const rows = this.database
        .prepare<unknown[], TaskRow>(`SELECT * FROM tasks ${whereClause} ${orderByReadiness} ${limitClause}`)
        .all(...params);

      return rows.map(mapTaskRow);
    });
  }

  async updateStatus(
    taskId: string,
    status: TaskStatus,
    input: UpdateTaskStatusInput = {},
  ): Promise<TaskRecord | null> {
    return this.exclusive(() => this.transition(taskId, status, input));
  }

  // Only one consumer wins: a task already claimed, finished or past its deadline yields null.
  async claimTask(taskId: string): Promise<TaskRecord | null> {
    return this.exclusive(() => {
      const task = this.loadTask(taskId);
      if (!task || (task.status !== 'pending' && task.status !== 'acknowledged')) {
        return null;
      }

      if (task.expiresAt !== null && Date.parse(task.expiresAt) < this.now().getTime()) {
        return null;
      }

      return this.transition(taskId, 'running', {});
    });
  }

  async retryTask(taskId: string): Promise<TaskRecord | null> {
    return this.exclusive(() => {
      const task = this.loadTask(taskId);
      if (!task || task.status !== 'failed') {
        return null;
      }

      if (task.retryCount >= task.maxRetries) {
        this.logger.warn({
          event: 'task_retry_budget_exhausted',
          task_id: taskId,
          retry_count: task.retryCount,
          max_retries: task.maxRetries,
        });
        return null;
      }

      const retried = this.returnToPending(task, task.retryCount + 1);
      this.logger.info({ event: 'task_retried', task_id: taskId, retry_count: retried.retryCount });
      return retried;
    });
  }

  async requeueTask(taskId: string, reason: string): Promise<TaskRecord | null> {
    return this.exclusive(() => {
      const task = this.loadTask(taskId);
      if (!task || task.status !== 'running' || task.retryCount >= task.maxRetries) {
        return null;
      }

      const requeued = this.returnToPending(task, task.retryCount + 1);
      this.logger.info({
        event: 'task_requeued',
        task_id: taskId,
        retry_count: requeued.retryCount,
        max_retries: requeued.maxRetries,
        reason,
      });
      return requeued;
    });
  }

  async cancelTask(taskId: string): Promise<TaskRecord | null> {
    return this.updateStatus(taskId, 'cancelled');
  }

  async cleanupExpired(): Promise<number> {
    return this.exclusive(async () => {
      const nowIso = this.now().toISOString();
      const rows = this.database
        .prepare<unknown[], TaskRow>(
          `
            SELECT *
            FROM tasks
            WHERE status IN (${placeholders(expirableTaskStatuses)})
              AND expires_at IS NOT NULL
              AND expires_at < ?
            ${orderByReadiness}
          `,
        )
        .all(...expirableTaskStatuses, nowIso);

      for (const row of rows) {
        await this.transition(row.task_id, 'expired', {});
      }

      if (rows.length > 0) {
        this.logger.info({ event: 'tasks_expired', count: rows.length });
      }

      return rows.length;
    });
  }

  async getReadyTasks(limit?: number): Promise<TaskRecord[]> {
    return this.exclusive(() => {
      const nowIso = this.now().toISOString();
      const candidates = this.database
        .prepare<unknown[], TaskRow>(
          `
            SELECT *
            FROM tasks
            WHERE status = 'pending'
              AND (expires_at IS NULL OR expires_at >= ?)
            ${orderByReadiness}
          `,
        )
        .all(nowIso)
        .map(mapTaskRow);

      const completedIds = this.completedTaskIds(candidates.flatMap((task) => task.dependsOn));
      const ready = candidates.filter((task) => task.dependsOn.every((dependency) => completedIds.has(dependency)));

      return limit && limit > 0 ? ready.slice(0, limit) : ready;
    });
  }

  async recoverInterruptedTasks(): Promise<number> {
    return this.exclusive(() => {
      const result = this.database
        .prepare(`UPDATE tasks SET status = 'pending', updated_at = ? WHERE status = 'running'`)
        .run(this.now().toISOString());

      if (result.changes > 0) {
        this.logger.warn({ event: 'tasks_recovered_after_restart', count: result.changes });
      }

      return result.changes;
    });
  }

  async getStats(): Promise<TaskStats> {
    return this.exclusive(() => {
      const nowMs = this.now().getTime();
      const tasks = this.database.prepare<unknown[], TaskRow>('SELECT * FROM tasks').all().map(mapTaskRow);

      const byStatus: Record<TaskStatus, number> = {
        pending: 0,
        acknowledged: 0,
        running: 0,
        completed: 0,
        failed: 0,
        cancelled: 0,
        expired: 0,
      };
      const byPriority: Record<string, number> = {};
      const completionSeconds: number[] = [];
      let expired = 0;

      for (const task of tasks) {
        byStatus[task.status] += 1;

        const priorityKey = `priority_${task.priority}`;
        byPriority[priorityKey] = (byPriority[priorityKey] ?? 0) + 1;

        if (task.expiresAt && Date.parse(task.expiresAt) < nowMs) {
          expired += 1;
        }

        if (task.startedAt && task.completedAt) {
          completionSeconds.push((Date.parse(task.completedAt) - Date.parse(task.startedAt)) / 1000);
        }
      }

      const avgCompletionSeconds =
        completionSeconds.length > 0
          ? completionSeconds.reduce((total, value) => total + value, 0) / completionSeconds.length
          : 0;

      return {
        total: tasks.length,
        byStatus,
        byPriority,
        expired,
        avgCompletionSeconds,
      };
    });
  }

  private exclusive<T>(operation: () => T | Promise<T>): Promise<T> {
    const run = this.operationTail.then(operation);
    this.operationTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private insertTask(input: PublishTaskInput, publishedAt: Date): TaskRecord {
    const name = input.name.trim();
    if (name.length === 0) {
      throw new Error('task name must not be empty');
    }

    const priority = input.priority ?? taskPriorities.normal;
    if (!isTaskPriority(priority)) {
      throw new Error(`unsupported task priority ${String(priority)}`);
    }

    const maxRetries = input.maxRetries ?? 3;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new Error('maxRetries must be a non-negative integer');
    }

    const seqRow = this.database
      .prepare<unknown[], { next_seq: number }>('SELECT COALESCE(MAX(seq), 0) + 1 AS next_seq FROM tasks')
      .get();
    const seq = seqRow?.next_seq ?? 1;
    const taskId = `${publishedAt.getTime()}_${seq}`;
    const createdAt = publishedAt.toISOString();
    const expiresAt =
      input.expiresInSeconds && input.expiresInSeconds > 0
        ? new Date(publishedAt.getTime() + input.expiresInSeconds * 1000).toISOString()
        : null;

    this.database
      .prepare(
        `
          INSERT INTO tasks (
            seq,
            task_id,
            name,
            payload,
            status,
            priority,
            created_at,
            updated_at,
            schedule_seconds,
            tags,
            max_retries,
            timeout_seconds,
            expires_at,
            depends_on,
            callback_url
          )
          VALUES (?, ?, ?, ?, 'pending', ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `,
      )
      .run(
        seq,
        taskId,
        name,
        JSON.stringify(input.payload ?? {}),
        priority,
        createdAt,
        createdAt,
        input.scheduleSeconds ?? null,
        JSON.stringify(input.tags ?? []),
        maxRetries,
        input.timeoutSeconds ?? null,
        expiresAt,
        JSON.stringify(input.dependsOn ?? []),
        input.callbackUrl ?? null,
      );

    const created = this.loadTask(taskId);
    if (!created) {
      throw new Error(`task ${taskId} was inserted but could not be loaded`);
    }

    return created;
  }

  private async transition(
    taskId: string,
    status: TaskStatus,
    input: UpdateTaskStatusInput,
  ): Promise<TaskRecord | null> {
    const task = this.loadTask(taskId);
    if (!task) {
      return null;
    }

    if (isTerminalTaskStatus(task.status)) {
      throw new TaskStateError(taskId, task.status, status);
    }

    const nowIso = this.now().toISOString();
    const next: TaskRecord = {
      ...task,
      status,
      updatedAt: nowIso,
      startedAt: status === 'running' && task.startedAt === null ? nowIso : task.startedAt,
      completedAt: isTerminalTaskStatus(status) ? nowIso : task.completedAt,
      result: input.result !== undefined ? input.result : task.result,
      error: input.error !== undefined ? input.error : task.error,
    };

    if (isTerminalTaskStatus(status) && next.callbackUrl) {
      const delivery = await this.notifier.notify(next.callbackUrl, callbackEnvelopeForTask(next));
      next.callbackAttempts += 1;
      next.callbackLastError = delivery.error;

      if (!delivery.ok) {
        this.logger.warn({
          event: 'task_callback_failed',
          task_id: taskId,
          status,
          callback_attempts: next.callbackAttempts,
          error_message: delivery.error,
        });
      }
    }

    this.writeTask(next);

    this.logger.info({
      event: 'task_status_changed',
      task_id: taskId,
      from_status: task.status,
      to_status: status,
    });

    return next;
  }

  private returnToPending(task: TaskRecord, retryCount: number): TaskRecord {
    const next: TaskRecord = {
      ...task,
      status: 'pending',
      retryCount,
      error: null,
      completedAt: null,
      updatedAt: this.now().toISOString(),
    };

    this.writeTask(next);
    return next;
  }

  private writeTask(task: TaskRecord): void {
    this.database
      .prepare(
        `
          UPDATE tasks
          SET status = ?,
              updated_at = ?,
              started_at = ?,
              completed_at = ?,
              result = ?,
              error = ?,
              retry_count = ?,
              callback_attempts = ?,
              callback_last_error = ?
          WHERE task_id = ?
        `,
      )
      .run(
        task.status,
        task.updatedAt,
        task.startedAt,
        task.completedAt,
        task.result === null ? null : JSON.stringify(task.result),
        task.error,
        task.retryCount,
        task.callbackAttempts,
        task.callbackLastError,
        task.taskId,
      );
  }

  private loadTask(taskId: string): TaskRecord | null {
    const row = this.database.prepare<unknown[], TaskRow>('SELECT * FROM tasks WHERE task_id = ?').get(taskId);
    return row ? mapTaskRow(row) : null;
  }

  private completedTaskIds(taskIds: string[]): Set<string> {
    const uniqueIds = [...new Set(taskIds)];
    if (uniqueIds.length === 0) {
      return new Set();
    }

    const rows = this.database
      .prepare<unknown[], { task_id: string }>(
        `SELECT task_id FROM tasks WHERE status = 'completed' AND task_id IN (${placeholders(uniqueIds)})`,
      )
      .all(...uniqueIds);

    return new Set(rows.map((row) => row.task_id));
  }
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}
