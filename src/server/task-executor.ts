import { describeError, TaskStateError, toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { noopLogger } from '../shared/logger.js';
import { type ExecutionResult, type HandlerRegistry, parseTaskPayload, type TaskHandler, type TaskPayload } from './task-handlers.js';
import type { TaskStore } from './task-store.js';
import type { TaskRecord } from './task-types.js';

const defaultPollIntervalMs = 1_000;
const defaultBatchSize = 10;

export interface TaskExecutorOptions {
  pollIntervalMs?: number;
  batchSize?: number;
  logger?: Logger;
  now?: () => number;
}

type TaskOutcome = 'completed' | 'requeued' | 'failed' | 'skipped';

export interface DrainResult {
  expired: number;
  processed: number;
}

export class TaskExecutor {
  private readonly pollIntervalMs: number;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private drainInFlight: Promise<DrainResult> | null = null;

  constructor(
    private readonly store: TaskStore,
    private readonly registry: HandlerRegistry,
    options: TaskExecutorOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? defaultPollIntervalMs;
    this.batchSize = options.batchSize ?? defaultBatchSize;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    this.started = true;
    this.logger.info({ event: 'task_executor_started', poll_interval_ms: this.pollIntervalMs });

    await this.runTick();

    // stop() may have run during the first tick, or a later start() already armed the loop.
    if (!this.started || this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.runTick();
    }, this.pollIntervalMs);
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }

    this.started = false;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.drainInFlight) {
      // The caller that started the drain reports its failure.
      await this.drainInFlight.then(
        () => undefined,
        () => undefined,
      );
    }

    this.logger.info({ event: 'task_executor_stopped' });
  }

  isRunning(): boolean {
    return this.started;
  }

  async processPendingTasks(limit: number = this.batchSize): Promise<number> {
    const readyTasks = await this.store.getReadyTasks(limit);
    let processed = 0;

    for (const task of readyTasks) {
      try {
        const outcome = await this.processTask(task);
        if (outcome !== 'skipped') {
          processed += 1;
        }
      } catch (error) {
        await this.handleProcessingError(task, error);
      }
    }

    return processed;
  }

  /**
   * Expiry sweep followed by one batch. Concurrent callers (poll loop, scheduled jobs, manual triggers)
   * share the drain already in flight.
   */
  async drainOnce(): Promise<DrainResult> {
    if (this.drainInFlight) {
      return this.drainInFlight;
    }

    this.drainInFlight = (async () => {
      try {
        const expired = await this.store.cleanupExpired();
        const processed = await this.processPendingTasks();
        return { expired, processed };
      } finally {
        this.drainInFlight = null;
      }
    })();

    return this.drainInFlight;
  }

  private async runTick(): Promise<void> {
    if (!this.started) {
      return;
    }

    try {
      const { processed } = await this.drainOnce();
      if (processed > 0) {
        this.logger.info({ event: 'task_executor_batch_processed', processed });
      }
    } catch (error) {
      this.logger.error({ event: 'task_executor_tick_failed', error_message: describeError(error) });
    }
  }

  private async processTask(task: TaskRecord): Promise<TaskOutcome> {
    const running = await this.store.claimTask(task.taskId);
    if (!running) {
      this.logger.debug({ event: 'task_claim_skipped', task_id: task.taskId });
      return 'skipped';
    }

    const payload = parseTaskPayload(running.payload);
    const handler = this.registry.find(payload);

    if (!handler) {
      const errorMessage = `no handler registered for task type ${payload.taskType}`;
      await this.store.updateStatus(task.taskId, 'failed', { error: errorMessage });

      this.logger.warn({
        event: 'task_handler_missing',
        task_id: task.taskId,
        task_type: payload.taskType,
        action: payload.action,
      });
      return 'failed';
    }

    this.logger.debug({
      event: 'task_execution_started',
      task_id: task.taskId,
      task_type: payload.taskType,
      action: payload.action,
    });

    const result = await this.executeHandler(handler, payload, running);

    if (result.success) {
      await this.store.updateStatus(task.taskId, 'completed', {
        result: {
          output: result.output ?? null,
          execution_time_ms: result.executionTimeMs,
          metadata: result.metadata,
        },
      });

      this.logger.info({
        event: 'task_completed',
        task_id: task.taskId,
        execution_time_ms: result.executionTimeMs,
      });
      return 'completed';
    }

    const errorMessage = result.error ?? 'handler reported failure';
    const requeued = await this.store.requeueTask(task.taskId, errorMessage);
    if (requeued) {
      this.logger.warn({
        event: 'task_failed_will_retry',
        task_id: task.taskId,
        retry_count: requeued.retryCount,
        max_retries: requeued.maxRetries,
        error_message: errorMessage,
      });
      return 'requeued';
    }

    await this.store.updateStatus(task.taskId, 'failed', { error: errorMessage });

    this.logger.warn({
      event: 'task_failed',
      task_id: task.taskId,
      retry_count: running.retryCount,
      error_message: errorMessage,
    });
    return 'failed';
  }

  private async executeHandler(handler: TaskHandler, payload: TaskPayload, task: TaskRecord): Promise<ExecutionResult> {
    const startedAt = this.now();

    try {
      return await handler.execute(payload, task);
    } catch (error) {
      return {
        success: false,
        output: null,
        error: describeError(error),
        executionTimeMs: this.now() - startedAt,
        metadata: {},
      };
    }
  }

  private async handleProcessingError(task: TaskRecord, error: unknown): Promise<void> {
    if (error instanceof TaskStateError) {
      // Cancelled or expired while the handler ran; that state stands.
      this.logger.info({
        event: 'task_result_discarded',
        task_id: task.taskId,
        current_status: error.currentStatus,
      });
      return;
    }

    this.logger.error({
      event: 'task_processing_failed',
      task_id: task.taskId,
      error_message: describeError(error),
    });

    try {
      await this.store.updateStatus(task.taskId, 'failed', { error: toErrorMessage(error) });
    } catch (markError) {
      this.logger.error({
        event: 'task_mark_failed_error',
        task_id: task.taskId,
        error_message: describeError(markError),
      });
    }
  }
}
