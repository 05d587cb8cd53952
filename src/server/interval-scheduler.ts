import { describeError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { noopLogger } from '../shared/logger.js';

export type ScheduledJobFunction = () => unknown;

export interface ScheduledJobOptions {
  tags?: string[];
  metadata?: Record<string, unknown>;
  enabled?: boolean;
}

export interface ScheduledJobSnapshot {
  name: string;
  intervalSeconds: number;
  enabled: boolean;
  // Epoch milliseconds of the last run, 0 before the first one.
  lastRun: number;
  tags: string[];
  metadata: Record<string, unknown>;
}

interface ScheduledJob extends ScheduledJobSnapshot {
  fn: ScheduledJobFunction;
}

export interface IntervalSchedulerOptions {
  tickMs?: number;
  stopTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

const defaultTickMs = 1_000;
const defaultStopTimeoutMs = 2_000;

/**
 * Fixed-cadence runner for recurring in-process jobs.
 *
 * Due jobs run one after another inside a single tick, so a slow job delays the rest.
 */
export class IntervalScheduler {
  private readonly jobs = new Map<string, ScheduledJob>();
  private readonly tickMs: number;
  private readonly stopTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  private timer: NodeJS.Timeout | null = null;
  private tickInFlight: Promise<void> | null = null;

  constructor(options: IntervalSchedulerOptions = {}) {
    this.tickMs = options.tickMs ?? defaultTickMs;
    this.stopTimeoutMs = options.stopTimeoutMs ?? defaultStopTimeoutMs;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  addTask(name: string, intervalSeconds: number, fn: ScheduledJobFunction, options: ScheduledJobOptions = {}): void {
    if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
      throw new Error(`job ${name} interval must be a positive whole number of seconds`);
    }

    this.jobs.set(name, {
      name,
      intervalSeconds,
      fn,
      enabled: options.enabled ?? true,
      lastRun: 0,
      tags: options.tags ?? [],
      metadata: options.metadata ?? {},
    });

    this.logger.info({ event: 'scheduled_job_registered', job_name: name, interval_seconds: intervalSeconds });
  }

  setEnabled(name: string, enabled: boolean): boolean {
    const job = this.jobs.get(name);
    if (!job) {
      return false;
    }

    job.enabled = enabled;
    return true;
  }

  removeTask(name: string): boolean {
    return this.jobs.delete(name);
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.tick();
    }, this.tickMs);
    void this.tick();

    this.logger.info({ event: 'scheduler_started', tick_ms: this.tickMs, job_count: this.jobs.size });
  }

  async stop(): Promise<void> {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;

    const inFlight = this.tickInFlight;
    if (inFlight) {
      let timeout: NodeJS.Timeout | undefined;
      const timedOut = new Promise<'timeout'>((resolve) => {
        timeout = setTimeout(() => resolve('timeout'), this.stopTimeoutMs);
      });

      const outcome = await Promise.race([inFlight.then(() => 'drained' as const), timedOut]);
      clearTimeout(timeout);

      if (outcome === 'timeout') {
        this.logger.warn({ event: 'scheduler_stop_timed_out', stop_timeout_ms: this.stopTimeoutMs });
      }
    }

    this.logger.info({ event: 'scheduler_stopped' });
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  async triggerNow(name: string): Promise<unknown> {
    const job = this.jobs.get(name);
    if (!job || !job.enabled) {
      return null;
    }

    this.logger.info({ event: 'scheduled_job_triggered', job_name: name });

    try {
      return await job.fn();
    } finally {
      job.lastRun = this.now();
    }
  }

  /** Runs every enabled job that is due; overlapping calls share the tick already in flight. */
  async tick(): Promise<void> {
    if (this.tickInFlight) {
      return this.tickInFlight;
    }

    this.tickInFlight = (async () => {
      try {
        await this.runDueJobs();
      } finally {
        this.tickInFlight = null;
      }
    })();

    return this.tickInFlight;
  }

  snapshot(): ScheduledJobSnapshot[] {
    return [...this.jobs.values()].map((job) => ({
      name: job.name,
      intervalSeconds: job.intervalSeconds,
      enabled: job.enabled,
      lastRun: job.lastRun,
      tags: [...job.tags],
      metadata: { ...job.metadata },
    }));
  }

  private async runDueJobs(): Promise<void> {
    const startedAt = this.now();

    for (const job of [...this.jobs.values()]) {
      if (!job.enabled) {
        continue;
      }

      if (job.lastRun !== 0 && startedAt - job.lastRun < job.intervalSeconds * 1000) {
        continue;
      }

      try {
        await job.fn();
      } catch (error) {
        this.logger.error({
          event: 'scheduled_job_failed',
          job_name: job.name,
          error_message: describeError(error),
        });
      } finally {
        job.lastRun = this.now();
      }
    }
  }
}
