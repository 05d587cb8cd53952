import { toErrorMessage } from '../shared/errors.js';
import type { TaskRecord } from './task-types.js';

export interface TaskCallbackEnvelope {
  task_id: string;
  status: string;
  result: Record<string, unknown> | null;
  error: string | null;
  updated_at: string;
  name: string;
  priority: number;
}

export interface CallbackDelivery {
  ok: boolean;
  error: string | null;
}

export interface CallbackNotifier {
  notify(url: string, envelope: TaskCallbackEnvelope): Promise<CallbackDelivery>;
}

export function callbackEnvelopeForTask(task: TaskRecord): TaskCallbackEnvelope {
  return {
    task_id: task.taskId,
    status: task.status,
    result: task.result,
    error: task.error,
    updated_at: task.updatedAt,
    name: task.name,
    priority: task.priority,
  };
}

interface HttpCallbackNotifierOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// At most one POST per terminal transition; failures are reported, never retried.
export class HttpCallbackNotifier implements CallbackNotifier {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCallbackNotifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async notify(url: string, envelope: TaskCallbackEnvelope): Promise<CallbackDelivery> {
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
        },
        body: JSON.stringify(envelope),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.ok) {
        return { ok: true, error: null };
      }

      const body = await response.text();
      return { ok: false, error: `${response.status}: ${body.slice(0, 200)}` };
    } catch (error) {
      return { ok: false, error: toErrorMessage(error) };
    }
  }
}
