import { z } from 'zod';

import type { ProviderRouter } from '../runtime/provider-router.js';
import { taskPriorities } from '../shared/api-contracts.js';
import type { TaskStore } from './task-store.js';
import type { PublishTaskInput, TaskRecord } from './task-types.js';

export const taskTypes = [
  'market_analysis',
  'personal_analysis',
  'report_generation',
  'ai_call',
  'notification',
  'data_fetch',
  'storage_save',
  'custom',
] as const;

export type TaskType = (typeof taskTypes)[number];

export const outputFormats = ['json', 'markdown', 'html'] as const;

export type OutputFormat = (typeof outputFormats)[number];

export interface TaskPayload {
  taskType: TaskType;
  action: string;
  params: Record<string, unknown>;
  context: Record<string, unknown> | null;
  outputFormat: OutputFormat;
  storageTarget: string | null;
  notifyOnComplete: boolean;
}

export interface ExecutionResult {
  success: boolean;
  output: unknown;
  error: string | null;
  executionTimeMs: number;
  metadata: Record<string, unknown>;
}

export interface TaskHandler {
  readonly taskType: TaskType;
  canHandle(payload: TaskPayload): boolean;
  execute(payload: TaskPayload, task: TaskRecord): Promise<ExecutionResult>;
}

// Unknown or malformed fields fall back to their defaults instead of rejecting the task.
const taskPayloadSchema = z.object({
  task_type: z.enum(taskTypes).catch('custom'),
  action: z.string().catch(''),
  params: z.record(z.unknown()).catch({}),
  context: z.record(z.unknown()).nullable().catch(null),
  output_format: z.enum(outputFormats).catch('json'),
  storage_target: z.string().nullable().catch(null),
  notify_on_complete: z.boolean().catch(false),
});

export function parseTaskPayload(raw: Record<string, unknown>): TaskPayload {
  const parsed = taskPayloadSchema.parse(raw);

  return {
    taskType: parsed.task_type,
    action: parsed.action,
    params: parsed.params,
    context: parsed.context,
    outputFormat: parsed.output_format,
    storageTarget: parsed.storage_target,
    notifyOnComplete: parsed.notify_on_complete,
  };
}

export function serializeTaskPayload(payload: TaskPayload): Record<string, unknown> {
  return {
    task_type: payload.taskType,
    action: payload.action,
    params: payload.params,
    context: payload.context,
    output_format: payload.outputFormat,
    storage_target: payload.storageTarget,
    notify_on_complete: payload.notifyOnComplete,
  };
}

export function normalizeTaskType(value: string): TaskType {
  return taskTypes.find((taskType) => taskType === value) ?? 'custom';
}

export class HandlerRegistry {
  private readonly byType = new Map<TaskType, TaskHandler>();
  private readonly customHandlers: TaskHandler[] = [];

  register(handler: TaskHandler): void {
    if (handler.taskType === 'custom') {
      this.customHandlers.push(handler);
      return;
    }

    if (this.byType.has(handler.taskType)) {
      throw new Error(`a handler for task type ${handler.taskType} is already registered`);
    }

    this.byType.set(handler.taskType, handler);
  }

  find(payload: TaskPayload): TaskHandler | null {
    const handler = this.byType.get(payload.taskType);
    if (handler?.canHandle(payload)) {
      return handler;
    }

    return this.customHandlers.find((candidate) => candidate.canHandle(payload)) ?? null;
  }

  registeredTypes(): TaskType[] {
    const types = [...this.byType.keys()];
    return this.customHandlers.length > 0 ? [...types, 'custom'] : types;
  }
}

export const aiRoles = ['ai_reasoning', 'ai_writer', 'ai_memory', 'ai_research', 'ai_critic'] as const;
export type AiRole = (typeof aiRoles)[number];

export interface AiRolePreset {
  system: string;
  maxTokens: number;
  temperature: number;
}

export const aiRolePresets: Record<AiRole, AiRolePreset> = {
  ai_reasoning: {
    system:
      'You are a quantitative strategy analyst. Reason step by step, assess risk explicitly and state your assumptions.',
    maxTokens: 1024,
    temperature: 0.3,
  },
  ai_writer: {
    system: 'You are a financial report writer. Produce clear, well-structured prose for the requested audience.',
    maxTokens: 2048,
    temperature: 0.7,
  },
  ai_memory: {
    system: 'You are a trading behaviour analyst. Summarise long histories and surface recurring patterns.',
    maxTokens: 2048,
    temperature: 0.5,
  },
  ai_research: {
    system: 'You are a crypto market researcher. Summarise the material provided and cite what each claim rests on.',
    maxTokens: 1024,
    temperature: 0.5,
  },
  ai_critic: {
    system: 'You are a strict risk reviewer. Look for flaws, missing checks and counter-examples in the proposal.',
    maxTokens: 1024,
    temperature: 0.4,
  },
};

const defaultAiRole: AiRole = 'ai_reasoning';

/** Accepts `ai_writer` or the short form `writer`; `null` for anything else. */
export function resolveAiRole(value: unknown): AiRole | null {
  if (value === undefined || value === null) {
    return defaultAiRole;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.trim().toLowerCase();
  const qualified = normalized.startsWith('ai_') ? normalized : `ai_${normalized}`;
  return aiRoles.find((role) => role === qualified) ?? null;
}

export function promptWithContext(prompt: string, context: Record<string, unknown> | null): string {
  if (!context || Object.keys(context).length === 0) {
    return prompt;
  }

  return `${prompt}\n\n### Context\n\`\`\`json\n${JSON.stringify(context, null, 2)}\n\`\`\``;
}

interface AiCallHandlerOptions {
  now?: () => number;
}

export class AiCallHandler implements TaskHandler {
  readonly taskType = 'ai_call';

  private readonly now: () => number;

  constructor(
    private readonly router: ProviderRouter,
    options: AiCallHandlerOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  canHandle(payload: TaskPayload): boolean {
    return payload.taskType === this.taskType;
  }

  async execute(payload: TaskPayload): Promise<ExecutionResult> {
    const startedAt = this.now();
    const prompt = readString(payload.params.prompt);

    if (!prompt) {
      return this.declaredFailure('missing prompt parameter', startedAt);
    }

    const role = resolveAiRole(payload.params.role);
    if (!role) {
      return this.declaredFailure(`unknown role ${String(payload.params.role)}`, startedAt);
    }

    const preset = aiRolePresets[role];
    const response = await this.router.generate({
      prompt: promptWithContext(prompt, payload.context),
      system: readString(payload.params.system) ?? preset.system,
      maxTokens: readNumber(payload.params.max_tokens) ?? preset.maxTokens,
      temperature: readNumber(payload.params.temperature) ?? preset.temperature,
      prefer: readString(payload.params.prefer) ?? readString(payload.params.forced_endpoint) ?? undefined,
    });

    const output = {
      content: response.content,
      provider: response.provider,
      model: response.model,
      role,
    };

    return {
      success: response.success,
      output,
      error: response.success ? null : describeProviderErrors(response.errors),
      executionTimeMs: this.now() - startedAt,
      metadata: {
        latency_ms: response.latencyMs,
        provider_errors: response.errors,
      },
    };
  }

  private declaredFailure(error: string, startedAt: number): ExecutionResult {
    return {
      success: false,
      output: null,
      error,
      executionTimeMs: this.now() - startedAt,
      metadata: {},
    };
  }
}

export type TaskFunction = (payload: TaskPayload, task: TaskRecord) => Promise<unknown>;

interface FunctionTaskHandlerOptions {
  canHandle?: (payload: TaskPayload) => boolean;
  now?: () => number;
}

// Wraps an external collaborator; thrown errors reach the executor untouched.
export class FunctionTaskHandler implements TaskHandler {
  private readonly matches: (payload: TaskPayload) => boolean;
  private readonly now: () => number;

  constructor(
    readonly taskType: TaskType,
    private readonly fn: TaskFunction,
    options: FunctionTaskHandlerOptions = {},
  ) {
    this.matches = options.canHandle ?? ((payload) => payload.taskType === taskType);
    this.now = options.now ?? Date.now;
  }

  canHandle(payload: TaskPayload): boolean {
    return this.matches(payload);
  }

  async execute(payload: TaskPayload, task: TaskRecord): Promise<ExecutionResult> {
    const startedAt = this.now();
    const output = await this.fn(payload, task);

    return {
      success: true,
      output,
      error: null,
      executionTimeMs: this.now() - startedAt,
      metadata: {},
    };
  }
}

export interface SubmitTaskInput extends Omit<PublishTaskInput, 'name' | 'payload'> {
  taskType: string;
  action: string;
  params?: Record<string, unknown>;
  context?: Record<string, unknown> | null;
  outputFormat?: OutputFormat;
  storageTarget?: string | null;
  notifyOnComplete?: boolean;
}

export async function submitTask(store: TaskStore, input: SubmitTaskInput): Promise<TaskRecord> {
  const { taskType: rawTaskType, action, params, context, outputFormat, storageTarget, notifyOnComplete, ...publish } =
    input;
  const taskType = normalizeTaskType(rawTaskType);

  const payload: TaskPayload = {
    taskType,
    action,
    params: params ?? {},
    context: context ?? null,
    outputFormat: outputFormat ?? 'json',
    storageTarget: storageTarget ?? null,
    notifyOnComplete: notifyOnComplete ?? false,
  };

  return store.publish({
    ...publish,
    name: `${taskType}_${action}`,
    payload: serializeTaskPayload(payload),
    priority: publish.priority ?? taskPriorities.normal,
    tags: [...new Set([...(publish.tags ?? []), taskType, action].filter((tag) => tag.length > 0))],
  });
}

function describeProviderErrors(errors: Record<string, string>): string {
  const entries = Object.entries(errors);
  if (entries.length === 0) {
    return 'no text provider is configured';
  }

  return `all providers failed: ${entries.map(([name, message]) => `${name}: ${message}`).join('; ')}`;
}

function readString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

function readNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
