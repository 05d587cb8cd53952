import { Command } from 'commander';
import { afterEach, describe, expect, test, vi } from 'vitest';

import type { ApiTaskResponse } from '../src/cli/client.js';
import { registerTaskCommands } from '../src/cli/task-commands.js';

const apiUrl = 'http://127.0.0.1:31515';

function taskFixture(overrides: Partial<ApiTaskResponse['task']> = {}): ApiTaskResponse {
  return {
    task: {
      task_id: '1772359200000_1',
      name: 'digest',
      payload: {},
      status: 'pending',
      priority: 2,
      created_at: '2026-03-01T10:00:00.000Z',
      updated_at: '2026-03-01T10:00:00.000Z',
      started_at: null,
      completed_at: null,
      schedule_seconds: null,
      tags: [],
      result: null,
      error: null,
      retry_count: 0,
      max_retries: 3,
      timeout_seconds: null,
      expires_at: null,
      depends_on: [],
      callback_url: null,
      callback_attempts: 0,
      callback_last_error: null,
      ...overrides,
    },
  };
}

function createProgram(): Command {
  const program = new Command();
  program.option('--api-url <url>', 'api', apiUrl);
  program.exitOverride();
  return program;
}

describe('registerTaskCommands', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('publish forwards payload and queue options and prints JSON', async () => {
    const publishTaskImpl = vi.fn().mockResolvedValue(taskFixture({ priority: 4 }));
    const printJsonImpl = vi.fn();

    const program = createProgram();
    registerTaskCommands(program, { publishTaskImpl, printJsonImpl });

    await program.parseAsync(
      [
        'node',
        'backlane',
        'task',
        'publish',
        'digest',
        '--payload',
        '{"topic":"weekly"}',
        '--priority',
        'urgent',
        '--tag',
        'mail',
        '--tag',
        'weekly',
        '--depends-on',
        '1772359200000_0',
        '--expires-in',
        '90',
        '--max-retries',
        '1',
        '--callback-url',
        'http://callbacks.test/hook',
        '--json',
      ],
      { from: 'node' },
    );

    expect(publishTaskImpl).toHaveBeenCalledWith(apiUrl, {
      name: 'digest',
      payload: { topic: 'weekly' },
      priority: 4,
      tags: ['mail', 'weekly'],
      depends_on: ['1772359200000_0'],
      expires_in_seconds: 90,
      timeout_seconds: null,
      schedule_seconds: null,
      max_retries: 1,
      callback_url: 'http://callbacks.test/hook',
    });
    expect(printJsonImpl).toHaveBeenCalledWith(taskFixture({ priority: 4 }));
  });

  test('publish prints a one-line summary by default', async () => {
    const publishTaskImpl = vi
      .fn()
      .mockResolvedValue(taskFixture({ depends_on: ['1772359200000_0'], expires_at: '2026-03-01T10:01:30.000Z' }));
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, { publishTaskImpl, writeStdoutImpl: (line) => lines.push(line) });

    await program.parseAsync(['node', 'backlane', 'task', 'publish', 'digest'], { from: 'node' });

    expect(publishTaskImpl).toHaveBeenCalledWith(
      apiUrl,
      expect.objectContaining({ name: 'digest', payload: {}, priority: 2, max_retries: 3, tags: [] }),
    );
    expect(lines).toEqual([
      'published 1772359200000_1 pending p2 digest retries:0/3 depends_on:1772359200000_0 expires_at:2026-03-01T10:01:30.000Z',
    ]);
  });

  test('publish rejects a payload that is not a JSON object', async () => {
    const publishTaskImpl = vi.fn();
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const program = createProgram();
    registerTaskCommands(program, { publishTaskImpl });

    await expect(
      program.parseAsync(['node', 'backlane', 'task', 'publish', 'digest', '--payload', '[1,2]'], { from: 'node' }),
    ).rejects.toThrow('must be a JSON object');
    expect(publishTaskImpl).not.toHaveBeenCalled();
  });

  test('submit sends the typed task fields', async () => {
    const submitTaskImpl = vi.fn().mockResolvedValue(taskFixture({ name: 'ai_call_generate' }));
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, { submitTaskImpl, writeStdoutImpl: (line) => lines.push(line) });

    await program.parseAsync(
      [
        'node',
        'backlane',
        'task',
        'submit',
        'ai_call',
        'generate',
        '--params',
        '{"prompt":"hello"}',
        '--output-format',
        'markdown',
        '--notify',
        '--priority',
        '3',
      ],
      { from: 'node' },
    );

    expect(submitTaskImpl).toHaveBeenCalledWith(apiUrl, {
      task_type: 'ai_call',
      action: 'generate',
      params: { prompt: 'hello' },
      context: null,
      output_format: 'markdown',
      storage_target: null,
      notify_on_complete: true,
      priority: 3,
      tags: [],
      depends_on: [],
      expires_in_seconds: null,
      timeout_seconds: null,
      schedule_seconds: null,
      max_retries: 3,
      callback_url: null,
    });
    expect(lines).toEqual(['submitted 1772359200000_1 pending p2 ai_call_generate retries:0/3']);
  });

  test('list forwards filters and prints one line per task', async () => {
    const listTasksImpl = vi.fn().mockResolvedValue({
      tasks: [taskFixture({ name: 'first', priority: 3 }).task, taskFixture({ task_id: '1772359200000_2' }).task],
    });
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, { listTasksImpl, writeStdoutImpl: (line) => lines.push(line) });

    await program.parseAsync(
      [
        'node',
        'backlane',
        'task',
        'list',
        '--status',
        'pending',
        '--tag',
        'mail',
        '--priority-min',
        'normal',
        '--limit',
        '5',
      ],
      { from: 'node' },
    );

    expect(listTasksImpl).toHaveBeenCalledWith(apiUrl, {
      status: 'pending',
      tags: ['mail'],
      priorityMin: 2,
      limit: 5,
    });
    expect(lines).toEqual(['1772359200000_1 pending p3 first', '1772359200000_2 pending p2 digest']);
  });

  test('list reports an empty queue', async () => {
    const listTasksImpl = vi.fn().mockResolvedValue({ tasks: [] });
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, { listTasksImpl, writeStdoutImpl: (line) => lines.push(line) });

    await program.parseAsync(['node', 'backlane', 'task', 'list'], { from: 'node' });

    expect(listTasksImpl).toHaveBeenCalledWith(apiUrl, {
      status: undefined,
      tags: [],
      priorityMin: undefined,
      limit: undefined,
    });
    expect(lines).toEqual(['no tasks found']);
  });

  test('ready passes the limit through', async () => {
    const listReadyTasksImpl = vi.fn().mockResolvedValue({ tasks: [] });
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, { listReadyTasksImpl, writeStdoutImpl: (line) => lines.push(line) });

    await program.parseAsync(['node', 'backlane', 'task', 'ready', '--limit', '3'], { from: 'node' });

    expect(listReadyTasksImpl).toHaveBeenCalledWith(apiUrl, 3);
    expect(lines).toEqual(['no ready tasks']);
  });

  test('retry and cancel print what happened', async () => {
    const retryTaskImpl = vi.fn().mockResolvedValue(taskFixture({ retry_count: 1 }));
    const cancelTaskImpl = vi.fn().mockResolvedValue(taskFixture({ status: 'cancelled' }));
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, { retryTaskImpl, cancelTaskImpl, writeStdoutImpl: (line) => lines.push(line) });

    await program.parseAsync(['node', 'backlane', 'task', 'retry', '1772359200000_1'], { from: 'node' });
    await program.parseAsync(['node', 'backlane', 'task', 'cancel', '1772359200000_1'], { from: 'node' });

    expect(retryTaskImpl).toHaveBeenCalledWith(apiUrl, '1772359200000_1');
    expect(cancelTaskImpl).toHaveBeenCalledWith(apiUrl, '1772359200000_1');
    expect(lines).toEqual([
      'retried 1772359200000_1 pending p2 digest retries:1/3',
      'cancelled 1772359200000_1 cancelled p2 digest retries:0/3',
    ]);
  });

  test('get prints the task error when there is one', async () => {
    const getTaskImpl = vi.fn().mockResolvedValue(taskFixture({ status: 'failed', error: 'Error: boom' }));
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, { getTaskImpl, writeStdoutImpl: (line) => lines.push(line) });

    await program.parseAsync(['node', 'backlane', 'task', 'get', '1772359200000_1'], { from: 'node' });

    expect(lines).toEqual(['1772359200000_1 failed p2 digest retries:0/3 error:Error: boom']);
  });

  test('stats and cleanup summarize the queue', async () => {
    const getTaskStatsImpl = vi.fn().mockResolvedValue({
      total: 3,
      by_status: { pending: 2, acknowledged: 0, running: 0, completed: 1, failed: 0, cancelled: 0, expired: 0 },
      by_priority: { priority_2: 3 },
      expired: 0,
      avg_completion_seconds: 1.5,
    });
    const cleanupExpiredTasksImpl = vi.fn().mockResolvedValue({ cleaned: 2 });
    const lines: string[] = [];

    const program = createProgram();
    registerTaskCommands(program, {
      getTaskStatsImpl,
      cleanupExpiredTasksImpl,
      writeStdoutImpl: (line) => lines.push(line),
    });

    await program.parseAsync(['node', 'backlane', 'task', 'stats'], { from: 'node' });
    await program.parseAsync(['node', 'backlane', 'task', 'cleanup'], { from: 'node' });

    expect(lines).toEqual([
      'total:3 expired:0 avg_completion:1.50s',
      'status pending:2 completed:1',
      'priority priority_2:3',
      'expired 2 task(s)',
    ]);
  });

  test('API failures exit with the server message', async () => {
    const getTaskImpl = vi.fn().mockRejectedValue(new Error('task 1772359200000_9 not found'));
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
      throw new Error(`process-exit:${code ?? ''}`);
    }) as never);

    const program = createProgram();
    registerTaskCommands(program, { getTaskImpl });

    await expect(
      program.parseAsync(['node', 'backlane', 'task', 'get', '1772359200000_9'], { from: 'node' }),
    ).rejects.toThrow('process-exit:1');

    expect(stderrSpy).toHaveBeenCalledWith('task 1772359200000_9 not found\n');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
