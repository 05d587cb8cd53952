import { type Command, InvalidArgumentError, Option } from 'commander';

import { taskStatuses } from '../shared/api-contracts.js';
import {
  type ApiTaskResponse,
  cancelTask,
  cleanupExpiredTasks,
  getTask,
  getTaskStats,
  listReadyTasks,
  listTasks,
  publishTask,
  retryTask,
  submitTask,
} from './client.js';
import {
  collectValues,
  exitWithError,
  parseNonNegativeInteger,
  parsePositiveNumber,
  parsePriority,
  printJson,
} from './common.js';

interface RegisterTaskCommandsDependencies {
  publishTaskImpl?: typeof publishTask;
  submitTaskImpl?: typeof submitTask;
  listTasksImpl?: typeof listTasks;
  listReadyTasksImpl?: typeof listReadyTasks;
  getTaskImpl?: typeof getTask;
  retryTaskImpl?: typeof retryTask;
  cancelTaskImpl?: typeof cancelTask;
  getTaskStatsImpl?: typeof getTaskStats;
  cleanupExpiredTasksImpl?: typeof cleanupExpiredTasks;
  printJsonImpl?: typeof printJson;
  writeStdoutImpl?: (line: string) => void;
}

interface QueueOptions {
  priority: 1 | 2 | 3 | 4;
  tag: string[];
  dependsOn: string[];
  expiresIn?: number;
  timeout?: number;
  schedule?: number;
  maxRetries: number;
  callbackUrl?: string;
  json?: boolean;
}

interface SubmitOptions extends QueueOptions {
  params?: Record<string, unknown>;
  context?: Record<string, unknown>;
  outputFormat: 'json' | 'markdown' | 'html';
  storageTarget?: string;
  notify?: boolean;
}

interface ListOptions {
  status?: string;
  tag: string[];
  priorityMin?: 1 | 2 | 3 | 4;
  limit?: number;
  json?: boolean;
}

interface JsonOption {
  json?: boolean;
}

export function registerTaskCommands(program: Command, dependencies: RegisterTaskCommandsDependencies = {}): void {
  const publishTaskImpl = dependencies.publishTaskImpl ?? publishTask;
  const submitTaskImpl = dependencies.submitTaskImpl ?? submitTask;
  const listTasksImpl = dependencies.listTasksImpl ?? listTasks;
  const listReadyTasksImpl = dependencies.listReadyTasksImpl ?? listReadyTasks;
  const getTaskImpl = dependencies.getTaskImpl ?? getTask;
  const retryTaskImpl = dependencies.retryTaskImpl ?? retryTask;
  const cancelTaskImpl = dependencies.cancelTaskImpl ?? cancelTask;
  const getTaskStatsImpl = dependencies.getTaskStatsImpl ?? getTaskStats;
  const cleanupExpiredTasksImpl = dependencies.cleanupExpiredTasksImpl ?? cleanupExpiredTasks;
  const printJsonImpl = dependencies.printJsonImpl ?? printJson;
  const writeStdoutImpl = dependencies.writeStdoutImpl ?? ((line: string) => process.stdout.write(`${line}\n`));

  const taskCommand = program.command('task').description('publish and inspect queued tasks');

  addQueueOptions(
    taskCommand
      .command('publish')
      .description('publish a task with a raw JSON payload')
      .argument('<name>', 'task name')
      .option('--payload <json>', 'task payload as a JSON object', parseJsonObject),
  ).action(async (name: string, options: QueueOptions & { payload?: Record<string, unknown> }) => {
    try {
      const response = await publishTaskImpl(apiUrl(program), {
        name,
        payload: options.payload ?? {},
        ...queueFields(options),
      });

      if (options.json) {
        printJsonImpl(response);
        return;
      }

      writeStdoutImpl(`published ${formatTaskSummary(response)}`);
    } catch (error) {
      exitWithError(error, { json: options.json });
    }
  });

  addQueueOptions(
    taskCommand
      .command('submit')
      .description('submit a typed task (for example: ai_call generate)')
      .argument('<taskType>', 'task type')
      .argument('<action>', 'task action')
      .option('--params <json>', 'handler parameters as a JSON object', parseJsonObject)
      .option('--context <json>', 'handler context as a JSON object', parseJsonObject)
      .addOption(
        new Option('--output-format <format>', 'output format').choices(['json', 'markdown', 'html']).default('json'),
      )
      .option('--storage-target <target>', 'storage target for the handler output')
      .option('--notify', 'ask the handler to notify on completion'),
  ).action(async (taskType: string, action: string, options: SubmitOptions) => {
    try {
      const response = await submitTaskImpl(apiUrl(program), {
        task_type: taskType,
        action,
        params: options.params ?? {},
        context: options.context ?? null,
        output_format: options.outputFormat,
        storage_target: options.storageTarget ?? null,
        notify_on_complete: options.notify ?? false,
        ...queueFields(options),
      });

      if (options.json) {
        printJsonImpl(response);
        return;
      }

      writeStdoutImpl(`submitted ${formatTaskSummary(response)}`);
    } catch (error) {
      exitWithError(error, { json: options.json });
    }
  });

  taskCommand
    .command('list')
    .description('list tasks by priority then age')
    .addOption(new Option('--status <status>', 'status filter').choices([...taskStatuses]))
    .option('--tag <tag>', 'match any of these tags (repeatable)', collectValues, [])
    .option('--priority-min <priority>', 'minimum priority', parsePriority)
    .option('--limit <count>', 'maximum number of tasks', parsePositiveNumber)
    .option('--json', 'JSON output')
    .action(async (options: ListOptions) => {
      try {
        const response = await listTasksImpl(apiUrl(program), {
          status: options.status,
          tags: options.tag,
          priorityMin: options.priorityMin,
          limit: options.limit,
        });

        if (options.json) {
          printJsonImpl(response);
          return;
        }

        if (response.tasks.length === 0) {
          writeStdoutImpl('no tasks found');
          return;
        }

        for (const task of response.tasks) {
          writeStdoutImpl(formatTaskLine(task));
        }
      } catch (error) {
        exitWithError(error, { json: options.json });
      }
    });

  taskCommand
    .command('ready')
    .description('list tasks that are ready to run')
    .option('--limit <count>', 'maximum number of tasks', parsePositiveNumber)
    .option('--json', 'JSON output')
    .action(async (options: { limit?: number; json?: boolean }) => {
      try {
        const response = await listReadyTasksImpl(apiUrl(program), options.limit);

        if (options.json) {
          printJsonImpl(response);
          return;
        }

        if (response.tasks.length === 0) {
          writeStdoutImpl('no ready tasks');
          return;
        }

        for (const task of response.tasks) {
          writeStdoutImpl(formatTaskLine(task));
        }
      } catch (error) {
        exitWithError(error, { json: options.json });
      }
    });

  const singleTaskCommands = [
    { name: 'get', description: 'show task details', verb: null, impl: getTaskImpl },
    { name: 'retry', description: 'move a failed task back to pending', verb: 'retried', impl: retryTaskImpl },
    { name: 'cancel', description: 'cancel a task', verb: 'cancelled', impl: cancelTaskImpl },
  ] as const;

  for (const command of singleTaskCommands) {
    taskCommand
      .command(command.name)
      .description(command.description)
      .argument('<taskId>', 'task id')
      .option('--json', 'JSON output')
      .action(async (taskId: string, options: JsonOption) => {
        try {
          const response = await command.impl(apiUrl(program), taskId);

          if (options.json) {
            printJsonImpl(response);
            return;
          }

          const summary = formatTaskSummary(response);
          writeStdoutImpl(command.verb ? `${command.verb} ${summary}` : summary);
        } catch (error) {
          exitWithError(error, { json: options.json });
        }
      });
  }

  taskCommand
    .command('stats')
    .description('show queue statistics')
    .option('--json', 'JSON output')
    .action(async (options: JsonOption) => {
      try {
        const stats = await getTaskStatsImpl(apiUrl(program));

        if (options.json) {
          printJsonImpl(stats);
          return;
        }

        writeStdoutImpl(`total:${stats.total} expired:${stats.expired} avg_completion:${stats.avg_completion_seconds.toFixed(2)}s`);
        writeStdoutImpl(`status ${formatCounts(stats.by_status)}`);
        writeStdoutImpl(`priority ${formatCounts(stats.by_priority)}`);
      } catch (error) {
        exitWithError(error, { json: options.json });
      }
    });

  taskCommand
    .command('cleanup')
    .description('mark tasks past their deadline as expired')
    .option('--json', 'JSON output')
    .action(async (options: JsonOption) => {
      try {
        const response = await cleanupExpiredTasksImpl(apiUrl(program));

        if (options.json) {
          printJsonImpl(response);
          return;
        }

        writeStdoutImpl(`expired ${response.cleaned} task(s)`);
      } catch (error) {
        exitWithError(error, { json: options.json });
      }
    });
}

function addQueueOptions(command: Command): Command {
  return command
    .option('--priority <priority>', 'low, normal, high or urgent', parsePriority, 2)
    .option('--tag <tag>', 'task tag (repeatable)', collectValues, [])
    .option('--depends-on <taskId>', 'task that must complete first (repeatable)', collectValues, [])
    .option('--expires-in <seconds>', 'expire the task after this many seconds', parsePositiveNumber)
    .option('--timeout <seconds>', 'advisory handler timeout in seconds', parsePositiveNumber)
    .option('--schedule <seconds>', 'recurrence hint in seconds, stored with the task', parsePositiveNumber)
    .option('--max-retries <count>', 'retry budget', parseNonNegativeInteger, 3)
    .option('--callback-url <url>', 'webhook notified on terminal status')
    .option('--json', 'JSON output');
}

function queueFields(options: QueueOptions) {
  return {
    priority: options.priority,
    tags: options.tag,
    depends_on: options.dependsOn,
    expires_in_seconds: options.expiresIn ?? null,
    timeout_seconds: options.timeout ?? null,
    schedule_seconds: options.schedule === undefined ? null : Math.trunc(options.schedule),
    max_retries: options.maxRetries,
    callback_url: options.callbackUrl ?? null,
  };
}

function apiUrl(root: Command): string {
  return root.opts<{ apiUrl: string }>().apiUrl;
}

function parseJsonObject(value: string): Record<string, unknown> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('must be valid JSON');
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new InvalidArgumentError('must be a JSON object');
  }

  return Object.fromEntries(Object.entries(parsed));
}

function formatTaskLine(task: ApiTaskResponse['task']): string {
  return `${task.task_id} ${task.status} p${task.priority} ${task.name}`;
}

function formatTaskSummary(response: ApiTaskResponse): string {
  const task = response.task;
  const parts = [formatTaskLine(task), `retries:${task.retry_count}/${task.max_retries}`];

  if (task.depends_on.length > 0) {
    parts.push(`depends_on:${task.depends_on.join(',')}`);
  }

  if (task.expires_at) {
    parts.push(`expires_at:${task.expires_at}`);
  }

  if (task.error) {
    parts.push(`error:${task.error}`);
  }

  return parts.join(' ');
}

function formatCounts(counts: Record<string, number>): string {
  const entries = Object.entries(counts).filter(([, count]) => count > 0);
  if (entries.length === 0) {
    return '(none)';
  }

  return entries.map(([key, count]) => `${key}:${count}`).join(' ');
}
