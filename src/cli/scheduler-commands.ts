import type { Command } from 'commander';

import { getProvidersHealth, listSchedulerJobs, triggerSchedulerJob } from './client.js';
import { exitWithError, printJson } from './common.js';

interface RegisterSchedulerCommandsDependencies {
  listSchedulerJobsImpl?: typeof listSchedulerJobs;
  triggerSchedulerJobImpl?: typeof triggerSchedulerJob;
  printJsonImpl?: typeof printJson;
  writeStdoutImpl?: (line: string) => void;
}

interface RegisterProviderCommandsDependencies {
  getProvidersHealthImpl?: typeof getProvidersHealth;
  printJsonImpl?: typeof printJson;
  writeStdoutImpl?: (line: string) => void;
}

export function registerSchedulerCommands(
  program: Command,
  dependencies: RegisterSchedulerCommandsDependencies = {},
): void {
  const listSchedulerJobsImpl = dependencies.listSchedulerJobsImpl ?? listSchedulerJobs;
  const triggerSchedulerJobImpl = dependencies.triggerSchedulerJobImpl ?? triggerSchedulerJob;
  const printJsonImpl = dependencies.printJsonImpl ?? printJson;
  const writeStdoutImpl = dependencies.writeStdoutImpl ?? ((line: string) => process.stdout.write(`${line}\n`));

  const schedulerCommand = program.command('scheduler').description('inspect and trigger interval jobs');

  schedulerCommand
    .command('jobs')
    .description('list registered interval jobs')
    .option('--json', 'JSON output')
    .action(async (options: { json?: boolean }) => {
      try {
        const response = await listSchedulerJobsImpl(apiUrl(program));

        if (options.json) {
          printJsonImpl(response);
          return;
        }

        if (response.jobs.length === 0) {
          writeStdoutImpl('no scheduler jobs registered');
          return;
        }

        for (const job of response.jobs) {
          const state = job.enabled ? 'enabled' : 'disabled';
          writeStdoutImpl(`${job.name} every:${job.interval_seconds}s ${state} last_run:${job.last_run_at ?? '(never)'}`);
        }
      } catch (error) {
        exitWithError(error, { json: options.json });
      }
    });

  schedulerCommand
    .command('trigger')
    .description('run a job immediately')
    .argument('<name>', 'job name')
    .option('--json', 'JSON output')
    .action(async (name: string, options: { json?: boolean }) => {
      try {
        const response = await triggerSchedulerJobImpl(apiUrl(program), name);

        if (options.json) {
          printJsonImpl(response);
          return;
        }

        writeStdoutImpl(`${response.name} result:${JSON.stringify(response.result ?? null)}`);
      } catch (error) {
        exitWithError(error, { json: options.json });
      }
    });
}

export function registerProviderCommands(program: Command, dependencies: RegisterProviderCommandsDependencies = {}): void {
  const getProvidersHealthImpl = dependencies.getProvidersHealthImpl ?? getProvidersHealth;
  const printJsonImpl = dependencies.printJsonImpl ?? printJson;
  const writeStdoutImpl = dependencies.writeStdoutImpl ?? ((line: string) => process.stdout.write(`${line}\n`));

  const providersCommand = program.command('providers').description('inspect text-generation providers');

  providersCommand
    .command('health')
    .description('show provider health and endpoint statistics')
    .option('--json', 'JSON output')
    .action(async (options: { json?: boolean }) => {
      try {
        const response = await getProvidersHealthImpl(apiUrl(program));

        if (options.json) {
          printJsonImpl(response);
          return;
        }

        const providerNames = Object.keys(response.providers);
        if (providerNames.length === 0) {
          writeStdoutImpl('no providers configured');
        }

        for (const name of providerNames) {
          const health = response.providers[name];
          if (!health) {
            continue;
          }

          const error = health.last_error ? ` error:${health.last_error}` : '';
          writeStdoutImpl(`${name} ${health.ok ? 'ok' : 'failing'}${error}`);
        }

        for (const [name, stats] of Object.entries(response.endpoints)) {
          writeStdoutImpl(
            `endpoint ${name} ${stats.status} p${stats.priority} success_rate:${stats.success_rate.toFixed(2)} rate_limit:${stats.rate_limit}`,
          );
        }
      } catch (error) {
        exitWithError(error, { json: options.json });
      }
    });
}

function apiUrl(root: Command): string {
  return root.opts<{ apiUrl: string }>().apiUrl;
}
