#!/usr/bin/env node

import { Command } from 'commander';

import { defaultApiUrl } from '../shared/api-contracts.js';
import { healthcheck } from './client.js';
import { exitWithError, printJson } from './common.js';
import { registerProviderCommands, registerSchedulerCommands } from './scheduler-commands.js';
import { registerTaskCommands } from './task-commands.js';

const version = '0.1.0';

const program = new Command();
program
  .name('backlane')
  .description('backlane command line interface')
  .version(version, '-v, --version', 'output the version number')
  .showHelpAfterError()
  .option('--api-url <url>', 'backlane server API URL', process.env.BACKLANE_API_URL ?? defaultApiUrl);

program
  .command('health')
  .description('check backlane API health')
  .option('--json', 'JSON output')
  .action(async (options: { json?: boolean }) => {
    try {
      await healthcheck(program.opts<{ apiUrl: string }>().apiUrl);

      if (options.json) {
        printJson({ ok: true });
      } else {
        console.log('ok');
      }
    } catch (error) {
      exitWithError(error, { json: options.json });
    }
  });

registerTaskCommands(program);
registerSchedulerCommands(program);
registerProviderCommands(program);

await program.parseAsync(process.argv);
