import { InvalidArgumentError } from 'commander';

import { taskPriorities } from '../shared/api-contracts.js';

export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value)}\n`);
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive number');
  }

  return parsed;
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('must be a non-negative integer');
  }

  return parsed;
}

// Accepts a level name (low, normal, high, urgent) or its number.
export function parsePriority(value: string): 1 | 2 | 3 | 4 {
  const normalized = value.trim().toLowerCase();

  for (const [name, priority] of Object.entries(taskPriorities)) {
    if (normalized === name || normalized === String(priority)) {
      return priority;
    }
  }

  throw new InvalidArgumentError('must be one of low, normal, high, urgent (or 1-4)');
}

export function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function exitWithError(error: unknown, options: { json?: boolean } = {}): never {
  const message = error instanceof Error ? error.message : String(error);

  if (options.json) {
    process.stdout.write(`${JSON.stringify({ error: { message } })}\n`);
  } else {
    process.stderr.write(`${message}\n`);
  }

  process.exit(1);
}
