export class EndpointsExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      lastError === undefined
        ? `all API endpoints failed after ${attempts} attempts`
        : `all API endpoints failed after ${attempts} attempts. Last error: ${describeError(lastError)}`,
      { cause: lastError },
    );
    this.name = 'EndpointsExhaustedError';
  }
}

export class ProviderRequestError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'ProviderRequestError';
  }
}

export class TaskStateError extends Error {
  constructor(
    readonly taskId: string,
    readonly currentStatus: string,
    readonly targetStatus: string,
  ) {
    super(`cannot mark task ${taskId} as ${targetStatus}: task is already ${currentStatus}`);
    this.name = 'TaskStateError';
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
