import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogEntry = string | Error | Record<string, unknown>;

export interface Logger {
  error(entry: LogEntry): void;
  warn(entry: LogEntry): void;
  info(entry: LogEntry): void;
  debug(entry: LogEntry): void;
}

export type RootLogger = PinoLogger;

export const noopLogger: Logger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
};

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }

  return fallback;
}

interface CreateLoggerOptions {
  level?: LogLevel;
  stream?: DestinationStream;
  bindings?: Record<string, unknown>;
}

export function createLogger(options: CreateLoggerOptions = {}): RootLogger {
  const logger = pino(
    {
      level: options.level ?? 'info',
      base: options.bindings ?? null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    options.stream ?? pino.destination(2),
  );

  return logger;
}

// Narrow Logger view over a pino child bound to one component.
export function componentLogger(root: RootLogger, component: string): Logger {
  const child = root.child({ component });

  return {
    error: (entry) => writeEntry(child, 'error', entry),
    warn: (entry) => writeEntry(child, 'warn', entry),
    info: (entry) => writeEntry(child, 'info', entry),
    debug: (entry) => writeEntry(child, 'debug', entry),
  };
}

function writeEntry(logger: PinoLogger, level: 'error' | 'warn' | 'info' | 'debug', entry: LogEntry): void {
  if (typeof entry === 'string') {
    logger[level](entry);
    return;
  }

  if (entry instanceof Error) {
    logger[level]({ err: entry }, entry.message);
    return;
  }

  logger[level](entry);
}

function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}
