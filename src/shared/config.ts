import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

import { z } from 'zod';

const defaultWorkspaceDir = join(homedir(), '.backlane');

const envSchema = z.object({
  BACKLANE_DATABASE_PATH: z.string().trim().min(1).optional(),
  BACKLANE_WORKSPACE_DIR: z.string().min(1).default(defaultWorkspaceDir),
  BACKLANE_HOST: z.string().min(1).default('127.0.0.1'),
  BACKLANE_PORT: z.coerce.number().int().positive().default(31515),
  BACKLANE_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  BACKLANE_EXECUTOR_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  BACKLANE_EXECUTOR_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  BACKLANE_HEARTBEAT_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  BACKLANE_QUEUE_DRAIN_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  BACKLANE_CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BACKLANE_LLM_PREFERENCE: z.string().trim().optional(),
  AI_TIMEOUT: z.coerce.number().positive().default(30),
});

export const endpointProviderNames = ['openai', 'deepseek', 'anthropic', 'gemini', 'groq', 'moonshot', 'zhipu'] as const;

export type EndpointProviderName = (typeof endpointProviderNames)[number];

interface EndpointProviderDefaults {
  baseUrl: string;
  model: string;
  priority: number;
  maxRequestsPerMinute: number;
}

const endpointProviderDefaults: Readonly<Record<EndpointProviderName, EndpointProviderDefaults>> = {
  openai: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o-mini', priority: 1, maxRequestsPerMinute: 60 },
  deepseek: { baseUrl: 'https://api.deepseek.com/v1', model: 'deepseek-chat', priority: 2, maxRequestsPerMinute: 100 },
  anthropic: {
    baseUrl: 'https://api.anthropic.com/v1',
    model: 'claude-3-haiku-20240307',
    priority: 1,
    maxRequestsPerMinute: 60,
  },
  gemini: {
    baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai',
    model: 'gemini-1.5-flash',
    priority: 2,
    maxRequestsPerMinute: 60,
  },
  groq: {
    baseUrl: 'https://api.groq.com/openai/v1',
    model: 'llama-3.1-70b-versatile',
    priority: 2,
    maxRequestsPerMinute: 90,
  },
  moonshot: { baseUrl: 'https://api.moonshot.cn/v1', model: 'moonshot-v1-8k', priority: 2, maxRequestsPerMinute: 60 },
  zhipu: { baseUrl: 'https://open.bigmodel.cn/api/paas/v4', model: 'glm-4', priority: 2, maxRequestsPerMinute: 60 },
};

const endpointOverrideSchema = z.object({
  apiKey: z.string().trim().min(1).optional(),
  baseUrl: z.string().trim().url().optional(),
  model: z.string().trim().min(1).optional(),
  priority: z.coerce.number().int().optional(),
  maxRequestsPerMinute: z.coerce.number().int().positive().optional(),
});

export interface EndpointConfig {
  name: EndpointProviderName;
  baseUrl: string;
  apiKey: string;
  model: string;
  priority: number;
  maxRequestsPerMinute: number;
  timeoutSeconds: number;
}

export interface AppConfig {
  BACKLANE_DATABASE_PATH: string;
  BACKLANE_WORKSPACE_DIR: string;
  BACKLANE_HOST: string;
  BACKLANE_PORT: number;
  BACKLANE_LOG_LEVEL: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  BACKLANE_EXECUTOR_POLL_INTERVAL_MS: number;
  BACKLANE_EXECUTOR_BATCH_SIZE: number;
  BACKLANE_HEARTBEAT_INTERVAL_SECONDS: number;
  BACKLANE_QUEUE_DRAIN_INTERVAL_SECONDS: number;
  BACKLANE_CALLBACK_TIMEOUT_MS: number;
  BACKLANE_LLM_PREFERENCE: string[];
  AI_TIMEOUT: number;
  endpoints: EndpointConfig[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = envSchema.parse(env);
  const workspaceDir = expandHomePath(config.BACKLANE_WORKSPACE_DIR);
  const databasePath = resolveDatabasePath(workspaceDir, config.BACKLANE_DATABASE_PATH);

  return {
    ...config,
    BACKLANE_WORKSPACE_DIR: workspaceDir,
    BACKLANE_DATABASE_PATH: databasePath,
    BACKLANE_LLM_PREFERENCE: parseCommaSeparatedList(config.BACKLANE_LLM_PREFERENCE),
    endpoints: loadEndpointConfigs(env, config.AI_TIMEOUT),
  };
}

export function loadEndpointConfigs(env: NodeJS.ProcessEnv, timeoutSeconds: number): EndpointConfig[] {
  const endpoints: EndpointConfig[] = [];

  for (const name of endpointProviderNames) {
    const prefix = name.toUpperCase();
    const overrides = endpointOverrideSchema.parse({
      apiKey: emptyToUndefined(env[`${prefix}_API_KEY`]),
      baseUrl: emptyToUndefined(env[`${prefix}_BASE_URL`]),
      model: emptyToUndefined(env[`${prefix}_MODEL`]),
      priority: emptyToUndefined(env[`${prefix}_PRIORITY`]),
      maxRequestsPerMinute: emptyToUndefined(env[`${prefix}_RPM`]),
    });

    if (!overrides.apiKey) {
      continue;
    }

    const defaults = endpointProviderDefaults[name];
    endpoints.push({
      name,
      baseUrl: overrides.baseUrl ?? defaults.baseUrl,
      apiKey: overrides.apiKey,
      model: overrides.model ?? defaults.model,
      priority: overrides.priority ?? defaults.priority,
      maxRequestsPerMinute: overrides.maxRequestsPerMinute ?? defaults.maxRequestsPerMinute,
      timeoutSeconds,
    });
  }

  return endpoints;
}

function parseCommaSeparatedList(rawValue: string | undefined): string[] {
  if (!rawValue || rawValue.trim().length === 0) {
    return [];
  }

  const values: string[] = [];
  const seen = new Set<string>();

  for (const entry of rawValue.split(',')) {
    const value = entry.trim();
    if (value.length === 0 || seen.has(value)) {
      continue;
    }

    seen.add(value);
    values.push(value);
  }

  return values;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }

  return value;
}

function resolveDatabasePath(workspaceDir: string, configuredPath?: string): string {
  const candidatePath = configuredPath ? expandHomePath(configuredPath) : join(workspaceDir, 'backlane.sqlite');

  if (isAbsolute(candidatePath)) {
    return candidatePath;
  }

  return resolve(workspaceDir, candidatePath);
}

function expandHomePath(path: string): string {
  if (path === '~') {
    return homedir();
  }

  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }

  return path;
}
