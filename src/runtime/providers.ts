import { setTimeout as sleep } from 'node:timers/promises';

import { z } from 'zod';

import { describeError, ProviderRequestError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { noopLogger } from '../shared/logger.js';
import type { ApiEndpoint } from './endpoint-registry.js';

const defaultSystemPrompt = 'You are a concise assistant.';
const anthropicApiVersion = '2023-06-01';

export interface GenerateRequest {
  prompt: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ProviderResponse {
  text: string;
  latencyMs: number;
  raw: Record<string, unknown> | null;
  provider: string;
  model: string;
}

export interface TextProvider {
  readonly name: string;
  readonly model: string;
  generate(request: GenerateRequest): Promise<ProviderResponse>;
}

const chatCompletionResponseSchema = z
  .object({
    choices: z
      .array(
        z.object({
          message: z.object({ content: z.string().nullable().optional() }).passthrough(),
        }),
      )
      .min(1),
  })
  .passthrough();

const anthropicResponseSchema = z
  .object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
  })
  .passthrough();

export class EchoProvider implements TextProvider {
  constructor(
    readonly name: string = 'echo',
    readonly model: string = 'offline-echo',
  ) {}

  async generate(request: GenerateRequest): Promise<ProviderResponse> {
    return {
      text: `[${this.name}] ${request.prompt.trim()}`,
      latencyMs: 0,
      raw: { echo: true },
      provider: this.name,
      model: this.model,
    };
  }
}

interface HttpProviderOptions {
  name: string;
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutSeconds?: number;
  maxAttempts?: number;
  backoffFactor?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export class OpenAICompatibleProvider implements TextProvider {
  readonly name: string;
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffFactor: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HttpProviderOptions) {
    this.name = options.name;
    this.model = options.model.trim();
    this.apiKey = options.apiKey.trim();
    this.baseUrl = options.baseUrl.replace(/\/+$/u, '');
    this.timeoutMs = (options.timeoutSeconds ?? 30) * 1000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffFactor = options.backoffFactor ?? 1.5;
    this.logger = options.logger ?? noopLogger;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  async generate(request: GenerateRequest): Promise<ProviderResponse> {
    const body = JSON.stringify({
      model: this.model,
      messages: [
        { role: 'system', content: request.system || defaultSystemPrompt },
        { role: 'user', content: request.prompt },
      ],
      max_tokens: Math.trunc(request.maxTokens ?? 512),
      temperature: request.temperature ?? 0.3,
    });

    let lastError: unknown;

    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      const startedAt = Date.now();
      try {
        const response = await fetch(`${this.baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            authorization: `Bearer ${this.apiKey}`,
          },
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        const payload = await readJsonResponse(this.name, response);
        const parsed = chatCompletionResponseSchema.safeParse(payload);
        if (!parsed.success) {
          throw new ProviderRequestError(this.name, 'unexpected chat completion response shape', response.status);
        }

        return {
          text: (parsed.data.choices[0]?.message.content ?? '').trim(),
          latencyMs: Date.now() - startedAt,
          raw: parsed.data,
          provider: this.name,
          model: this.model,
        };
      } catch (error) {
        lastError = error;
        this.logger.warn({
          event: 'provider_request_failed',
          provider: this.name,
          attempt: attempt + 1,
          max_attempts: this.maxAttempts,
          error_message: describeError(error),
        });

        if (attempt < this.maxAttempts - 1) {
          await this.sleep(this.backoffFactor ** attempt * 1000);
        }
      }
    }

    throw new ProviderRequestError(
      this.name,
      `all ${this.maxAttempts} attempts failed: ${describeError(lastError)}`,
      lastError instanceof ProviderRequestError ? lastError.status : null,
    );
  }
}

export class AnthropicProvider implements TextProvider {
  readonly name: string;
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: Omit<HttpProviderOptions, 'maxAttempts' | 'backoffFactor' | 'sleep' | 'logger'>) {
    this.name = options.name;
    this.model = options.model.trim();
    this.apiKey = options.apiKey.trim();
    this.baseUrl = options.baseUrl.replace(/\/+$/u, '');
    this.timeoutMs = (options.timeoutSeconds ?? 30) * 1000;
  }

  async generate(request: GenerateRequest): Promise<ProviderResponse> {
    const startedAt = Date.now();
    const response = await fetch(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': anthropicApiVersion,
      },
      body: JSON.stringify({
        model: this.model,
        system: request.system || defaultSystemPrompt,
        max_tokens: Math.trunc(request.maxTokens ?? 512),
        temperature: request.temperature ?? 0.3,
        messages: [{ role: 'user', content: request.prompt }],
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const payload = await readJsonResponse(this.name, response);
    const parsed = anthropicResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderRequestError(this.name, 'unexpected messages response shape', response.status);
    }

    const textBlock = parsed.data.content.find((block) => block.type === 'text');

    return {
      text: (textBlock?.text ?? '').trim(),
      latencyMs: Date.now() - startedAt,
      raw: parsed.data,
      provider: this.name,
      model: this.model,
    };
  }
}

export function createProviderForEndpoint(endpoint: ApiEndpoint, logger: Logger = noopLogger): TextProvider {
  if (endpoint.name === 'anthropic') {
    return new AnthropicProvider({
      name: endpoint.name,
      apiKey: endpoint.apiKey,
      baseUrl: endpoint.baseUrl,
      model: endpoint.model,
      timeoutSeconds: endpoint.timeoutSeconds,
    });
  }

  return new OpenAICompatibleProvider({
    name: endpoint.name,
    apiKey: endpoint.apiKey,
    baseUrl: endpoint.baseUrl,
    model: endpoint.model,
    timeoutSeconds: endpoint.timeoutSeconds,
    logger,
  });
}

async function readJsonResponse(provider: string, response: Response): Promise<unknown> {
  const text = await response.text();

  if (!response.ok) {
    throw new ProviderRequestError(provider, `HTTP ${response.status}: ${text.slice(0, 200)}`, response.status);
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderRequestError(provider, 'response body is not valid JSON', response.status);
  }
}
