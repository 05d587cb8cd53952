import { toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { noopLogger } from '../shared/logger.js';
import type { EndpointRegistry } from './endpoint-registry.js';
import { EchoProvider, type GenerateRequest, type TextProvider } from './providers.js';

export interface RouterGenerateRequest extends GenerateRequest {
  prefer?: string;
}

export interface RouterGenerateResult {
  success: boolean;
  provider: string;
  model: string;
  latencyMs: number;
  content: string;
  raw: Record<string, unknown> | null;
  errors: Record<string, string>;
}

export interface ProviderHealth {
  ok: boolean;
  lastError: string | null;
  lastTs: number;
}

export interface ProviderRouterOptions {
  providers: readonly TextProvider[];
  registry?: EndpointRegistry;
  preference?: readonly string[];
  fallback?: TextProvider;
  logger?: Logger;
  now?: () => number;
}

export class ProviderRouter {
  private readonly providers = new Map<string, TextProvider>();
  private readonly health = new Map<string, ProviderHealth>();
  private readonly registry: EndpointRegistry | undefined;
  private readonly preference: readonly string[];
  private readonly fallback: TextProvider;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ProviderRouterOptions) {
    for (const provider of options.providers) {
      this.providers.set(provider.name, provider);
      this.health.set(provider.name, { ok: true, lastError: null, lastTs: 0 });
    }

    this.registry = options.registry;
    this.preference = options.preference ?? [];
    this.fallback = options.fallback ?? new EchoProvider();
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  providerNames(): string[] {
    return [...this.providers.keys()];
  }

  candidateOrder(prefer?: string): string[] {
    const order: string[] = [];

    if (prefer && this.providers.has(prefer)) {
      order.push(prefer);
    }

    for (const name of this.preference) {
      if (this.providers.has(name) && !order.includes(name)) {
        order.push(name);
      }
    }

    for (const name of this.providers.keys()) {
      if (!order.includes(name)) {
        order.push(name);
      }
    }

    return order;
  }

  async generate(request: RouterGenerateRequest): Promise<RouterGenerateResult> {
    const generateRequest: GenerateRequest = {
      prompt: request.prompt,
      system: request.system ?? '',
      maxTokens: request.maxTokens ?? 512,
      temperature: request.temperature ?? 0.3,
    };
    const errors: Record<string, string> = {};

    for (const name of this.candidateOrder(request.prefer)) {
      const provider = this.providers.get(name);
      if (!provider) {
        continue;
      }

      if (this.registry?.getEndpoint(name) && !this.registry.isEndpointAvailable(name)) {
        errors[name] = `endpoint ${name} is unavailable (${this.registry.getEndpoint(name)?.status ?? 'unknown'})`;
        continue;
      }

      this.registry?.recordRequest(name);

      const startedAt = this.now();
      try {
        const response = await provider.generate(generateRequest);
        const latencyMs = this.now() - startedAt;

        this.health.set(name, { ok: true, lastError: null, lastTs: this.now() });
        this.registry?.recordSuccess(name, latencyMs / 1000);

        return {
          success: true,
          provider: response.provider || name,
          model: response.model,
          latencyMs,
          content: response.text,
          raw: response.raw,
          errors,
        };
      } catch (error) {
        const message = toErrorMessage(error);
        errors[name] = message;
        this.health.set(name, { ok: false, lastError: message, lastTs: this.now() });
        this.registry?.recordFailure(name);

        this.logger.warn({
          event: 'provider_router_candidate_failed',
          provider: name,
          error_message: message,
        });
      }
    }

    this.logger.warn({
      event: 'provider_router_fallback',
      fallback_provider: this.fallback.name,
      failed_providers: Object.keys(errors),
    });

    const response = await this.fallback.generate(generateRequest);

    return {
      success: false,
      provider: response.provider,
      model: response.model,
      latencyMs: response.latencyMs,
      content: response.text,
      raw: response.raw,
      errors,
    };
  }

  healthSnapshot(): Record<string, ProviderHealth> {
    return Object.fromEntries([...this.health.entries()].map(([name, health]) => [name, { ...health }]));
  }
}
