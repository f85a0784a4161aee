import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger, type Logger } from '../lib/logger.js';
import { ProviderChainExhaustedError, type ProviderCapability } from '../lib/errors.js';
import {
  ChainConfigSchema,
  type ChainConfig,
  type NamedProvider,
  type ProviderResponse,
  type ProviderStatus,
  type TextCapable,
  type TextGenerationRequest,
  type VisionCapable,
} from './types.js';

export interface ProviderChainOptions {
  config?: Partial<ChainConfig>;
  logger?: Logger;
  /** Пауза между попытками одного провайдера, мс */
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Цепочка провайдеров одной способности с fallback.
 *
 * Провайдеры перебираются в порядке приоритета, каждому даётся
 * maxRetriesPerProvider попыток с фиксированной паузой между ними.
 * Возвращается первый успешный ответ; после него провайдеры не вызываются.
 * Если все попытки неудачны — ProviderChainExhaustedError со всеми ошибками
 * в порядке попыток.
 */
export abstract class ProviderChain<P extends NamedProvider> {
  readonly providers: readonly P[];
  readonly config: ChainConfig;
  protected readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<unknown>;

  protected constructor(
    private readonly capability: ProviderCapability,
    providers: readonly P[],
    options: ProviderChainOptions = {}
  ) {
    this.providers = providers;
    this.config = ChainConfigSchema.parse(options.config ?? {});
    this.logger = options.logger ?? createLogger({ module: `${capability}-chain` });
    this.sleep = options.sleep ?? sleep;

    this.logger.info(
      { providers: providers.map(p => p.name), ...this.config },
      'Provider chain initialized'
    );
  }

  protected async execute(
    call: (provider: P) => Promise<ProviderResponse>,
    context: Record<string, unknown> = {}
  ): Promise<ProviderResponse> {
    const errors: string[] = [];
    const { maxRetriesPerProvider, retryDelaySeconds, failFast } = this.config;

    for (const provider of this.providers) {
      for (let attempt = 1; attempt <= maxRetriesPerProvider; attempt++) {
        this.logger.debug({ provider: provider.name, attempt, ...context }, 'Trying provider');

        const response = await call(provider);

        if (response.success) {
          this.logger.info(
            { provider: provider.name, attempt, resultLength: response.content.length },
            'Provider chain success'
          );
          return response;
        }

        errors.push(`${provider.name}: ${response.errorMessage ?? 'Unknown error'}`);
        this.logger.warn(
          { provider: provider.name, attempt, error: response.errorMessage },
          'Provider failed'
        );

        if (attempt < maxRetriesPerProvider && retryDelaySeconds > 0) {
          await this.sleep(retryDelaySeconds * 1000);
        }
      }

      if (failFast) {
        break;
      }
    }

    this.logger.error({ errors }, 'All providers failed');
    throw new ProviderChainExhaustedError(this.capability, errors);
  }

  /**
   * Проверка доступности всех провайдеров. Падение одной проверки
   * не прерывает остальные.
   */
  async healthCheckAll(): Promise<Record<string, ProviderStatus>> {
    const results: Record<string, ProviderStatus> = {};

    for (const provider of this.providers) {
      let status: ProviderStatus;
      try {
        status = await provider.healthCheck();
      } catch (error: unknown) {
        this.logger.warn({ provider: provider.name, error }, 'Health check threw');
        status = 'error';
      }
      results[provider.name] = status;
      this.logger.debug({ provider: provider.name, status }, 'Provider health check');
    }

    return results;
  }
}

export class VisionProviderChain extends ProviderChain<VisionCapable> {
  constructor(providers: readonly VisionCapable[], options: ProviderChainOptions = {}) {
    super('vision', providers, options);
  }

  async analyzeImage(image: Buffer, prompt?: string): Promise<ProviderResponse> {
    return this.execute(provider => provider.analyzeImage(image, prompt), { imagesCount: 1 });
  }

  async analyzeMultipleImages(images: readonly Buffer[], prompt?: string): Promise<ProviderResponse> {
    return this.execute(
      provider => provider.analyzeMultipleImages(images, prompt),
      { imagesCount: images.length }
    );
  }
}

export class TextProviderChain extends ProviderChain<TextCapable> {
  constructor(providers: readonly TextCapable[], options: ProviderChainOptions = {}) {
    super('text', providers, options);
  }

  async generate(request: TextGenerationRequest): Promise<ProviderResponse> {
    return this.execute(provider => provider.generate(request), { promptLength: request.prompt.length });
  }
}
