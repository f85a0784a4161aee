import { config as appConfig, isUsableApiKey, type AppConfig } from '../config.js';
import { ConfigurationError } from '../lib/errors.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';
import { TextProviderChain, VisionProviderChain } from './chain.js';
import type { TextCapable, VisionCapable } from './types.js';

export * from './types.js';
export * from './chain.js';
export { GeminiProvider } from './gemini.js';
export { OpenAIProvider } from './openai.js';

/**
 * Провайдеры в порядке приоритета: Gemini, затем OpenAI как резерв.
 * Ключи-заглушки (your_...) пропускаются.
 */
export function createProviders(cfg: AppConfig = appConfig): Array<VisionCapable & TextCapable> {
  const providers: Array<VisionCapable & TextCapable> = [];

  if (isUsableApiKey(cfg.gemini.apiKey)) {
    providers.push(new GeminiProvider({
      apiKey: cfg.gemini.apiKey,
      model: cfg.gemini.model,
      timeoutSeconds: cfg.ai.timeoutSeconds,
      visionTimeoutSeconds: cfg.ai.visionTimeoutSeconds,
    }));
  }

  if (isUsableApiKey(cfg.openai.apiKey)) {
    providers.push(new OpenAIProvider({
      apiKey: cfg.openai.apiKey,
      model: cfg.openai.model,
      timeoutSeconds: cfg.ai.timeoutSeconds,
      visionTimeoutSeconds: cfg.ai.visionTimeoutSeconds,
    }));
  }

  if (providers.length === 0) {
    throw new ConfigurationError('Не указан API ключ для AI провайдера');
  }

  return providers;
}

export function createVisionChain(
  providers: readonly VisionCapable[],
  cfg: AppConfig = appConfig
): VisionProviderChain {
  return new VisionProviderChain(providers, { config: cfg.chain });
}

export function createTextChain(
  providers: readonly TextCapable[],
  cfg: AppConfig = appConfig
): TextProviderChain {
  return new TextProviderChain(providers, { config: cfg.chain });
}
