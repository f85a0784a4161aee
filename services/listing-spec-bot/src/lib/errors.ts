/**
 * Иерархия ошибок генератора ТЗ
 *
 * - TzGeneratorError — базовая ошибка
 *   - AIProviderError — ошибки AI провайдеров
 *     - VisionAnalysisError, TextGenerationError
 *     - ProviderChainExhaustedError — все провайдеры цепочки вернули ошибку
 *   - GenerationError — общая ошибка оркестрации
 *   - ValidationError — неверное использование валидатора
 *   - ConfigurationError
 *
 * Провайдеры не бросают исключения для восстановимых ошибок (возвращают
 * ProviderResponse с success=false). Цепочка бросает ProviderChainExhaustedError,
 * генератор перехватывает её и возвращает GenerationResult с success=false.
 *
 * @module lib/errors
 */

export class TzGeneratorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TzGeneratorError';
  }
}

export class AIProviderError extends TzGeneratorError {
  constructor(message: string) {
    super(message);
    this.name = 'AIProviderError';
  }
}

export class VisionAnalysisError extends AIProviderError {
  constructor(message: string) {
    super(message);
    this.name = 'VisionAnalysisError';
  }
}

export class TextGenerationError extends AIProviderError {
  constructor(message: string) {
    super(message);
    this.name = 'TextGenerationError';
  }
}

export type ProviderCapability = 'vision' | 'text';

export class ProviderChainExhaustedError extends AIProviderError {
  readonly capability: ProviderCapability;
  /** Ошибки в порядке попыток, формат "provider: message" */
  readonly errors: readonly string[];

  constructor(capability: ProviderCapability, errors: readonly string[]) {
    const label = capability === 'vision' ? 'Vision' : 'Text';
    super(`Все ${label} провайдеры недоступны: ${errors.join('; ')}`);
    this.name = 'ProviderChainExhaustedError';
    this.capability = capability;
    this.errors = errors;
  }
}

export class GenerationError extends TzGeneratorError {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class ValidationError extends TzGeneratorError {
  readonly missingSections: readonly string[];

  constructor(message: string, missingSections: readonly string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.missingSections = missingSections;
  }
}

export class ConfigurationError extends TzGeneratorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
