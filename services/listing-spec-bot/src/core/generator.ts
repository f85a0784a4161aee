import { createLogger, type Logger } from '../lib/logger.js';
import {
  GenerationError,
  ProviderChainExhaustedError,
  TextGenerationError,
  TzGeneratorError,
  VisionAnalysisError,
  getErrorMessage,
} from '../lib/errors.js';
import type { TextProviderChain, VisionProviderChain } from '../providers/chain.js';
import type { ProviderResponse } from '../providers/types.js';
import { TzValidator, type DocumentValidator, type ValidationResult } from './validator.js';
import { sanitizeFeedback } from './feedback.js';
import {
  MIN_TZ_LENGTH,
  TZ_SYSTEM_PROMPT,
  VISION_ANALYSIS_PROMPT,
  buildImprovedPrompt,
  buildRegenerationPrompt,
  buildTzPrompt,
} from './prompts.js';

// 8000 токенов хватает на полное ТЗ из всех секций и 6-8 слайдов
export const MAX_GENERATION_TOKENS = 8000;

// Максимум повторных попыток генерации (всего попыток — на одну больше)
export const MAX_RETRIES = 2;

// На последней попытке результат с такой оценкой отдаём, даже если он не валиден
export const ACCEPTABLE_SCORE = 50;

export const GENERIC_ERROR_MESSAGE = 'Не удалось сгенерировать ТЗ. Попробуйте ещё раз.';

/**
 * Этапы генерации:
 * 0 — анализ фото, 1 — целевая аудитория, 2 — генерация и проверка, 3 — финальная проверка
 */
export type GenerationStage = 0 | 1 | 2 | 3;

export type ProgressCallback = (stage: GenerationStage, substage?: string) => Promise<void>;

export interface GenerationResult {
  success: boolean;
  photoAnalysis: string;
  tzText: string;
  qualityScore: number;
  validation: ValidationResult | null;
  errorMessage: string | null;
  /** Индекс попытки, на которой получен результат (0 — с первого раза) */
  retryCount: number;
}

export interface RegenerateParams {
  photoAnalysis: string;
  category: string;
  previousTz: string;
  feedback?: string | null;
}

export interface TzGeneratorDeps {
  visionChain: Pick<VisionProviderChain, 'analyzeImage' | 'analyzeMultipleImages'>;
  textChain: Pick<TextProviderChain, 'generate'>;
  validator?: DocumentValidator;
  logger?: Logger;
}

interface Attempt {
  tzText: string;
  validation: ValidationResult;
  retryCount: number;
}

function failedResult(errorMessage: string): GenerationResult {
  return {
    success: false,
    photoAnalysis: '',
    tzText: '',
    qualityScore: 0,
    validation: null,
    errorMessage,
    retryCount: 0,
  };
}

/**
 * Генератор ТЗ на инфографику.
 *
 * Анализирует фото через Vision цепочку, генерирует ТЗ через Text цепочку,
 * проверяет качество и при необходимости повторяет генерацию с исправлениями.
 * Всё состояние живёт внутри одного вызова, экземпляр можно делить между
 * параллельными запросами разных пользователей.
 */
export class TzGenerator {
  private readonly visionChain: TzGeneratorDeps['visionChain'];
  private readonly textChain: TzGeneratorDeps['textChain'];
  private readonly validator: DocumentValidator;
  private readonly logger: Logger;

  constructor(deps: TzGeneratorDeps) {
    this.visionChain = deps.visionChain;
    this.textChain = deps.textChain;
    this.validator = deps.validator ?? new TzValidator();
    this.logger = deps.logger ?? createLogger({ module: 'generator' });
  }

  async generate(
    photos: readonly Buffer[],
    category: string,
    onProgress?: ProgressCallback
  ): Promise<GenerationResult> {
    this.logger.info({ photoCount: photos.length, category }, 'Starting TZ generation');

    try {
      if (!category.trim()) {
        throw new GenerationError('Не указана категория товара');
      }

      await onProgress?.(0);
      const photoAnalysis = await this.analyzePhotos(photos);
      this.logger.info({ analysisLength: photoAnalysis.length }, 'Photo analysis completed');

      // Аудитория определяется в рамках анализа, этап только для прогресса
      await onProgress?.(1);

      await onProgress?.(2);
      const attempt = await this.generateWithRetry(photoAnalysis, category, onProgress);

      await onProgress?.(3);

      this.logger.info(
        { tzLength: attempt.tzText.length, qualityScore: attempt.validation.score, retryCount: attempt.retryCount },
        'TZ generation completed'
      );

      return {
        success: true,
        photoAnalysis,
        tzText: attempt.tzText,
        qualityScore: attempt.validation.score,
        validation: attempt.validation,
        errorMessage: null,
        retryCount: attempt.retryCount,
      };
    } catch (error: unknown) {
      return this.toFailedResult(error);
    }
  }

  /**
   * Перегенерация по запросу пользователя. Анализ фото берётся готовый,
   * генерация выполняется один раз, без цикла повторов.
   */
  async regenerate(params: RegenerateParams, onProgress?: ProgressCallback): Promise<GenerationResult> {
    const { photoAnalysis, category, previousTz, feedback } = params;
    this.logger.info({ category, hasFeedback: Boolean(feedback) }, 'Starting TZ regeneration');

    try {
      await onProgress?.(2);

      const issues: string[] = [];
      const safeFeedback = sanitizeFeedback(feedback);
      if (safeFeedback) {
        issues.push(`Отзыв пользователя: ${safeFeedback}`);
      }
      if (previousTz) {
        issues.push('Необходимо улучшить качество и полноту ТЗ по сравнению с предыдущей версией');
      }

      const prompt = buildRegenerationPrompt({
        productDescription: photoAnalysis,
        category,
        previousTz,
        validationIssues: issues.length > 0 ? issues.join('\n') : 'Недостаточное качество',
      });

      const response = await this.callTextChain(prompt);

      await onProgress?.(3);
      const validation = this.validator.validate(response.content);

      this.logger.info(
        { tzLength: response.content.length, qualityScore: validation.score },
        'TZ regeneration completed'
      );

      return {
        success: true,
        photoAnalysis,
        tzText: response.content,
        qualityScore: validation.score,
        validation,
        errorMessage: null,
        retryCount: 0,
      };
    } catch (error: unknown) {
      return this.toFailedResult(error);
    }
  }

  private async analyzePhotos(photos: readonly Buffer[]): Promise<string> {
    if (photos.length === 0) {
      throw new VisionAnalysisError('Нет фото для анализа');
    }

    let response: ProviderResponse;
    try {
      response = photos.length === 1
        ? await this.visionChain.analyzeImage(photos[0], VISION_ANALYSIS_PROMPT)
        : await this.visionChain.analyzeMultipleImages(photos, VISION_ANALYSIS_PROMPT);
    } catch (error: unknown) {
      if (error instanceof ProviderChainExhaustedError) {
        throw new VisionAnalysisError(error.message);
      }
      throw error;
    }

    if (!response.success) {
      throw new VisionAnalysisError(response.errorMessage ?? 'Vision analysis failed');
    }
    return response.content;
  }

  private async callTextChain(prompt: string): Promise<ProviderResponse> {
    let response: ProviderResponse;
    try {
      response = await this.textChain.generate({
        prompt,
        systemPrompt: TZ_SYSTEM_PROMPT,
        maxTokens: MAX_GENERATION_TOKENS,
      });
    } catch (error: unknown) {
      if (error instanceof ProviderChainExhaustedError) {
        throw new TextGenerationError(error.message);
      }
      throw error;
    }

    if (!response.success) {
      throw new TextGenerationError(response.errorMessage ?? 'Text generation failed');
    }
    return response;
  }

  /**
   * Генерация с повторами. Хранит ЛУЧШИЙ результат из всех попыток, а не последний;
   * при равной оценке остаётся более ранний.
   *
   * - первая валидная попытка возвращается сразу
   * - повторные попытки строят промпт по замечаниям к лучшему результату
   * - после последней попытки возвращается лучший результат, если хоть одна
   *   генерация удалась, иначе TextGenerationError
   */
  private async generateWithRetry(
    photoAnalysis: string,
    category: string,
    onProgress?: ProgressCallback
  ): Promise<Attempt> {
    let best: Attempt | null = null;
    let lastError = 'All generation attempts failed';

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      if (attempt > 0) {
        this.logger.info({ attempt }, 'Retry attempt');
        await onProgress?.(2, `попытка ${attempt + 1}`);
      }

      const basePrompt = buildTzPrompt({ productDescription: photoAnalysis, category });
      const prompt = best === null
        ? basePrompt
        : buildImprovedPrompt(basePrompt, buildImprovements(best.validation));

      let tzText: string;
      try {
        tzText = (await this.callTextChain(prompt)).content;
      } catch (error: unknown) {
        if (!(error instanceof TextGenerationError)) {
          throw error;
        }
        lastError = error.message;
        this.logger.warn({ attempt, error: error.message }, 'Generation attempt failed');
        continue;
      }

      const validation = this.validator.validate(tzText);
      this.logger.debug(
        { attempt, score: validation.score, isValid: validation.isValid, tzLength: tzText.length },
        'Attempt validated'
      );

      if (best === null || validation.score > best.validation.score) {
        best = { tzText, validation, retryCount: attempt };
        this.logger.debug({ score: validation.score }, 'New best result');
      }

      if (validation.isValid) {
        return { tzText, validation, retryCount: attempt };
      }
    }

    if (best === null) {
      throw new TextGenerationError(lastError);
    }

    const bestScore = best.validation.score;
    if (bestScore >= ACCEPTABLE_SCORE) {
      this.logger.warn({ score: bestScore }, 'Returning best TZ with suboptimal quality');
    } else {
      this.logger.warn({ score: bestScore }, 'Returning best-effort TZ below acceptable score');
    }
    return { ...best, retryCount: MAX_RETRIES };
  }

  private toFailedResult(error: unknown): GenerationResult {
    if (error instanceof VisionAnalysisError) {
      this.logger.error({ error: error.message }, 'Vision analysis failed');
      return failedResult(`Ошибка анализа фото: ${error.message}`);
    }
    if (error instanceof TextGenerationError) {
      this.logger.error({ error: error.message }, 'Text generation failed');
      return failedResult(`Ошибка генерации текста: ${error.message}`);
    }
    if (error instanceof TzGeneratorError) {
      this.logger.error({ error: error.message, name: error.name }, 'Generation failed');
      return failedResult(error.message);
    }

    this.logger.error(
      { error: getErrorMessage(error), stack: error instanceof Error ? error.stack : undefined },
      'Unexpected generation error'
    );
    return failedResult(GENERIC_ERROR_MESSAGE);
  }
}

/**
 * Инструкции для повторной попытки по результату валидации
 */
export function buildImprovements(validation: ValidationResult): string[] {
  const improvements: string[] = [];

  if (validation.missingSections.length > 0) {
    improvements.push(`ОБЯЗАТЕЛЬНО добавь секции: ${validation.missingSections.join(', ')}`);
  }

  for (const warning of validation.warnings) {
    const lower = warning.toLowerCase();
    if (lower.includes('короткий') || lower.includes('short')) {
      improvements.push(`Сделай ТЗ БОЛЕЕ ПОДРОБНЫМ, минимум ${MIN_TZ_LENGTH} символов`);
    } else if (lower.includes('цвет') || lower.includes('color')) {
      improvements.push('Добавь КОНКРЕТНЫЕ HEX коды цветов (например #FF5722)');
    } else if (lower.includes('шаблон') || lower.includes('template')) {
      improvements.push('Убери шаблонные фразы, напиши КОНКРЕТНЫЕ тексты');
    }
  }

  return improvements;
}
