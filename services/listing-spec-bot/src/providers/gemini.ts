import {
  GoogleGenerativeAI,
  type GenerateContentRequest,
  type ModelParams,
  type Part,
  type RequestOptions,
} from '@google/generative-ai';
import { createLogger, type Logger } from '../lib/logger.js';
import { getErrorMessage } from '../lib/errors.js';
import {
  DEFAULT_MAX_IMAGES,
  DEFAULT_VISION_PROMPT,
  HEALTH_CHECK_PROMPT,
  classifyHealth,
  detectImageMimeType,
  failureResponse,
  successResponse,
  type ProviderResponse,
  type ProviderStatus,
  type TextCapable,
  type TextGenerationRequest,
  type VisionCapable,
} from './types.js';

interface GeminiCandidate {
  content?: { parts?: Array<{ text?: string }> };
  finishReason?: string;
}

interface GeminiGenerateResult {
  response: { candidates?: GeminiCandidate[] };
}

interface GeminiModel {
  generateContent(request: GenerateContentRequest): Promise<GeminiGenerateResult>;
}

/**
 * Часть SDK, которой пользуется провайдер. GoogleGenerativeAI подходит как есть,
 * в тестах подставляется фейк.
 */
export interface GeminiClient {
  getGenerativeModel(params: ModelParams, requestOptions?: RequestOptions): GeminiModel;
}

export interface GeminiProviderOptions {
  apiKey: string;
  model?: string;
  /** Таймаут текстовых запросов, секунды */
  timeoutSeconds?: number;
  /** Таймаут vision запросов, секунды */
  visionTimeoutSeconds?: number;
  maxImages?: number;
  client?: GeminiClient;
  logger?: Logger;
}

export const GEMINI_DEFAULT_MODEL = 'gemini-2.5-flash';

/**
 * Провайдер Google Gemini. Умеет и анализ фото, и генерацию текста.
 *
 * @example
 * const gemini = new GeminiProvider({ apiKey: config.gemini.apiKey });
 * const response = await gemini.analyzeImage(photo, 'Опиши товар');
 */
export class GeminiProvider implements VisionCapable, TextCapable {
  readonly name = 'gemini';
  readonly model: string;

  private readonly client: GeminiClient;
  private readonly timeoutMs: number;
  private readonly visionTimeoutMs: number;
  private readonly maxImages: number;
  private readonly logger: Logger;

  constructor(options: GeminiProviderOptions) {
    this.client = options.client ?? new GoogleGenerativeAI(options.apiKey);
    this.model = options.model ?? GEMINI_DEFAULT_MODEL;
    this.timeoutMs = (options.timeoutSeconds ?? 60) * 1000;
    this.visionTimeoutMs = (options.visionTimeoutSeconds ?? 90) * 1000;
    this.maxImages = options.maxImages ?? DEFAULT_MAX_IMAGES;
    this.logger = options.logger ?? createLogger({ module: 'gemini-provider' });
  }

  async analyzeImage(image: Buffer, prompt?: string): Promise<ProviderResponse> {
    return this.analyzeMultipleImages([image], prompt);
  }

  async analyzeMultipleImages(images: readonly Buffer[], prompt?: string): Promise<ProviderResponse> {
    const parts: Part[] = images.slice(0, this.maxImages).map(image => ({
      inlineData: {
        mimeType: detectImageMimeType(image),
        data: image.toString('base64'),
      },
    }));
    parts.push({ text: prompt || DEFAULT_VISION_PROMPT });

    const response = await this.request(
      { model: this.model, generationConfig: { temperature: 0.3, maxOutputTokens: 2000 } },
      { contents: [{ role: 'user', parts }] },
      this.visionTimeoutMs,
      'vision'
    );

    if (response.success) {
      this.logger.info(
        { model: this.model, imagesCount: parts.length - 1, resultLength: response.content.length },
        'Gemini vision success'
      );
    }
    return response;
  }

  async generate(request: TextGenerationRequest): Promise<ProviderResponse> {
    const params: ModelParams = {
      model: this.model,
      generationConfig: {
        temperature: request.temperature ?? 0.7,
        maxOutputTokens: request.maxTokens ?? 4000,
      },
    };
    if (request.systemPrompt) {
      params.systemInstruction = request.systemPrompt;
    }

    const response = await this.request(
      params,
      { contents: [{ role: 'user', parts: [{ text: request.prompt }] }] },
      this.timeoutMs,
      'text'
    );

    if (response.success) {
      this.logger.info({ model: this.model, resultLength: response.content.length }, 'Gemini text success');
    }
    return response;
  }

  async healthCheck(): Promise<ProviderStatus> {
    try {
      const response = await this.generate({ prompt: HEALTH_CHECK_PROMPT, maxTokens: 10, temperature: 0 });
      return classifyHealth(response);
    } catch {
      return 'error';
    }
  }

  private async request(
    params: ModelParams,
    body: GenerateContentRequest,
    timeoutMs: number,
    kind: 'vision' | 'text'
  ): Promise<ProviderResponse> {
    try {
      const model = this.client.getGenerativeModel(params, { timeout: timeoutMs });
      const result = await model.generateContent(body);
      const text = extractText(result.response.candidates);

      if (!text) {
        const finishReason = result.response.candidates?.[0]?.finishReason;
        this.logger.warn({ kind, finishReason }, 'Gemini returned empty response');
        return failureResponse(this.name, 'Пустой ответ от Gemini', { model: this.model, finishReason });
      }

      return successResponse(this.name, text, { model: this.model });
    } catch (error: unknown) {
      const message = describeGeminiError(error, timeoutMs);
      this.logger.error({ kind, model: this.model, error: message }, 'Gemini request failed');
      return failureResponse(this.name, message, { model: this.model });
    }
  }
}

function extractText(candidates: GeminiCandidate[] | undefined): string {
  const parts = candidates?.[0]?.content?.parts ?? [];
  return parts
    .map(part => part.text)
    .filter((text): text is string => typeof text === 'string')
    .join('\n')
    .trim();
}

function describeGeminiError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return `Таймаут запроса (${timeoutMs / 1000}s)`;
  }
  return getErrorMessage(error);
}
