import OpenAI from 'openai';
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

interface ChatCompletionLike {
  choices: Array<{ message: { content: string | null }; finish_reason?: string | null }>;
  usage?: { total_tokens?: number } | null;
}

interface ChatCompletionBody {
  model: string;
  messages: OpenAI.Chat.ChatCompletionMessageParam[];
  max_tokens: number;
  temperature: number;
}

/**
 * Часть SDK, которой пользуется провайдер. Экземпляр OpenAI подходит как есть.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionBody, options?: { timeout?: number }): Promise<ChatCompletionLike>;
    };
  };
}

export interface OpenAIProviderOptions {
  apiKey: string;
  model?: string;
  timeoutSeconds?: number;
  visionTimeoutSeconds?: number;
  maxImages?: number;
  client?: OpenAIChatClient;
  logger?: Logger;
}

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Резервный провайдер OpenAI (Chat Completions), vision через data URL.
 */
export class OpenAIProvider implements VisionCapable, TextCapable {
  readonly name = 'openai';
  readonly model: string;

  private readonly client: OpenAIChatClient;
  private readonly timeoutMs: number;
  private readonly visionTimeoutMs: number;
  private readonly maxImages: number;
  private readonly logger: Logger;

  constructor(options: OpenAIProviderOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model ?? OPENAI_DEFAULT_MODEL;
    this.timeoutMs = (options.timeoutSeconds ?? 60) * 1000;
    this.visionTimeoutMs = (options.visionTimeoutSeconds ?? 90) * 1000;
    this.maxImages = options.maxImages ?? DEFAULT_MAX_IMAGES;
    this.logger = options.logger ?? createLogger({ module: 'openai-provider' });
  }

  async analyzeImage(image: Buffer, prompt?: string): Promise<ProviderResponse> {
    return this.analyzeMultipleImages([image], prompt);
  }

  async analyzeMultipleImages(images: readonly Buffer[], prompt?: string): Promise<ProviderResponse> {
    const content: OpenAI.Chat.ChatCompletionContentPart[] = [
      { type: 'text', text: prompt || DEFAULT_VISION_PROMPT },
      ...images.slice(0, this.maxImages).map((image): OpenAI.Chat.ChatCompletionContentPart => ({
        type: 'image_url',
        image_url: { url: `data:${detectImageMimeType(image)};base64,${image.toString('base64')}` },
      })),
    ];

    return this.complete(
      {
        model: this.model,
        messages: [{ role: 'user', content }],
        max_tokens: 2000,
        temperature: 0.3,
      },
      this.visionTimeoutMs,
      'vision'
    );
  }

  async generate(request: TextGenerationRequest): Promise<ProviderResponse> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    return this.complete(
      {
        model: this.model,
        messages,
        max_tokens: request.maxTokens ?? 4000,
        temperature: request.temperature ?? 0.7,
      },
      this.timeoutMs,
      'text'
    );
  }

  async healthCheck(): Promise<ProviderStatus> {
    try {
      const response = await this.generate({ prompt: HEALTH_CHECK_PROMPT, maxTokens: 10, temperature: 0 });
      return classifyHealth(response);
    } catch {
      return 'error';
    }
  }

  private async complete(
    body: ChatCompletionBody,
    timeoutMs: number,
    kind: 'vision' | 'text'
  ): Promise<ProviderResponse> {
    try {
      const completion = await this.client.chat.completions.create(body, { timeout: timeoutMs });
      const text = completion.choices[0]?.message?.content?.trim() ?? '';

      if (!text) {
        this.logger.warn(
          { kind, finishReason: completion.choices[0]?.finish_reason },
          'OpenAI returned empty content'
        );
        return failureResponse(this.name, 'Пустой ответ от OpenAI', { model: this.model });
      }

      this.logger.info({ kind, model: this.model, resultLength: text.length }, 'OpenAI request success');
      return successResponse(this.name, text, {
        model: this.model,
        totalTokens: completion.usage?.total_tokens,
      });
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      this.logger.error({ kind, model: this.model, error: message }, 'OpenAI request failed');
      return failureResponse(this.name, message, { model: this.model });
    }
  }
}
