import { z } from 'zod';

/**
 * Единый ответ любого AI провайдера.
 * При success=false поле content всегда пустое.
 */
export interface ProviderResponse {
  readonly success: boolean;
  readonly content: string;
  readonly providerName: string;
  readonly errorMessage?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type ProviderStatus = 'available' | 'rate_limited' | 'error';

export interface NamedProvider {
  readonly name: string;
  healthCheck(): Promise<ProviderStatus>;
}

export interface VisionCapable extends NamedProvider {
  analyzeImage(image: Buffer, prompt?: string): Promise<ProviderResponse>;
  analyzeMultipleImages(images: readonly Buffer[], prompt?: string): Promise<ProviderResponse>;
}

export interface TextGenerationRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TextCapable extends NamedProvider {
  generate(request: TextGenerationRequest): Promise<ProviderResponse>;
}

export const ChainConfigSchema = z.object({
  maxRetriesPerProvider: z.number().int().min(1).default(1),
  retryDelaySeconds: z.number().min(0).default(0.5),
  // Не переходить к следующему провайдеру, если первый исчерпал попытки
  failFast: z.boolean().default(false),
});

export type ChainConfig = z.infer<typeof ChainConfigSchema>;

// Сколько фото провайдер принимает за один запрос, остальные отбрасываются
export const DEFAULT_MAX_IMAGES = 5;

export const DEFAULT_VISION_PROMPT = 'Опиши подробно что изображено на фото.';

export const HEALTH_CHECK_PROMPT = "Say 'OK'";

export function successResponse(
  providerName: string,
  content: string,
  metadata: Record<string, unknown> = {}
): ProviderResponse {
  return { success: true, content, providerName, metadata };
}

export function failureResponse(
  providerName: string,
  errorMessage: string,
  metadata: Record<string, unknown> = {}
): ProviderResponse {
  return { success: false, content: '', providerName, errorMessage, metadata };
}

const RATE_LIMIT_MARKERS = ['rate', 'quota', '429', 'resource has been exhausted', 'лимит'];

export function classifyHealth(response: ProviderResponse): ProviderStatus {
  if (response.success) {
    return 'available';
  }

  const error = (response.errorMessage ?? '').toLowerCase();
  if (RATE_LIMIT_MARKERS.some(marker => error.includes(marker))) {
    return 'rate_limited';
  }

  return 'error';
}

/**
 * Определяет mime-тип по сигнатуре файла. Telegram отдаёт фото в JPEG,
 * документы могут прийти в PNG или WebP.
 */
export function detectImageMimeType(image: Buffer): string {
  if (image.length >= 8 && image[0] === 0x89 && image.toString('ascii', 1, 4) === 'PNG') {
    return 'image/png';
  }
  if (image.length >= 12 && image.toString('ascii', 0, 4) === 'RIFF' && image.toString('ascii', 8, 12) === 'WEBP') {
    return 'image/webp';
  }
  return 'image/jpeg';
}
