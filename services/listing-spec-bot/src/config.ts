import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './lib/errors.js';

dotenv.config();

const flag = z
  .string()
  .default('')
  .transform(value => ['1', 'true', 'yes'].includes(value.toLowerCase()));

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().default(''),

  GEMINI_API_KEY: z.string().default(''),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),

  AI_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  // Vision запросы заметно медленнее текстовых
  VISION_TIMEOUT_SECONDS: z.coerce.number().positive().default(90),

  CHAIN_MAX_RETRIES: z.coerce.number().int().min(1).default(1),
  CHAIN_RETRY_DELAY_SECONDS: z.coerce.number().min(0).default(0.5),
  CHAIN_FAIL_FAST: flag,

  MAX_PHOTOS: z.coerce.number().int().min(1).max(10).default(5),
  MIN_TZ_LENGTH: z.coerce.number().int().positive().default(2000),

  LOG_LEVEL: z.string().default('info'),
  NODE_ENV: z.string().default('development'),
});

const env = EnvSchema.parse(process.env);

export const config = {
  telegram: {
    botToken: env.TELEGRAM_BOT_TOKEN,
  },

  gemini: {
    apiKey: env.GEMINI_API_KEY,
    model: env.GEMINI_MODEL,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
  },

  ai: {
    timeoutSeconds: env.AI_TIMEOUT_SECONDS,
    visionTimeoutSeconds: env.VISION_TIMEOUT_SECONDS,
  },

  chain: {
    maxRetriesPerProvider: env.CHAIN_MAX_RETRIES,
    retryDelaySeconds: env.CHAIN_RETRY_DELAY_SECONDS,
    failFast: env.CHAIN_FAIL_FAST,
  },

  generation: {
    maxPhotos: env.MAX_PHOTOS,
    minTzLength: env.MIN_TZ_LENGTH,
  },

  logging: {
    level: env.LOG_LEVEL,
  },

  nodeEnv: env.NODE_ENV,
};

export type AppConfig = typeof config;

/**
 * Ключ считается заданным, если он не пустой и не оставлен заглушкой из .env.example
 */
export function isUsableApiKey(key: string): boolean {
  return key.length > 0 && !key.startsWith('your_');
}

// Валидация критичных переменных
export function validateConfig(cfg: AppConfig = config): void {
  const missing: string[] = [];

  if (!cfg.telegram.botToken) {
    missing.push('TELEGRAM_BOT_TOKEN');
  }
  if (!isUsableApiKey(cfg.gemini.apiKey) && !isUsableApiKey(cfg.openai.apiKey)) {
    missing.push('GEMINI_API_KEY или OPENAI_API_KEY');
  }

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }
}

export interface ProductCategory {
  key: string;
  emoji: string;
  title: string;
}

// Категории товаров для выбора
export const CATEGORIES: readonly ProductCategory[] = [
  { key: 'clothes', emoji: '👕', title: 'Одежда' },
  { key: 'electronics', emoji: '📱', title: 'Электроника' },
  { key: 'cosmetics', emoji: '💄', title: 'Косметика' },
  { key: 'home', emoji: '🏠', title: 'Дом' },
  { key: 'kids', emoji: '👶', title: 'Детям' },
  { key: 'sports', emoji: '⚽', title: 'Спорт' },
  { key: 'other', emoji: '📦', title: 'Другое' },
];

export function getCategory(key: string): ProductCategory | null {
  return CATEGORIES.find(category => category.key === key) ?? null;
}
