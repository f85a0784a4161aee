import TelegramBot from 'node-telegram-bot-api';
import { buffer } from 'node:stream/consumers';
import { CATEGORIES, getCategory, type ProductCategory } from './config.js';
import { createLogger, type Logger } from './lib/logger.js';
import { getErrorMessage } from './lib/errors.js';
import { ProgressTracker } from './lib/progress.js';
import { SessionStore } from './lib/sessions.js';
import { RateLimiter, type RateLimitConfig, type RateLimitDecision, type ThrottledEvent } from './lib/rateLimit.js';
import { cleanMarkdownForTelegram, removeIntroMessage, splitMessage } from './utils/formatters.js';
import type { GenerationResult, TzGenerator } from './core/generator.js';

export const CALLBACK_CATEGORY = 'category:';
export const CALLBACK_REGENERATE = 'regenerate';
export const CALLBACK_REGENERATE_SKIP = 'regenerate:skip';

const BUSY_MESSAGE = '⏳ Генерация уже идёт, дождись результата.';
const ERROR_MESSAGE = 'Произошла ошибка. Попробуйте позже.';

// Очистка неактивных сессий и счётчиков
const SWEEP_INTERVAL_MS = 5 * 60_000;
const SESSION_IDLE_MS = 30 * 60_000;

export interface TzBotOptions {
  bot: TelegramBot;
  generator: Pick<TzGenerator, 'generate' | 'regenerate'>;
  maxPhotos: number;
  rateLimits?: Partial<RateLimitConfig>;
  logger?: Logger;
}

type DeniedDecision = Extract<RateLimitDecision, { allowed: false }>;

/**
 * Ответ пользователю, которого притормозил лимитер
 */
export function throttleMessage(event: ThrottledEvent, decision: DeniedDecision): string {
  const seconds = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
  if (decision.banned) {
    return `⏳ Слишком много запросов. Подождите ${seconds} сек.`;
  }
  if (event === 'generation') {
    return `⏳ Генерация доступна через ${seconds} сек.`;
  }
  return '⏳ Не так быстро! Подождите немного.';
}

export interface PollingErrorSource {
  on(event: 'polling_error', listener: (error: Error) => void): unknown;
}

export function logPollingErrors(source: PollingErrorSource, logger: Logger): void {
  source.on('polling_error', error => {
    logger.error({ error: error.message }, 'Polling error');
  });
}

export function buildCategoryKeyboard(): TelegramBot.InlineKeyboardMarkup {
  const buttons = CATEGORIES.map(category => ({
    text: `${category.emoji} ${category.title}`,
    callback_data: `${CALLBACK_CATEGORY}${category.key}`,
  }));

  // По две кнопки в ряд
  const rows: TelegramBot.InlineKeyboardButton[][] = [];
  for (let i = 0; i < buttons.length; i += 2) {
    rows.push(buttons.slice(i, i + 2));
  }
  return { inline_keyboard: rows };
}

export function buildRegenerateKeyboard(): TelegramBot.InlineKeyboardMarkup {
  return {
    inline_keyboard: [[{ text: '🔄 Перегенерировать', callback_data: CALLBACK_REGENERATE }]],
  };
}

/**
 * Сообщения с готовым ТЗ: заголовок с оценкой и текст по частям.
 * Если частей больше одной, каждая помечается номером.
 */
export function formatResultMessages(result: GenerationResult, category: ProductCategory): string[] {
  const text = cleanMarkdownForTelegram(removeIntroMessage(result.tzText));
  const parts = splitMessage(text);

  const header =
    `✅ ТЗ готово!\n\n` +
    `📁 Категория: ${category.emoji} ${category.title}\n` +
    `📊 Оценка качества: ${result.qualityScore}/100`;

  if (parts.length <= 1) {
    return [header, ...parts];
  }
  return [header, ...parts.map((part, index) => `📄 Часть ${index + 1}/${parts.length}\n\n${part}`)];
}

/**
 * Telegram бот: собирает фото, спрашивает категорию, отдаёт ТЗ.
 * Состояние чатов хранится в памяти, одна генерация на чат одновременно.
 */
export class TzBot {
  private readonly bot: TelegramBot;
  private readonly generator: TzBotOptions['generator'];
  private readonly maxPhotos: number;
  private readonly sessions: SessionStore;
  private readonly limiter: RateLimiter;
  private readonly logger: Logger;
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(options: TzBotOptions) {
    this.bot = options.bot;
    this.generator = options.generator;
    this.maxPhotos = options.maxPhotos;
    this.logger = options.logger ?? createLogger({ module: 'bot' });
    this.sessions = new SessionStore(options.maxPhotos);
    this.limiter = new RateLimiter({ limits: options.rateLimits, logger: this.logger });
  }

  start(): void {
    this.bot.onText(/^\/start/, msg =>
      this.handle('start', msg.chat.id, () => this.handleStart(msg), 'message'));
    this.bot.onText(/^\/cancel/, msg =>
      this.handle('cancel', msg.chat.id, () => this.handleCancel(msg), 'message'));
    // Фото альбома приходят пачкой, их ограничивает maxPhotos
    this.bot.on('photo', msg =>
      this.handle('photo', msg.chat.id, () => this.handlePhoto(msg), msg.media_group_id ? null : 'photo'));
    this.bot.on('message', msg => {
      if (msg.text && !msg.text.startsWith('/')) {
        this.handle('text', msg.chat.id, () => this.handleText(msg, msg.text ?? ''), 'message');
      }
    });
    this.bot.on('callback_query', query => {
      const chatId = query.message?.chat.id;
      if (chatId !== undefined) {
        this.handle('callback', chatId, () => this.handleCallbackQuery(query, chatId), 'callback', query.id);
      }
    });
    logPollingErrors(this.bot, this.logger);

    this.sweeper = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);

    this.logger.info({ maxPhotos: this.maxPhotos }, 'Telegram bot handlers registered');
  }

  async stop(): Promise<void> {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    await this.bot.stopPolling();
    this.logger.info('Telegram bot stopped');
  }

  private sweep(): void {
    const sessions = this.sessions.evictIdle(SESSION_IDLE_MS);
    const limits = this.limiter.cleanup();
    if (sessions > 0 || limits > 0) {
      this.logger.debug({ sessions, limits }, 'Idle chats evicted');
    }
  }

  private handle(
    event: string,
    chatId: number,
    fn: () => Promise<void>,
    throttle: ThrottledEvent | null,
    queryId?: string
  ): void {
    const run = async () => {
      if (throttle !== null && !(await this.allow(chatId, throttle, queryId))) {
        return;
      }
      await fn();
    };

    run().catch(async (err: unknown) => {
      this.logger.error({ event, chatId, error: getErrorMessage(err) }, 'Handler failed');
      try {
        await this.bot.sendMessage(chatId, ERROR_MESSAGE);
      } catch (sendErr: unknown) {
        this.logger.error({ chatId, error: getErrorMessage(sendErr) }, 'Failed to send error message');
      }
    });
  }

  /**
   * Проверяет лимит. При отказе отвечает пользователю: на callback —
   * всплывающим уведомлением, иначе сообщением.
   */
  private async allow(chatId: number, event: ThrottledEvent, queryId?: string): Promise<boolean> {
    const decision = this.limiter.hit(chatId, event);
    if (decision.allowed) {
      return true;
    }

    const text = throttleMessage(event, decision);
    if (queryId !== undefined) {
      await this.bot.answerCallbackQuery(queryId, { text, show_alert: true });
    } else {
      await this.bot.sendMessage(chatId, text);
    }
    return false;
  }

  private async handleStart(msg: TelegramBot.Message): Promise<void> {
    const chatId = msg.chat.id;
    const firstName = msg.from?.first_name ?? '';
    this.sessions.reset(chatId);

    await this.bot.sendMessage(chatId,
      `Привет${firstName ? `, ${firstName}` : ''}! 👋\n\n` +
      `Я составлю техническое задание для дизайнера инфографики на маркетплейс.\n\n` +
      `📷 Пришли от 1 до ${this.maxPhotos} фото товара, затем выбери категорию.\n` +
      `❌ /cancel — начать заново`
    );
  }

  private async handleCancel(msg: TelegramBot.Message): Promise<void> {
    const chatId = msg.chat.id;
    this.sessions.reset(chatId);
    await this.bot.sendMessage(chatId, '🗑 Фото удалены. Пришли новые, чтобы начать заново.');
  }

  private async handlePhoto(msg: TelegramBot.Message): Promise<void> {
    const chatId = msg.chat.id;
    const session = this.sessions.get(chatId);
    const sizes = msg.photo ?? [];
    const largest = sizes[sizes.length - 1];

    if (!largest) {
      return;
    }
    if (session.busy) {
      await this.bot.sendMessage(chatId, BUSY_MESSAGE);
      return;
    }
    if (session.photos.length >= this.maxPhotos) {
      await this.bot.sendMessage(chatId, `⚠️ Максимум ${this.maxPhotos} фото. Выбери категорию:`, {
        reply_markup: buildCategoryKeyboard(),
      });
      return;
    }

    const photo = await buffer(this.bot.getFileStream(largest.file_id));
    const count = this.sessions.addPhoto(chatId, photo);
    if (count === null) {
      return;
    }
    this.logger.debug({ chatId, count, size: photo.length }, 'Photo received');

    // На альбом отвечаем один раз
    const groupId = msg.media_group_id ?? null;
    if (groupId !== null && groupId === session.lastMediaGroupId) {
      return;
    }
    session.lastMediaGroupId = groupId;

    await this.bot.sendMessage(chatId,
      `📷 Фото получено (${count}/${this.maxPhotos}).\n\n` +
      `Пришли ещё фото или выбери категорию товара:`,
      { reply_markup: buildCategoryKeyboard() }
    );
  }

  private async handleText(msg: TelegramBot.Message, text: string): Promise<void> {
    const chatId = msg.chat.id;
    const session = this.sessions.get(chatId);

    if (!session.awaitingFeedback) {
      await this.bot.sendMessage(chatId, '📷 Пришли фото товара, чтобы начать.');
      return;
    }

    session.awaitingFeedback = false;
    await this.runRegeneration(chatId, text);
  }

  private async handleCallbackQuery(query: TelegramBot.CallbackQuery, chatId: number): Promise<void> {
    const data = query.data ?? '';

    if (data.startsWith(CALLBACK_CATEGORY)) {
      const category = getCategory(data.slice(CALLBACK_CATEGORY.length));
      if (!category) {
        await this.bot.answerCallbackQuery(query.id, { text: 'Категория не найдена' });
        return;
      }
      await this.bot.answerCallbackQuery(query.id);
      await this.runGeneration(chatId, category);
      return;
    }

    if (data === CALLBACK_REGENERATE) {
      await this.bot.answerCallbackQuery(query.id);
      const session = this.sessions.get(chatId);
      if (!session.last) {
        await this.bot.sendMessage(chatId, '⚠️ Нет ТЗ для перегенерации. Пришли фото товара.');
        return;
      }
      session.awaitingFeedback = true;
      await this.bot.sendMessage(chatId,
        '✏️ Напиши, что исправить в ТЗ, или нажми «Пропустить».',
        { reply_markup: { inline_keyboard: [[{ text: '⏭ Пропустить', callback_data: CALLBACK_REGENERATE_SKIP }]] } }
      );
      return;
    }

    if (data === CALLBACK_REGENERATE_SKIP) {
      await this.bot.answerCallbackQuery(query.id);
      this.sessions.get(chatId).awaitingFeedback = false;
      await this.runRegeneration(chatId, null);
      return;
    }

    await this.bot.answerCallbackQuery(query.id);
  }

  private async runGeneration(chatId: number, category: ProductCategory): Promise<void> {
    const session = this.sessions.get(chatId);
    if (session.photos.length === 0) {
      await this.bot.sendMessage(chatId, '📷 Сначала пришли фото товара.');
      return;
    }
    if (!(await this.allow(chatId, 'generation'))) {
      return;
    }
    if (!this.sessions.acquire(chatId)) {
      await this.bot.sendMessage(chatId, BUSY_MESSAGE);
      return;
    }

    try {
      const photos = session.photos;
      const progress = await ProgressTracker.start(this.bot, chatId, category.title, photos.length, {
        logger: this.logger,
      });

      this.logger.info({ chatId, category: category.key, photoCount: photos.length }, 'Generation requested');
      const result = await this.generator.generate(photos, category.title, progress.callback);

      if (!result.success) {
        await progress.error(result.errorMessage ?? 'Неизвестная ошибка');
        return;
      }

      await progress.complete();
      await this.sendResult(chatId, result, category);

      session.photos = [];
      session.lastMediaGroupId = null;
      session.last = { photoAnalysis: result.photoAnalysis, category: category.key, tzText: result.tzText };
    } finally {
      this.sessions.release(chatId);
      this.limiter.record(chatId, 'generation');
    }
  }

  private async runRegeneration(chatId: number, feedback: string | null): Promise<void> {
    const session = this.sessions.get(chatId);
    const last = session.last;
    const category = last ? getCategory(last.category) : null;
    if (!last || !category) {
      await this.bot.sendMessage(chatId, '⚠️ Нет ТЗ для перегенерации. Пришли фото товара.');
      return;
    }
    if (!(await this.allow(chatId, 'generation'))) {
      return;
    }
    if (!this.sessions.acquire(chatId)) {
      await this.bot.sendMessage(chatId, BUSY_MESSAGE);
      return;
    }

    try {
      const progress = await ProgressTracker.start(this.bot, chatId, category.title, null, {
        logger: this.logger,
      });

      this.logger.info({ chatId, category: category.key, hasFeedback: feedback !== null }, 'Regeneration requested');
      const result = await this.generator.regenerate(
        {
          photoAnalysis: last.photoAnalysis,
          category: category.title,
          previousTz: last.tzText,
          feedback,
        },
        progress.callback
      );

      if (!result.success) {
        await progress.error(result.errorMessage ?? 'Неизвестная ошибка');
        return;
      }

      await progress.complete();
      await this.sendResult(chatId, result, category);
      session.last = { ...last, tzText: result.tzText };
    } finally {
      this.sessions.release(chatId);
      this.limiter.record(chatId, 'generation');
    }
  }

  private async sendResult(chatId: number, result: GenerationResult, category: ProductCategory): Promise<void> {
    const messages = formatResultMessages(result, category);

    for (let i = 0; i < messages.length; i++) {
      const isLast = i === messages.length - 1;
      await this.bot.sendMessage(chatId, messages[i], isLast ? { reply_markup: buildRegenerateKeyboard() } : {});
    }

    this.logger.info(
      { chatId, parts: messages.length, qualityScore: result.qualityScore, retryCount: result.retryCount },
      'Result sent'
    );
  }
}
