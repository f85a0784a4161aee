import type TelegramBot from 'node-telegram-bot-api';
import { createLogger, type Logger } from './logger.js';
import { getErrorMessage } from './errors.js';
import { escapeHtml } from '../utils/formatters.js';
import type { GenerationStage, ProgressCallback } from '../core/generator.js';

export type ProgressBot = Pick<TelegramBot, 'sendMessage' | 'editMessageText'>;

interface StageInfo {
  emoji: string;
  title: string;
  description: string;
}

export const STAGES: readonly StageInfo[] = [
  { emoji: '📷', title: 'Анализ фото', description: 'Распознаю товар и его особенности' },
  { emoji: '🎯', title: 'Целевая аудитория', description: 'Определяю, кому продавать' },
  { emoji: '✍️', title: 'Генерация текстов', description: 'Пишу продающий контент' },
  { emoji: '🔍', title: 'Финальная проверка', description: 'Проверяю качество' },
];

export const LOADING_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export const MOTIVATION_PHRASES = [
  'Магия AI в действии ✨',
  'Анализирую каждую деталь 🔍',
  'Создаю продающий контент 📈',
  'Работаю над твоим успехом 🚀',
  'Скоро будет готово 🎯',
];

// Примерная длительность одного этапа, секунды
const SECONDS_PER_STAGE = 8;

export interface ProgressView {
  stage: number;
  substage?: string;
  frame: string;
  phrase: string;
}

/**
 * Текст сообщения прогресса (HTML)
 */
export function buildProgressText({ stage, substage, frame, phrase }: ProgressView): string {
  const percent = Math.floor((stage / STAGES.length) * 100);
  const filled = Math.floor(percent / 10);
  const bar = '█'.repeat(filled) + '░'.repeat(10 - filled);

  const lines = [
    `🪄 <b>Создаю ТЗ для твоего товара</b> ${frame}\n`,
    `<code>[${bar}] ${percent}%</code>\n`,
  ];

  STAGES.forEach((info, index) => {
    if (index < stage) {
      lines.push(`✅ <s>${info.title}</s>`);
    } else if (index === stage) {
      lines.push(substage
        ? `🔄 <b>${info.title}</b> <i>(${escapeHtml(substage)})</i>`
        : `🔄 <b>${info.title}</b>`);
      lines.push(`   └ ${info.emoji} <i>${info.description}</i>`);
    } else {
      lines.push(`⬜ ${info.title}`);
    }
  });

  const remaining = (STAGES.length - stage) * SECONDS_PER_STAGE;
  lines.push(remaining > 0
    ? `\n⏱ <i>~${remaining} сек · ${phrase}</i>`
    : `\n✨ <i>Почти готово! ${phrase}</i>`);

  return lines.join('\n');
}

export interface ProgressTrackerOptions {
  random?: () => number;
  logger?: Logger;
}

/**
 * Показывает прогресс генерации, редактируя одно сообщение в чате.
 * Передаётся в генератор как ProgressCallback через `callback`.
 */
export class ProgressTracker {
  private frameIndex = 0;
  private readonly random: () => number;
  private readonly logger: Logger;

  private constructor(
    private readonly bot: ProgressBot,
    private readonly chatId: number,
    private readonly messageId: number,
    options: ProgressTrackerOptions
  ) {
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger({ module: 'progress' });
  }

  static async start(
    bot: ProgressBot,
    chatId: number,
    categoryTitle: string,
    photoCount: number | null,
    options: ProgressTrackerOptions = {}
  ): Promise<ProgressTracker> {
    let initial = buildProgressText({ stage: 0, frame: LOADING_FRAMES[0], phrase: MOTIVATION_PHRASES[0] }) + '\n';
    if (photoCount !== null) {
      initial += `\n📷 Фото: <b>${photoCount} шт.</b>`;
    }
    initial += `\n📁 Категория: <b>${escapeHtml(categoryTitle)}</b>`;

    const message = await bot.sendMessage(chatId, initial, { parse_mode: 'HTML' });
    return new ProgressTracker(bot, chatId, message.message_id, options);
  }

  readonly callback: ProgressCallback = async (stage: GenerationStage, substage?: string) => {
    this.frameIndex = (this.frameIndex + 1) % LOADING_FRAMES.length;
    const phrase = MOTIVATION_PHRASES[Math.floor(this.random() * MOTIVATION_PHRASES.length)];
    await this.edit(buildProgressText({ stage, substage, frame: LOADING_FRAMES[this.frameIndex], phrase }));
  };

  async complete(): Promise<void> {
    const done = STAGES.map(info => `✅ ${info.title}`).join('\n');
    await this.edit(
      `🎉 <b>ТЗ готово!</b>\n\n<code>[${'█'.repeat(10)}] 100%</code>\n\n${done}\n\n📄 <i>Отправляю результат...</i>`
    );
  }

  async error(message: string): Promise<void> {
    await this.edit(
      `❌ <b>Упс! Что-то пошло не так</b>\n\n⚠️ ${escapeHtml(message)}\n\n💡 <i>Попробуй ещё раз чуть позже</i>`
    );
  }

  private async edit(text: string): Promise<void> {
    try {
      await this.bot.editMessageText(text, {
        chat_id: this.chatId,
        message_id: this.messageId,
        parse_mode: 'HTML',
      });
    } catch (err: unknown) {
      const message = getErrorMessage(err);
      // Telegram отвечает 400, если текст не изменился
      if (!message.includes('message is not modified')) {
        this.logger.warn({ chatId: this.chatId, error: message }, 'Progress update failed');
      }
    }
  }
}
