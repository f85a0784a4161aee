import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import type TelegramBot from 'node-telegram-bot-api';
import {
  LOADING_FRAMES,
  MOTIVATION_PHRASES,
  ProgressTracker,
  buildProgressText,
  type ProgressBot,
} from '../lib/progress.js';

function fakeBot() {
  const message: TelegramBot.Message = { message_id: 42, date: 0, chat: { id: 7, type: 'private' } };
  const sendMessage = vi.fn<ProgressBot['sendMessage']>().mockResolvedValue(message);
  const editMessageText = vi.fn<ProgressBot['editMessageText']>().mockResolvedValue(true);
  return { bot: { sendMessage, editMessageText }, sendMessage, editMessageText };
}

describe('buildProgressText', () => {
  it('renders done, current and pending stages', () => {
    const text = buildProgressText({ stage: 2, substage: 'попытка 2', frame: '⠹', phrase: 'Скоро' });

    expect(text).toBe([
      '🪄 <b>Создаю ТЗ для твоего товара</b> ⠹\n',
      '<code>[█████░░░░░] 50%</code>\n',
      '✅ <s>Анализ фото</s>',
      '✅ <s>Целевая аудитория</s>',
      '🔄 <b>Генерация текстов</b> <i>(попытка 2)</i>',
      '   └ ✍️ <i>Пишу продающий контент</i>',
      '⬜ Финальная проверка',
      '\n⏱ <i>~16 сек · Скоро</i>',
    ].join('\n'));
  });

  it('starts with an empty bar', () => {
    const text = buildProgressText({ stage: 0, frame: '⠋', phrase: 'Скоро' });

    expect(text).toContain('<code>[░░░░░░░░░░] 0%</code>');
    expect(text).toContain('🔄 <b>Анализ фото</b>\n');
    expect(text).toContain('~32 сек');
  });

  it('escapes the substage', () => {
    const text = buildProgressText({ stage: 3, substage: '<b>', frame: '⠋', phrase: 'Скоро' });

    expect(text).toContain('🔄 <b>Финальная проверка</b> <i>(&lt;b&gt;)</i>');
    expect(text).toContain('<code>[███████░░░] 75%</code>');
  });
});

describe('ProgressTracker', () => {
  const logger = pino({ level: 'silent' });

  it('sends the initial message and edits it on each stage', async () => {
    const { bot, sendMessage, editMessageText } = fakeBot();
    const tracker = await ProgressTracker.start(bot, 7, 'Дом', 3, { random: () => 0, logger });

    expect(sendMessage).toHaveBeenCalledTimes(1);
    const [chatId, initial, options] = sendMessage.mock.calls[0];
    expect(chatId).toBe(7);
    expect(initial).toContain('📷 Фото: <b>3 шт.</b>\n📁 Категория: <b>Дом</b>');
    expect(options).toEqual({ parse_mode: 'HTML' });

    await tracker.callback(2, 'попытка 2');

    expect(editMessageText).toHaveBeenCalledWith(
      buildProgressText({ stage: 2, substage: 'попытка 2', frame: LOADING_FRAMES[1], phrase: MOTIVATION_PHRASES[0] }),
      { chat_id: 7, message_id: 42, parse_mode: 'HTML' }
    );
  });

  it('omits the photo line when there is no photo count', async () => {
    const { bot, sendMessage } = fakeBot();
    await ProgressTracker.start(bot, 7, 'Дом', null, { logger });

    expect(sendMessage.mock.calls[0][1]).not.toContain('📷 Фото');
  });

  it('ignores "message is not modified" errors', async () => {
    const { bot, editMessageText } = fakeBot();
    const warn = vi.spyOn(logger, 'warn');
    const tracker = await ProgressTracker.start(bot, 7, 'Дом', 1, { logger });
    editMessageText.mockRejectedValueOnce(new Error('ETELEGRAM: 400 Bad Request: message is not modified'));

    await expect(tracker.callback(1)).resolves.toBeUndefined();
    expect(warn).not.toHaveBeenCalled();

    editMessageText.mockRejectedValueOnce(new Error('ETELEGRAM: 429 Too Many Requests'));
    await expect(tracker.callback(2)).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('shows escaped error text', async () => {
    const { bot, editMessageText } = fakeBot();
    const tracker = await ProgressTracker.start(bot, 7, 'Дом', 1, { logger });

    await tracker.error('Ошибка <vision>');

    expect(editMessageText.mock.calls[0][0]).toContain('⚠️ Ошибка &lt;vision&gt;');
  });

  it('shows a full bar on completion', async () => {
    const { bot, editMessageText } = fakeBot();
    const tracker = await ProgressTracker.start(bot, 7, 'Дом', 1, { logger });

    await tracker.complete();

    expect(editMessageText.mock.calls[0][0]).toContain('<code>[██████████] 100%</code>');
  });
});
