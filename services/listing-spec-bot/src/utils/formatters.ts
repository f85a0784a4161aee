// Лимит Telegram 4096, запас под заголовки и эмодзи
export const MAX_MESSAGE_LENGTH = 4000;

export const SECTION_DIVIDER = '━━━━━━━━━━━━━━━━━━━━━';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Markdown → читаемый plain text для отправки без parse_mode
 */
export function cleanMarkdownForTelegram(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, '')
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/__(.+?)__/g, '$1')
    .replace(/(?<![\p{L}\p{N}])_(.+?)_(?![\p{L}\p{N}])/gu, '$1')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
    .replace(/`([^`]+)`/g, '$1')
    .replace(/^(?:---+|\*\*\*+)$/gm, SECTION_DIVIDER)
    .replace(/^[-*+]\s+/gm, '• ')
    .trim();
}

const INTRO_PATTERNS: readonly RegExp[] = [
  /^Вот\s+(?:полное\s+)?техническое\s+задание[^\n]*\n+/i,
  /^Готово[!.]?\s+(?:Вот\s+)?[^\n]*техническое\s+задание[^\n]*\n+/i,
  /^Ниже\s+(?:представлено\s+)?(?:полное\s+)?(?:техническое\s+)?задание[^\n]*\n+/i,
  /^Техническое\s+задание\s+для\s+создания\s+инфографики[^\n]*\n+/i,
  /^Предлагаю\s+(?:вам\s+)?(?:полное\s+)?техническое\s+задание[^\n]*\n+/i,
  /^Создаю\s+(?:для\s+вас\s+)?техническое\s+задание[^\n]*\n+/i,
];

/**
 * Убирает вступление модели вида "Вот полное техническое задание..."
 */
export function removeIntroMessage(text: string): string {
  let result = text.trimStart();
  for (const pattern of INTRO_PATTERNS) {
    result = result.replace(pattern, '');
  }
  return result.trim();
}

/**
 * Разбивает длинный текст на части не длиннее maxLength.
 *
 * Место разрыва выбирается по приоритету: абзац, разделитель секций, перенос строки,
 * конец предложения, пробел. Кандидат засчитывается, только если он дальше трети
 * куска, иначе — жёсткий разрыв по maxLength. Весь текст попадает в результат.
 */
export function splitMessage(text: string, maxLength: number = MAX_MESSAGE_LENGTH): string[] {
  if (!text) {
    return [];
  }
  if (text.length <= maxLength) {
    return [text];
  }

  const parts: string[] = [];
  const minPos = Math.floor(maxLength / 3);
  let remaining = text;

  while (remaining) {
    if (remaining.length <= maxLength) {
      parts.push(remaining.trim());
      break;
    }

    const chunk = remaining.slice(0, maxLength);
    let splitPos = chunk.lastIndexOf('\n\n');

    const candidates = [
      chunk.lastIndexOf(SECTION_DIVIDER.slice(0, 5)),
      chunk.lastIndexOf('\n'),
      sentenceEnd(chunk),
      chunk.lastIndexOf(' '),
    ];
    for (const candidate of candidates) {
      if (splitPos >= minPos) {
        break;
      }
      if (candidate > minPos) {
        splitPos = candidate;
      }
    }

    if (splitPos <= 0 || splitPos < Math.floor(maxLength / 4)) {
      splitPos = maxLength;
    }

    const part = remaining.slice(0, splitPos).trim();
    if (part) {
      parts.push(part);
    }
    remaining = remaining.slice(splitPos).trim();
  }

  return parts;
}

function sentenceEnd(chunk: string): number {
  const pos = chunk.lastIndexOf('. ');
  return pos === -1 ? -1 : pos + 1;
}
