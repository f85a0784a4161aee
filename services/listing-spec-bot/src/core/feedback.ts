export const MAX_FEEDBACK_LENGTH = 500;

// Разделители и ролевые маркеры, которыми пытаются переписать инструкции модели
const INJECTION_MARKERS = ['```', '---', '###', 'SYSTEM:', 'USER:', 'ASSISTANT:'];

/**
 * Очистка отзыва пользователя перед вставкой в промпт.
 *
 * Обрезает до maxLength, удаляет маркеры из INJECTION_MARKERS и пробелы по краям.
 * Это частичная защита от prompt injection, а не гарантия: перефразированные
 * инструкции фильтр не ловит.
 */
export function sanitizeFeedback(text: string | null | undefined, maxLength = MAX_FEEDBACK_LENGTH): string {
  if (!text) {
    return '';
  }

  let result = text.slice(0, maxLength);
  for (const marker of INJECTION_MARKERS) {
    result = result.replaceAll(marker, '');
  }
  return result.trim();
}
