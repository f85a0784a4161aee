/**
 * Шаблоны промптов для анализа фото и генерации ТЗ на инфографику.
 * Только сборка строк, без вызовов API.
 */

export const MIN_TZ_LENGTH = 2000;

export const REQUIRED_SECTIONS = [
  'ТОВАР',
  'ЦЕЛЕВАЯ АУДИТОРИЯ',
  'ВИЗУАЛЬНАЯ КОНЦЕПЦИЯ',
  'ГЛАВНОЕ ФОТО',
  'ИНФОГРАФИКА',
  'ГОТОВЫЕ ТЕКСТЫ',
  'РЕКОМЕНДАЦИИ ДИЗАЙНЕРУ',
  'A/B ТЕСТ',
] as const;

export type RequiredSection = typeof REQUIRED_SECTIONS[number];

export const VISION_ANALYSIS_PROMPT = `Ты — эксперт по товарам для маркетплейсов (Wildberries, Ozon).
Внимательно изучи фото товара и опиши:

1. Что это за товар, его тип и назначение
2. Материалы, фактура, цвета (по возможности с HEX кодами)
3. Размеры и пропорции, если их можно оценить
4. Ключевые особенности и преимущества, заметные на фото
5. Комплектация и упаковка, если видны
6. Кому может быть интересен товар
7. Недостатки фото, которые стоит учесть дизайнеру (фон, свет, ракурс)

Пиши фактами, без воды. Если деталь не видна — так и скажи, не придумывай.`;

export const TZ_SYSTEM_PROMPT = `Ты — арт-директор, который пишет технические задания дизайнерам инфографики для маркетплейсов.
Твои ТЗ конкретны: точные HEX цвета, размеры шрифтов, готовые тексты для каждого слайда.
Никогда не оставляй плейсхолдеров вида "[ваш текст]" и не перекладывай решения на дизайнера.`;

export interface TzPromptParams {
  productDescription: string;
  category: string;
}

export function buildTzPrompt({ productDescription, category }: TzPromptParams): string {
  const sections = REQUIRED_SECTIONS.map((section, index) => `## ${index + 1}. ${section}`).join('\n');

  return `Составь полное техническое задание на инфографику для карточки товара.

КАТЕГОРИЯ: ${category}

ОПИСАНИЕ ТОВАРА ПО ФОТО:
${productDescription}

СТРУКТУРА ТЗ (все секции обязательны, заголовки именно такие):
${sections}

ТРЕБОВАНИЯ:
- Объём не меньше ${MIN_TZ_LENGTH} символов
- Для палитры укажи минимум 3 цвета в формате HEX (например #FF5722)
- Для каждого слайда инфографики (6-8 слайдов) — заголовок, подзаголовок и буллеты
- Используй конкретные цифры: размеры, вес, объём, сроки гарантии
- В секции A/B ТЕСТ предложи 2 варианта главного фото с гипотезами
- Пиши на русском языке

Начинай сразу с первой секции, без вступлений.`;
}

export function buildImprovedPrompt(basePrompt: string, improvements: readonly string[]): string {
  if (improvements.length === 0) {
    return basePrompt;
  }
  const list = improvements.map(item => `- ${item}`).join('\n');
  return `${basePrompt}\n\n⚠️ ВАЖНЫЕ ИСПРАВЛЕНИЯ:\n${list}`;
}

export interface RegenerationPromptParams extends TzPromptParams {
  validationIssues: string;
  previousTz?: string;
}

// Сколько символов предыдущего ТЗ показывать модели
const PREVIOUS_TZ_EXCERPT_LENGTH = 3000;

export function buildRegenerationPrompt({
  productDescription,
  category,
  validationIssues,
  previousTz,
}: RegenerationPromptParams): string {
  const parts = [buildTzPrompt({ productDescription, category })];

  if (previousTz) {
    parts.push(
      `ПРЕДЫДУЩАЯ ВЕРСИЯ ТЗ (не копируй, сделай лучше):\n${previousTz.slice(0, PREVIOUS_TZ_EXCERPT_LENGTH)}`
    );
  }

  parts.push(`ЧТО НУЖНО ИСПРАВИТЬ:\n${validationIssues}`);

  return parts.join('\n\n');
}
