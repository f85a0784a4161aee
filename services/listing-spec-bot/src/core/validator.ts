import { createLogger, type Logger } from '../lib/logger.js';
import { ValidationError } from '../lib/errors.js';
import { MIN_TZ_LENGTH, REQUIRED_SECTIONS, type RequiredSection } from './prompts.js';

/**
 * Результат валидации ТЗ. Создаётся заново на каждый вызов validate().
 * Секции перечислены в порядке SECTION_PATTERNS без повторов.
 */
export interface ValidationResult {
  readonly isValid: boolean;
  /** 0-100 */
  readonly score: number;
  readonly foundSections: readonly string[];
  readonly missingSections: readonly string[];
  readonly warnings: readonly string[];
}

export interface DocumentValidator {
  validate(tzText: string): ValidationResult;
}

// Буква, цифра или _ — граница слова с учётом кириллицы
const WORD = String.raw`[\p{L}\p{N}_]`;

function pattern(source: string, flags = 'iu'): RegExp {
  return new RegExp(source.replaceAll('{W}', WORD), flags);
}

/**
 * Синонимы обязательных секций. Заголовок может быть с номером и markdown-решёткой.
 */
const SECTION_SYNONYMS: Record<RequiredSection, RegExp> = {
  'ТОВАР': pattern(String.raw`##?\s*(?:1\.?\s*)?товар|продукт|категория\s+товара`),
  'ЦЕЛЕВАЯ АУДИТОРИЯ': pattern(String.raw`##?\s*(?:2\.?\s*)?целевая аудитория|аудитория|(?<!{W})ца(?!{W})|для кого`),
  'ВИЗУАЛЬНАЯ КОНЦЕПЦИЯ': pattern(String.raw`##?\s*(?:3\.?\s*)?визуальн|концепция|стиль\s+оформления|дизайн`),
  'ГЛАВНОЕ ФОТО': pattern(String.raw`##?\s*(?:4\.?\s*)?главное фото|первый слайд|обложка`),
  'ИНФОГРАФИКА': pattern(String.raw`##?\s*(?:5\.?\s*)?инфографика|слайд\s*[2-9]|карточк`),
  'ГОТОВЫЕ ТЕКСТЫ': pattern(String.raw`##?\s*(?:6\.?\s*)?готовые тексты|тексты|заголовок`),
  'РЕКОМЕНДАЦИИ ДИЗАЙНЕРУ': pattern(String.raw`##?\s*(?:7\.?\s*)?рекомендаци|важно(?!{W})|нельзя|совет|дизайнеру`),
  'A/B ТЕСТ': pattern(String.raw`##?\s*(?:8\.?\s*)?a\/?b|тест|эксперимент`),
};

/**
 * Секции в том же порядке, в каком их требует промпт генерации
 */
export const SECTION_PATTERNS: ReadonlyArray<readonly [RequiredSection, RegExp]> = REQUIRED_SECTIONS.map(
  section => [section, SECTION_SYNONYMS[section]] as const
);

const HEX_COLOR_PATTERN = pattern(String.raw`#[0-9a-f]{6}(?!{W})`, 'giu');

// Признаки конкретики: размеры, УТП, премиальность
const QUALITY_INDICATORS: readonly RegExp[] = [
  pattern(String.raw`\d+\s*(?:мм|см|м|кг|г|мл|л)(?!{W})`, 'giu'),
  pattern('бесплатная доставка|гарантия|в подарок', 'giu'),
  pattern('premium|люкс|эко|натуральн', 'giu'),
];

// Шаблонные фразы — признак незаполненного ТЗ
export const TEMPLATE_PHRASES: readonly string[] = [
  'напишите здесь',
  'можно добавить',
  'на ваше усмотрение',
  'по желанию заказчика',
  'вставить текст',
  '[ваш текст]',
  'укажите',
  'заполните',
];

export const VALID_SCORE_THRESHOLD = 60;
const MAX_MISSING_SECTIONS = 1;
const MIN_LENGTH_RATIO = 0.8;

/**
 * Оценка качества ТЗ без внешних вызовов.
 *
 * Баллы:
 * - 50 — наличие секций
 * - 25 — длина текста
 * - 15 — конкретика (HEX цвета, размеры, УТП)
 * - 10 — отсутствие шаблонных фраз
 *
 * ТЗ валидно, если пропущено не больше одной секции, длина не меньше 80%
 * от минимальной и оценка не ниже 60. Условия проверяются независимо.
 */
export class TzValidator implements DocumentValidator {
  readonly minLength: number;
  private readonly logger: Logger;

  constructor(minLength: number = MIN_TZ_LENGTH, logger?: Logger) {
    if (!Number.isFinite(minLength) || minLength <= 0) {
      throw new ValidationError(`Минимальная длина ТЗ должна быть положительной: ${minLength}`);
    }
    this.minLength = minLength;
    this.logger = logger ?? createLogger({ module: 'validator' });
  }

  validate(tzText: string): ValidationResult {
    const warnings: string[] = [];
    const { found, missing } = checkSections(tzText);

    if (tzText.length < this.minLength) {
      warnings.push(`Текст слишком короткий: ${tzText.length} < ${this.minLength}`);
    }

    const hexColorsCount = countMatches(tzText, HEX_COLOR_PATTERN);
    if (hexColorsCount < 2) {
      warnings.push('Мало конкретных цветов (нужны HEX коды)');
    }

    const templateCount = countTemplatePhrases(tzText);
    if (templateCount > 3) {
      warnings.push(`Много шаблонных фраз: ${templateCount}`);
    }

    const qualityCount = QUALITY_INDICATORS.reduce((sum, re) => sum + countMatches(tzText, re), 0);

    const score = this.calculateScore(tzText.length, found.length, hexColorsCount, templateCount, qualityCount);

    const isValid =
      missing.length <= MAX_MISSING_SECTIONS &&
      tzText.length >= this.minLength * MIN_LENGTH_RATIO &&
      score >= VALID_SCORE_THRESHOLD;

    this.logger.debug(
      { isValid, score, foundSections: found.length, missingSections: missing.length },
      'Validation completed'
    );

    return { isValid, score, foundSections: found, missingSections: missing, warnings };
  }

  private calculateScore(
    length: number,
    foundCount: number,
    hexColorsCount: number,
    templateCount: number,
    qualityCount: number
  ): number {
    const sectionScore = Math.max(0, (foundCount / SECTION_PATTERNS.length) * 50);

    const lengthRatio = Math.min(length / this.minLength, 1.5);
    const lengthScore = Math.max(0, Math.min(lengthRatio * 16.7, 25));

    const detailScore = Math.max(0, Math.min(hexColorsCount * 2 + qualityCount, 15));

    const templateScore = Math.max(0, 10 - Math.min(templateCount * 2.5, 10));

    const total = Math.round(sectionScore + lengthScore + detailScore + templateScore);
    return Math.max(0, Math.min(100, total));
  }
}

function checkSections(text: string): { found: string[]; missing: string[] } {
  const lower = text.toLowerCase();
  const found: string[] = [];
  const missing: string[] = [];

  for (const [section, re] of SECTION_PATTERNS) {
    (re.test(lower) ? found : missing).push(section);
  }

  return { found, missing };
}

function countMatches(text: string, re: RegExp): number {
  return Array.from(text.matchAll(re)).length;
}

function countTemplatePhrases(text: string): number {
  const lower = text.toLowerCase();
  return TEMPLATE_PHRASES.filter(phrase => lower.includes(phrase)).length;
}

/**
 * Быстрая валидация с настройками по умолчанию
 */
export function validateTz(tzText: string): ValidationResult {
  return new TzValidator().validate(tzText);
}
