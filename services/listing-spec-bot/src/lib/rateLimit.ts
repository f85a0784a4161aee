import { createLogger, type Logger } from './logger.js';

export type ThrottledEvent = 'message' | 'callback' | 'photo' | 'generation';

export interface RateLimitConfig {
  /** Минимальный интервал между событиями одного типа, мс */
  intervals: Record<ThrottledEvent, number>;
  /** Сколько нарушений подряд до бана */
  maxViolations: number;
  banMs: number;
  /** Через сколько без событий состояние чата забывается */
  idleMs: number;
}

export const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  intervals: {
    message: 333,
    callback: 200,
    photo: 500,
    // Каждая генерация — платные вызовы AI
    generation: 5_000,
  },
  maxViolations: 5,
  banMs: 30_000,
  idleMs: 300_000,
};

export type RateLimitDecision =
  | { allowed: true }
  | { allowed: false; banned: boolean; retryAfterMs: number };

interface ChatRateState {
  last: Partial<Record<ThrottledEvent, number>>;
  violations: number;
  bannedUntil: number;
  seenAt: number;
}

export interface RateLimiterOptions {
  limits?: Partial<RateLimitConfig>;
  now?: () => number;
  logger?: Logger;
}

/**
 * Ограничение частоты событий по чатам.
 *
 * Для каждого типа события свой минимальный интервал. Слишком частое
 * событие отклоняется и считается нарушением; после maxViolations чат
 * банится на banMs, в это время отклоняется всё.
 */
export class RateLimiter {
  readonly limits: RateLimitConfig;
  private readonly states = new Map<number, ChatRateState>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: RateLimiterOptions = {}) {
    this.limits = { ...DEFAULT_RATE_LIMITS, ...options.limits };
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ module: 'rate-limit' });
  }

  /**
   * Проверяет событие и, если оно разрешено, запоминает его время
   */
  hit(chatId: number, event: ThrottledEvent): RateLimitDecision {
    const now = this.now();
    const state = this.state(chatId, now);

    if (state.bannedUntil > now) {
      return { allowed: false, banned: true, retryAfterMs: state.bannedUntil - now };
    }

    const last = state.last[event];
    const interval = this.limits.intervals[event];
    if (last !== undefined && now - last < interval) {
      state.violations++;

      if (state.violations >= this.limits.maxViolations) {
        state.bannedUntil = now + this.limits.banMs;
        state.violations = 0;
        this.logger.warn({ chatId, event, banMs: this.limits.banMs }, 'Chat banned for flooding');
        return { allowed: false, banned: true, retryAfterMs: this.limits.banMs };
      }

      this.logger.debug({ chatId, event, violations: state.violations }, 'Rate limited');
      return { allowed: false, banned: false, retryAfterMs: interval - (now - last) };
    }

    state.last[event] = now;
    state.violations = 0;
    return { allowed: true };
  }

  /**
   * Сдвигает отсчёт интервала, например на момент окончания генерации
   */
  record(chatId: number, event: ThrottledEvent): void {
    const now = this.now();
    this.state(chatId, now).last[event] = now;
  }

  /**
   * Забывает чаты без событий дольше idleMs. Забаненные остаются до конца бана.
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [chatId, state] of this.states) {
      if (now - state.seenAt > this.limits.idleMs && state.bannedUntil <= now) {
        this.states.delete(chatId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.states.size;
  }

  private state(chatId: number, now: number): ChatRateState {
    let state = this.states.get(chatId);
    if (!state) {
      state = { last: {}, violations: 0, bannedUntil: 0, seenAt: now };
      this.states.set(chatId, state);
    }
    state.seenAt = now;
    return state;
  }
}
