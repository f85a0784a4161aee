/**
 * Последний результат генерации, нужен для перегенерации
 */
export interface LastGeneration {
  photoAnalysis: string;
  category: string;
  tzText: string;
}

export interface ChatSession {
  photos: Buffer[];
  /** Идёт генерация, новые запросы не принимаются */
  busy: boolean;
  /** Ждём текст отзыва перед перегенерацией */
  awaitingFeedback: boolean;
  /** Альбом, на который уже ответили подсказкой */
  lastMediaGroupId: string | null;
  last: LastGeneration | null;
  /** Время последнего обращения, мс */
  touchedAt: number;
}

function emptySession(now: number): ChatSession {
  return {
    photos: [],
    busy: false,
    awaitingFeedback: false,
    lastMediaGroupId: null,
    last: null,
    touchedAt: now,
  };
}

export interface SessionStoreOptions {
  now?: () => number;
}

/**
 * Сессии чатов в памяти процесса. После рестарта начинаются заново.
 * Неактивные сессии удаляются через evictIdle() вместе с фото.
 */
export class SessionStore {
  private readonly sessions = new Map<number, ChatSession>();
  private readonly now: () => number;

  constructor(private readonly maxPhotos: number, options: SessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get(chatId: number): ChatSession {
    let session = this.sessions.get(chatId);
    if (!session) {
      session = emptySession(this.now());
      this.sessions.set(chatId, session);
    } else {
      session.touchedAt = this.now();
    }
    return session;
  }

  /**
   * Сбрасывает фото и ожидание отзыва. Флаг busy не трогает:
   * идущая генерация всё равно завершится и снимет его сама.
   */
  reset(chatId: number): void {
    const session = this.get(chatId);
    session.photos = [];
    session.awaitingFeedback = false;
    session.lastMediaGroupId = null;
    session.last = null;
  }

  /**
   * Добавляет фото. Возвращает новое количество или null, если лимит уже достигнут.
   */
  addPhoto(chatId: number, photo: Buffer): number | null {
    const session = this.get(chatId);
    if (session.photos.length >= this.maxPhotos) {
      return null;
    }
    session.photos.push(photo);
    return session.photos.length;
  }

  /**
   * Пытается занять чат под генерацию. false, если генерация уже идёт.
   */
  acquire(chatId: number): boolean {
    const session = this.get(chatId);
    if (session.busy) {
      return false;
    }
    session.busy = true;
    return true;
  }

  release(chatId: number): void {
    this.get(chatId).busy = false;
  }

  /**
   * Удаляет сессии без обращений дольше maxIdleMs. Чаты с идущей
   * генерацией не трогает. Возвращает число удалённых.
   */
  evictIdle(maxIdleMs: number): number {
    const now = this.now();
    let removed = 0;
    for (const [chatId, session] of this.sessions) {
      if (!session.busy && now - session.touchedAt > maxIdleMs) {
        this.sessions.delete(chatId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
