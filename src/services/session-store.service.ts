import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { SessionEntry, SessionRecord } from '../interfaces';

export const DEFAULT_SESSION_HISTORY_LIMIT = 10;

export const SESSION_HISTORY_LIMIT = Symbol('SESSION_HISTORY_LIMIT');

/**
 * Serializes async tasks per key; different keys never wait on each other
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // the chain only tracks ordering; callers still see the task's rejection
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * SessionStoreService - bounded per-session interaction history
 *
 * In memory for the life of the gateway. Entries are frozen on append and
 * only ever leave by eviction (oldest first once the limit is exceeded).
 */
/**
 * Copy an entry so later changes to the caller's objects never reach history.
 */
function freezeEntry(entry: SessionEntry): SessionEntry {
  const result = Object.freeze({
    ...entry.result,
    data: entry.result.data === undefined ? undefined : Object.freeze(structuredClone(entry.result.data)),
  });
  return Object.freeze({ ...entry, timestamp: new Date(entry.timestamp), result });
}

@Injectable()
export class SessionStoreService {
  private readonly logger = new Logger(SessionStoreService.name);
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly lock = new KeyedMutex();
  private readonly historyLimit: number;
  private closed = false;

  constructor(@Optional() @Inject(SESSION_HISTORY_LIMIT) historyLimit: number | null = null) {
    this.historyLimit = historyLimit && historyLimit > 0 ? historyLimit : DEFAULT_SESSION_HISTORY_LIMIT;
  }

  getHistoryLimit(): number {
    return this.historyLimit;
  }

  async append(sessionId: string, entry: SessionEntry): Promise<SessionRecord> {
    return this.lock.runExclusive(sessionId, () => {
      if (this.closed) {
        throw new Error('Session store has been shut down');
      }

      const existing = this.sessions.get(sessionId);
      if (!existing) {
        this.logger.debug(`Created session ${sessionId}`);
      }

      const entries = [...(existing?.entries ?? []), freezeEntry(entry)].slice(-this.historyLimit);
      const record: SessionRecord = Object.freeze({
        sessionId,
        createdAt: existing?.createdAt ?? new Date(),
        entries: Object.freeze(entries),
      });

      this.sessions.set(sessionId, record);
      return record;
    });
  }

  get(sessionId: string): readonly SessionEntry[] {
    return this.sessions.get(sessionId)?.entries ?? [];
  }

  getRecord(sessionId: string): SessionRecord | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  /**
   * Drop every session and refuse further appends
   */
  shutdown(): void {
    this.closed = true;
    const count = this.sessions.size;
    this.sessions.clear();
    this.logger.log(`Session store shut down (${count} session(s) discarded)`);
  }
}
