import { Mutex } from "async-mutex";
import { SessionLockRegistry } from "./session_lock.registry";
import type {
  Clock,
  EngineFactory,
  SessionEntry,
  SessionLock,
  SessionRecord,
} from "./session.types";

export interface SessionStoreOptions {
  readonly createEngine: EngineFactory;
  readonly now?: Clock;
  readonly onCreate?: (record: SessionRecord) => void;
  readonly onLog?: (message: string) => void;
}

/**
 * Owns every SessionRecord and its lock. All structural changes to the map go
 * through `structural`, which is only ever held for bookkeeping and never while
 * an engine runs.
 */
export class SessionStore {
  private readonly records = new Map<string, SessionRecord>();
  private readonly locks = new SessionLockRegistry();
  private readonly structural = new Mutex();
  private readonly createEngine: EngineFactory;
  private readonly now: Clock;
  private readonly onCreate?: (record: SessionRecord) => void;
  private readonly onLog: (message: string) => void;

  constructor(options: SessionStoreOptions) {
    this.createEngine = options.createEngine;
    this.now = options.now ?? Date.now;
    this.onCreate = options.onCreate;
    this.onLog = options.onLog ?? ((message) => console.warn(`[session] ${message}`));
  }

  get size(): number {
    return this.records.size;
  }

  get lockCount(): number {
    return this.locks.size;
  }

  async getOrCreate(sessionId: string): Promise<SessionEntry> {
    const existing = this.records.get(sessionId);
    if (existing) {
      return { record: existing, lock: this.locks.ensure(sessionId) };
    }

    return this.structural.runExclusive(() => {
      const current = this.records.get(sessionId);
      if (current) {
        return { record: current, lock: this.locks.ensure(sessionId) };
      }

      const createdAt = this.now();
      const record: SessionRecord = {
        id: sessionId,
        engine: this.createEngine(sessionId),
        createdAt,
        lastAccessedAt: createdAt,
        messageCount: 0,
        active: true,
      };
      this.records.set(sessionId, record);
      const lock = this.locks.ensure(sessionId);
      this.onCreate?.(record);
      return { record, lock };
    });
  }

  get(sessionId: string): SessionRecord | null {
    return this.records.get(sessionId) ?? null;
  }

  lockOf(sessionId: string): SessionLock | undefined {
    return this.locks.peek(sessionId);
  }

  async remove(sessionId: string): Promise<boolean> {
    const detached = await this.detach(sessionId);
    return detached !== null;
  }

  /**
   * Removes the record and its lock, handing the record back for cleanup.
   * With `expectedLock`, a record guarded by a different lock instance (a
   * later incarnation of the same id) is left alone.
   */
  async detach(sessionId: string, expectedLock?: SessionLock): Promise<SessionRecord | null> {
    return this.structural.runExclusive(() => {
      const record = this.records.get(sessionId);
      if (!record) {
        return null;
      }
      if (expectedLock && this.locks.peek(sessionId) !== expectedLock) {
        return null;
      }
      this.dropUnlocked(record);
      return record;
    });
  }

  async listActive(): Promise<readonly SessionRecord[]> {
    return this.structural.runExclusive(() =>
      [...this.records.values()].filter((record) => record.active).map((record) => ({ ...record }))
    );
  }

  /**
   * Removes records idle for at least `idleTimeoutMs`. A record whose lock is
   * held is left for a later pass.
   */
  async evictIdle(nowMs: number, idleTimeoutMs: number): Promise<readonly SessionRecord[]> {
    return this.structural.runExclusive(() => {
      const evicted: SessionRecord[] = [];
      for (const record of this.records.values()) {
        if (nowMs - record.lastAccessedAt < idleTimeoutMs) {
          continue;
        }
        if (this.locks.peek(record.id)?.isLocked()) {
          this.onLog(`SESSION_EVICT_SKIPPED_BUSY session=${record.id}`);
          continue;
        }
        this.dropUnlocked(record);
        evicted.push(record);
      }
      return evicted;
    });
  }

  private dropUnlocked(record: SessionRecord): void {
    record.active = false;
    this.records.delete(record.id);
    this.locks.delete(record.id);
  }
}
