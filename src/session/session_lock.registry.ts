import { Mutex } from "async-mutex";
import type { SessionLock } from "./session.types";

/**
 * One mutex per session id. `ensure` checks and inserts without yielding to the
 * event loop, so concurrent first callers always agree on a single instance.
 */
export class SessionLockRegistry {
  private readonly locks = new Map<string, SessionLock>();

  ensure(sessionId: string): SessionLock {
    const existing = this.locks.get(sessionId);
    if (existing) {
      return existing;
    }
    const created = new Mutex();
    this.locks.set(sessionId, created);
    return created;
  }

  peek(sessionId: string): SessionLock | undefined {
    return this.locks.get(sessionId);
  }

  delete(sessionId: string): boolean {
    return this.locks.delete(sessionId);
  }

  get size(): number {
    return this.locks.size;
  }
}
