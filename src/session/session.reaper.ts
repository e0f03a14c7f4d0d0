import { asMessage } from "../_shared/utils/error_message";
import type { SessionStore } from "./session.store";
import type { Clock, SessionRecord } from "./session.types";

export interface SessionReaperOptions {
  readonly store: SessionStore;
  readonly idleTimeoutMs: number;
  readonly intervalMs: number;
  readonly now?: Clock;
  readonly onLog?: (message: string) => void;
}

export interface SweepReport {
  readonly evicted: readonly string[];
  readonly disposeFailures: readonly string[];
}

const EMPTY_REPORT: SweepReport = Object.freeze({ evicted: [], disposeFailures: [] });

/**
 * Periodically evicts idle sessions. A sweep only removes records whose
 * lastAccessedAt is older than the timeout and whose lock is free; invocations
 * refresh lastAccessedAt under the lock before the engine runs.
 */
export class SessionReaper {
  private readonly store: SessionStore;
  private readonly idleTimeoutMs: number;
  private readonly intervalMs: number;
  private readonly now: Clock;
  private readonly onLog: (message: string) => void;
  private timer: NodeJS.Timeout | null = null;
  private sweeping: Promise<SweepReport> | null = null;

  constructor(options: SessionReaperOptions) {
    this.store = options.store;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.intervalMs = options.intervalMs;
    this.now = options.now ?? Date.now;
    this.onLog = options.onLog ?? ((message) => console.warn(`[reaper] ${message}`));
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.sweeping) {
      await this.sweeping;
    }
  }

  /** One pass. Overlapping calls share the pass already in progress. */
  sweep(): Promise<SweepReport> {
    if (this.sweeping) {
      return this.sweeping;
    }
    const pass = this.sweepOnce().finally(() => {
      this.sweeping = null;
    });
    this.sweeping = pass;
    return pass;
  }

  private async runCycle(): Promise<void> {
    try {
      await this.sweep();
    } catch (error) {
      this.onLog(`SESSION_SWEEP_ERROR ${asMessage(error)}`);
    }
  }

  private async sweepOnce(): Promise<SweepReport> {
    const evicted = await this.store.evictIdle(this.now(), this.idleTimeoutMs);
    if (evicted.length === 0) {
      return EMPTY_REPORT;
    }

    const disposeFailures: string[] = [];
    for (const record of evicted) {
      const failed = await this.release(record);
      if (failed) {
        disposeFailures.push(record.id);
      }
    }
    return {
      evicted: evicted.map((record) => record.id),
      disposeFailures,
    };
  }

  private async release(record: SessionRecord): Promise<boolean> {
    try {
      await record.engine.dispose?.();
      this.onLog(`SESSION_REAPED session=${record.id} idleMs=${String(this.now() - record.lastAccessedAt)}`);
      return false;
    } catch (error) {
      this.onLog(`SESSION_DISPOSE_ERROR session=${record.id}: ${asMessage(error)}`);
      return true;
    }
  }
}
