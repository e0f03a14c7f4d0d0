import { asMessage } from "../_shared/utils/error_message";
import { StreamMultiplexer } from "../stream/stream.multiplexer";
import type { OutputEvent, StreamInvokeOptions } from "../stream/stream.types";
import { SessionReaper, type SweepReport } from "./session.reaper";
import { SessionStore } from "./session.store";
import {
  toSessionInfo,
  type Clock,
  type EngineFactory,
  type SessionInfo,
  type SessionRecord,
} from "./session.types";

export interface SessionManagerOptions {
  readonly createEngine: EngineFactory;
  readonly idleTimeoutMs: number;
  readonly reaperIntervalMs: number;
  readonly now?: Clock;
  readonly fallbackText?: string;
  readonly toolPreviewMaxLength?: number;
  readonly onLog?: (message: string) => void;
}

/**
 * Request boundary over the session store, reaper and stream multiplexer. The
 * reaper starts with the first session ever created.
 */
export class SessionManager {
  private readonly store: SessionStore;
  private readonly reaper: SessionReaper;
  private readonly multiplexer: StreamMultiplexer;
  private readonly onLog: (message: string) => void;

  constructor(options: SessionManagerOptions) {
    this.onLog = options.onLog ?? ((message) => console.warn(`[session] ${message}`));
    this.store = new SessionStore({
      createEngine: options.createEngine,
      now: options.now,
      onCreate: () => this.reaper.start(),
      onLog: this.onLog,
    });
    this.reaper = new SessionReaper({
      store: this.store,
      idleTimeoutMs: options.idleTimeoutMs,
      intervalMs: options.reaperIntervalMs,
      now: options.now,
      onLog: this.onLog,
    });
    this.multiplexer = new StreamMultiplexer({
      store: this.store,
      now: options.now,
      fallbackText: options.fallbackText,
      toolPreviewMaxLength: options.toolPreviewMaxLength,
      onLog: this.onLog,
    });
  }

  get sessionCount(): number {
    return this.store.size;
  }

  get isReaperRunning(): boolean {
    return this.reaper.isRunning;
  }

  streamChat(
    sessionId: string,
    message: string,
    options: StreamInvokeOptions = {}
  ): AsyncGenerator<OutputEvent, void, undefined> {
    return this.multiplexer.streamInvoke(sessionId, message, options);
  }

  getSessionInfo(sessionId: string): SessionInfo | null {
    const record = this.store.get(sessionId);
    return record ? toSessionInfo(record) : null;
  }

  async listSessions(): Promise<readonly SessionInfo[]> {
    const records = await this.store.listActive();
    return records.map(toSessionInfo);
  }

  /** Waits for any in-flight invocation on the session before removing it. */
  async closeSession(sessionId: string): Promise<boolean> {
    const lock = this.store.lockOf(sessionId);
    if (!lock) {
      return false;
    }
    const detached = await lock.runExclusive(() => this.store.detach(sessionId, lock));
    if (!detached) {
      return false;
    }
    await this.disposeEngine(detached);
    return true;
  }

  sweepIdle(): Promise<SweepReport> {
    return this.reaper.sweep();
  }

  /**
   * Stops the reaper, then closes every session through its lock, so
   * in-flight invocations finish before their engines are disposed.
   */
  async shutdown(): Promise<void> {
    await this.reaper.stop();
    let remaining = await this.store.listActive();
    while (remaining.length > 0) {
      await Promise.all(remaining.map((record) => this.closeSession(record.id)));
      remaining = await this.store.listActive();
    }
  }

  private async disposeEngine(record: SessionRecord): Promise<void> {
    try {
      await record.engine.dispose?.();
    } catch (error) {
      this.onLog(`SESSION_DISPOSE_ERROR session=${record.id}: ${asMessage(error)}`);
    }
  }
}
