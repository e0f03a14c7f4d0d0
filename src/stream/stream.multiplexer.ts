import type { MutexInterface } from "async-mutex";
import { asMessage } from "../_shared/utils/error_message";
import type { SessionStore } from "../session/session.store";
import type { Clock, SessionRecord } from "../session/session.types";
import { ABORTED, acquireOrAbort, nextOrAbort } from "./abortable";
import { translateEngineEvent } from "./event.translator";
import {
  outputEvents,
  type OutputEvent,
  type RawEngineEvent,
  type StreamInvokeOptions,
} from "./stream.types";

export const NO_RESPONSE_FALLBACK = "No response generated.";
export const STREAM_CANCELLED_MESSAGE = "STREAM_CANCELLED";
const MAX_RESOLVE_ATTEMPTS = 3;

export interface StreamMultiplexerOptions {
  readonly store: SessionStore;
  readonly now?: Clock;
  readonly fallbackText?: string;
  readonly toolPreviewMaxLength?: number;
  readonly onLog?: (message: string) => void;
}

interface HeldSession {
  readonly record: SessionRecord;
  readonly release: MutexInterface.Releaser;
}

function isBlank(value: unknown): boolean {
  return typeof value !== "string" || value.trim() === "";
}

export function validateStreamRequest(sessionId: string, message: string): string | null {
  if (isBlank(sessionId)) {
    return "INVALID_INPUT sessionId must be non-empty";
  }
  if (isBlank(message)) {
    return "INVALID_INPUT message must be non-empty";
  }
  return null;
}

/**
 * Drives one engine invocation per request and forwards translated events in
 * arrival order. The session lock is held from before the record is touched
 * until the stream ends, whichever way it ends.
 */
export class StreamMultiplexer {
  private readonly store: SessionStore;
  private readonly now: Clock;
  private readonly fallbackText: string;
  private readonly toolPreviewMaxLength?: number;
  private readonly onLog: (message: string) => void;

  constructor(options: StreamMultiplexerOptions) {
    this.store = options.store;
    this.now = options.now ?? Date.now;
    this.fallbackText = options.fallbackText ?? NO_RESPONSE_FALLBACK;
    this.toolPreviewMaxLength = options.toolPreviewMaxLength;
    this.onLog = options.onLog ?? ((message) => console.warn(`[stream] ${message}`));
  }

  async *streamInvoke(
    sessionId: string,
    message: string,
    options: StreamInvokeOptions = {}
  ): AsyncGenerator<OutputEvent, void, undefined> {
    const invalid = validateStreamRequest(sessionId, message);
    if (invalid) {
      yield outputEvents.error(invalid);
      return;
    }

    let held: HeldSession | null;
    try {
      held = await this.holdSession(sessionId, options.signal);
    } catch (error) {
      this.onLog(`SESSION_ACQUIRE_ERROR session=${sessionId}: ${asMessage(error)}`);
      yield outputEvents.error(asMessage(error));
      return;
    }
    if (!held) {
      yield outputEvents.error(STREAM_CANCELLED_MESSAGE);
      return;
    }

    const { record, release } = held;
    try {
      record.lastAccessedAt = Math.max(this.now(), record.createdAt);
      record.messageCount += 1;
      yield* this.pump(record, message, options.signal);
    } finally {
      release();
    }
  }

  private async holdSession(sessionId: string, signal?: AbortSignal): Promise<HeldSession | null> {
    for (let attempt = 0; attempt < MAX_RESOLVE_ATTEMPTS; attempt += 1) {
      const { record, lock } = await this.store.getOrCreate(sessionId);
      const release = await acquireOrAbort(lock, signal);
      if (!release) {
        return null;
      }
      // Closed or reaped while this caller was queued: resolve again.
      if (record.active && this.store.get(sessionId) === record) {
        return { record, release };
      }
      release();
    }
    throw new Error(`SESSION_UNAVAILABLE session=${sessionId}`);
  }

  private async *pump(
    record: SessionRecord,
    message: string,
    callerSignal?: AbortSignal
  ): AsyncGenerator<OutputEvent, void, undefined> {
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) {
      controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    let iterator: AsyncIterator<RawEngineEvent> | null = null;
    let drained = false;
    let abandoned = false;
    let tokens = 0;
    try {
      iterator = record.engine
        .invoke(message, { sessionId: record.id, signal: controller.signal })
        [Symbol.asyncIterator]();

      while (true) {
        const step = await nextOrAbort(iterator, controller.signal);
        if (step === ABORTED) {
          abandoned = true;
          yield outputEvents.error(STREAM_CANCELLED_MESSAGE);
          return;
        }
        if (step.done) {
          drained = true;
          break;
        }

        const event = translateEngineEvent(step.value, {
          toolPreviewMaxLength: this.toolPreviewMaxLength,
        });
        if (!event) {
          continue;
        }
        if (event.type === "complete") {
          break;
        }
        if (event.type === "error") {
          yield event;
          return;
        }
        if (event.type === "token") {
          tokens += 1;
        }
        yield event;
      }
    } catch (error) {
      if (controller.signal.aborted) {
        yield outputEvents.error(STREAM_CANCELLED_MESSAGE);
        return;
      }
      this.onLog(`ENGINE_INVOKE_ERROR session=${record.id}: ${asMessage(error)}`);
      yield outputEvents.error(asMessage(error));
      return;
    } finally {
      callerSignal?.removeEventListener("abort", onCallerAbort);
      if (!drained) {
        controller.abort();
        if (abandoned) {
          this.abandonIterator(record.id, iterator);
        } else {
          await this.closeIterator(record.id, iterator);
        }
      }
    }

    if (tokens === 0) {
      yield outputEvents.token(this.fallbackText);
    }
    yield outputEvents.complete();
  }

  private async closeIterator(
    sessionId: string,
    iterator: AsyncIterator<RawEngineEvent> | null
  ): Promise<void> {
    try {
      await iterator?.return?.();
    } catch (error) {
      this.onLog(`ENGINE_CLOSE_ERROR session=${sessionId}: ${asMessage(error)}`);
    }
  }

  // A `next()` is still pending: stop pulling without waiting for it. The
  // engine step in flight may keep running in the background.
  private abandonIterator(sessionId: string, iterator: AsyncIterator<RawEngineEvent> | null): void {
    if (!iterator) {
      return;
    }
    const pending = iterator;
    Promise.resolve()
      .then(() => pending.return?.())
      .catch((error: unknown) => {
        this.onLog(`ENGINE_CLOSE_ERROR session=${sessionId}: ${asMessage(error)}`);
      });
  }
}
