import type { MutexInterface } from "async-mutex";
import type { RawEngineEvent } from "../stream/stream.types";

export interface EngineInvokeOptions {
  readonly sessionId: string;
  readonly signal: AbortSignal;
}

/**
 * Stateful reasoning engine owned by exactly one session. `invoke` yields a
 * finite, non-restartable sequence of raw events for one user message.
 */
export interface ReasoningEngine {
  invoke(message: string, options: EngineInvokeOptions): AsyncIterable<RawEngineEvent>;
  dispose?(): void | Promise<void>;
}

export type EngineFactory = (sessionId: string) => ReasoningEngine;

export type SessionLock = MutexInterface;

export interface SessionRecord {
  readonly id: string;
  readonly engine: ReasoningEngine;
  readonly createdAt: number;
  lastAccessedAt: number;
  messageCount: number;
  active: boolean;
}

export interface SessionEntry {
  readonly record: SessionRecord;
  readonly lock: SessionLock;
}

export interface SessionInfo {
  readonly sessionId: string;
  readonly createdAt: string;
  readonly lastAccessedAt: string;
  readonly messageCount: number;
  readonly active: boolean;
}

export type Clock = () => number;

export function toSessionInfo(record: SessionRecord): SessionInfo {
  return {
    sessionId: record.id,
    createdAt: new Date(record.createdAt).toISOString(),
    lastAccessedAt: new Date(record.lastAccessedAt).toISOString(),
    messageCount: record.messageCount,
    active: record.active,
  };
}
