import type { OutputEvent } from "../../stream/stream.types";
import type { WireEvent } from "./web.types";

export function toWireEvent(event: OutputEvent, now: Date = new Date()): WireEvent {
  return { ...event, timestamp: now.toISOString() };
}

export function encodeSseFrame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function encodeSseEvent(event: OutputEvent, now?: Date): string {
  return encodeSseFrame(toWireEvent(event, now));
}

export const SSE_HEARTBEAT_FRAME = ": ping\n\n";
