/**
 * Raw engine event, shaped after LangGraph `streamEvents` (v2) records.
 * Engines may emit kinds this runtime does not know; those are dropped.
 */
export interface RawEngineEvent {
  readonly event: string;
  readonly name?: string;
  readonly run_id?: string;
  readonly data?: RawEngineEventData;
  readonly metadata?: Readonly<Record<string, unknown>>;
  readonly parent_ids?: readonly string[];
}

export interface RawEngineEventData {
  readonly chunk?: unknown;
  readonly input?: unknown;
  readonly output?: unknown;
  readonly error?: unknown;
}

export type OutputEvent =
  | { readonly type: "token"; readonly text: string }
  | { readonly type: "toolStart"; readonly name: string }
  | { readonly type: "toolEnd"; readonly name: string; readonly preview: string }
  | { readonly type: "stepUpdate"; readonly name: string }
  | { readonly type: "complete" }
  | { readonly type: "error"; readonly message: string };

export type TerminalOutputEvent = Extract<OutputEvent, { type: "complete" | "error" }>;

export function isTerminalEvent(event: OutputEvent): event is TerminalOutputEvent {
  return event.type === "complete" || event.type === "error";
}

export const outputEvents = Object.freeze({
  token: (text: string): OutputEvent => ({ type: "token", text }),
  toolStart: (name: string): OutputEvent => ({ type: "toolStart", name }),
  toolEnd: (name: string, preview: string): OutputEvent => ({ type: "toolEnd", name, preview }),
  stepUpdate: (name: string): OutputEvent => ({ type: "stepUpdate", name }),
  complete: (): OutputEvent => ({ type: "complete" }),
  error: (message: string): OutputEvent => ({ type: "error", message }),
});

export interface StreamInvokeOptions {
  readonly signal?: AbortSignal;
}
