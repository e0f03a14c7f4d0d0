import { outputEvents, type OutputEvent, type RawEngineEvent } from "./stream.types";

export const DEFAULT_TOOL_PREVIEW_MAX_LENGTH = 200;

export interface TranslateOptions {
  readonly toolPreviewMaxLength?: number;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function textOfContent(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (!Array.isArray(content)) {
    return "";
  }
  return content
    .map((part) => {
      if (typeof part === "string") {
        return part;
      }
      const record = asRecord(part);
      return record && record.type === "text" && typeof record.text === "string" ? record.text : "";
    })
    .join("");
}

// Message chunks carry `content`; plain strings pass through.
function textOf(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  const record = asRecord(value);
  if (!record) {
    return "";
  }
  return textOfContent(record.content);
}

function previewOf(output: unknown, maxLength: number): string {
  return stringifyOutput(output).slice(0, maxLength);
}

function stringifyOutput(output: unknown): string {
  if (typeof output === "string") {
    return output;
  }
  if (output === undefined || output === null) {
    return "";
  }
  const record = asRecord(output);
  if (record && "content" in record) {
    return textOfContent(record.content);
  }
  try {
    return JSON.stringify(output) ?? String(output);
  } catch {
    return String(output);
  }
}

function errorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string" && error !== "") {
    return error;
  }
  const record = asRecord(error);
  if (record && typeof record.message === "string") {
    return record.message;
  }
  return "engine reported an error";
}

function isInternalNode(name: string): boolean {
  return name.startsWith("__");
}

// Records without `parent_ids`: node and channel-write runs are tagged with
// `langgraph_node`, the graph run itself only carries the thread config.
function isRootRun(event: RawEngineEvent): boolean {
  if (Array.isArray(event.parent_ids)) {
    return event.parent_ids.length === 0;
  }
  return event.metadata !== undefined && !("langgraph_node" in event.metadata);
}

/**
 * Maps one raw engine event to at most one output event. Unknown kinds and
 * empty token deltas yield null.
 */
export function translateEngineEvent(
  event: RawEngineEvent,
  options: TranslateOptions = {}
): OutputEvent | null {
  const name = typeof event.name === "string" ? event.name : "";

  switch (event.event) {
    case "on_chat_model_stream": {
      const text = textOf(event.data?.chunk);
      return text === "" ? null : outputEvents.token(text);
    }
    case "on_tool_start":
      return outputEvents.toolStart(name);
    case "on_tool_end":
      return outputEvents.toolEnd(
        name,
        previewOf(event.data?.output, options.toolPreviewMaxLength ?? DEFAULT_TOOL_PREVIEW_MAX_LENGTH)
      );
    case "on_chain_start": {
      const node = event.metadata?.langgraph_node;
      if (typeof node !== "string" || node !== name || isInternalNode(name)) {
        return null;
      }
      return outputEvents.stepUpdate(name);
    }
    case "on_chain_end":
      return isRootRun(event) ? outputEvents.complete() : null;
    case "on_chain_error":
    case "on_error":
      return outputEvents.error(errorText(event.data?.error));
    default:
      return null;
  }
}
