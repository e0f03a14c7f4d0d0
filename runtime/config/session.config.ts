import { ConfigurationError } from "../error";

export interface SessionConfigArgs {
  readonly idleTimeoutSeconds?: number;
  readonly reaperIntervalSeconds?: number;
  readonly toolPreviewMaxLength?: number;
  readonly fallbackText?: string;
}

export interface SessionConfigEnv {
  readonly SESSION_IDLE_TIMEOUT_SECONDS?: string;
  readonly SESSION_REAPER_INTERVAL_SECONDS?: string;
  readonly SESSION_TOOL_PREVIEW_MAX_LENGTH?: string;
  readonly SESSION_FALLBACK_TEXT?: string;
}

export interface SessionConfig {
  readonly idleTimeoutMs: number;
  readonly reaperIntervalMs: number;
  readonly toolPreviewMaxLength: number;
  readonly fallbackText?: string;
}

export const DEFAULT_IDLE_TIMEOUT_SECONDS = 3600;
export const DEFAULT_REAPER_INTERVAL_SECONDS = 300;
export const DEFAULT_TOOL_PREVIEW_MAX_LENGTH = 200;

function parsePositiveInteger(value: unknown, field: string): number | undefined {
  if (typeof value === "undefined") {
    return undefined;
  }
  if (typeof value === "string" && value.trim() === "") {
    return undefined;
  }
  const num = typeof value === "number" ? value : Number(String(value).trim());
  if (!Number.isInteger(num)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be an integer`);
  }
  if (num <= 0) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be > 0`);
  }
  return num;
}

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function resolveSessionConfig(
  args: SessionConfigArgs,
  env: SessionConfigEnv
): SessionConfig {
  const idleTimeoutSeconds =
    parsePositiveInteger(args.idleTimeoutSeconds, "idleTimeoutSeconds") ??
    parsePositiveInteger(env.SESSION_IDLE_TIMEOUT_SECONDS, "idleTimeoutSeconds") ??
    DEFAULT_IDLE_TIMEOUT_SECONDS;

  const reaperIntervalSeconds =
    parsePositiveInteger(args.reaperIntervalSeconds, "reaperIntervalSeconds") ??
    parsePositiveInteger(env.SESSION_REAPER_INTERVAL_SECONDS, "reaperIntervalSeconds") ??
    DEFAULT_REAPER_INTERVAL_SECONDS;

  const toolPreviewMaxLength =
    parsePositiveInteger(args.toolPreviewMaxLength, "toolPreviewMaxLength") ??
    parsePositiveInteger(env.SESSION_TOOL_PREVIEW_MAX_LENGTH, "toolPreviewMaxLength") ??
    DEFAULT_TOOL_PREVIEW_MAX_LENGTH;

  return {
    idleTimeoutMs: idleTimeoutSeconds * 1000,
    reaperIntervalMs: reaperIntervalSeconds * 1000,
    toolPreviewMaxLength,
    fallbackText: toTrimmedString(args.fallbackText) ?? toTrimmedString(env.SESSION_FALLBACK_TEXT),
  };
}
