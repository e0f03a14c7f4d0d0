import { ConfigurationError } from "../error";

export interface ModelConfigArgs {
  readonly model?: string;
  readonly temperature?: number;
  readonly recursionLimit?: number;
}

export interface ModelConfigEnv {
  readonly LLM_MODEL?: string;
  readonly LLM_TEMPERATURE?: string;
  readonly LLM_RECURSION_LIMIT?: string;
  readonly OPENAI_API_KEY?: string;
  readonly OPENAI_BASE_URL?: string;
  readonly AGENT_SYSTEM_PROMPT?: string;
}

export interface ModelConfig {
  readonly model: string;
  readonly temperature: number;
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly recursionLimit: number;
  readonly systemPrompt: string;
}

export const DEFAULT_MODEL = "gpt-4.1-mini";
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_RECURSION_LIMIT = 50;
export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant. Use the available tools when they help answer the user.";

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseTemperature(value: unknown): number | undefined {
  if (typeof value === "undefined" || (typeof value === "string" && value.trim() === "")) {
    return undefined;
  }
  const num = typeof value === "number" ? value : Number(String(value));
  if (!Number.isFinite(num) || num < 0 || num > 2) {
    throw new ConfigurationError("CONFIGURATION_ERROR temperature must be a number within [0, 2]");
  }
  return num;
}

function parseRecursionLimit(value: unknown): number | undefined {
  if (typeof value === "undefined" || (typeof value === "string" && value.trim() === "")) {
    return undefined;
  }
  const num = typeof value === "number" ? value : Number(String(value));
  if (!Number.isInteger(num) || num < 1) {
    throw new ConfigurationError("CONFIGURATION_ERROR recursionLimit must be an integer >= 1");
  }
  return num;
}

export function resolveModelConfig(args: ModelConfigArgs, env: ModelConfigEnv): ModelConfig {
  const apiKey = toTrimmedString(env.OPENAI_API_KEY);
  if (!apiKey) {
    throw new ConfigurationError("CONFIGURATION_ERROR OPENAI_API_KEY is required");
  }

  return {
    model: toTrimmedString(args.model) ?? toTrimmedString(env.LLM_MODEL) ?? DEFAULT_MODEL,
    temperature:
      parseTemperature(args.temperature) ?? parseTemperature(env.LLM_TEMPERATURE) ?? DEFAULT_TEMPERATURE,
    apiKey,
    baseUrl: toTrimmedString(env.OPENAI_BASE_URL),
    recursionLimit:
      parseRecursionLimit(args.recursionLimit) ??
      parseRecursionLimit(env.LLM_RECURSION_LIMIT) ??
      DEFAULT_RECURSION_LIMIT,
    systemPrompt: toTrimmedString(env.AGENT_SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
  };
}
