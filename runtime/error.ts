import { asMessage } from "../src/_shared/utils/error_message";

export { asMessage };

export const RUNTIME_ERROR_CODES = Object.freeze({
  INVALID_INPUT: "INVALID_INPUT",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  RUNTIME_FAILED: "RUNTIME_FAILED",
} as const);

export type RuntimeErrorCode = (typeof RUNTIME_ERROR_CODES)[keyof typeof RUNTIME_ERROR_CODES];

export class RuntimeError extends Error {
  readonly errorCode: RuntimeErrorCode;
  readonly guideMessage: string;
  readonly httpStatus: number;

  constructor(
    message: string,
    input: {
      readonly errorCode: RuntimeErrorCode;
      readonly guideMessage: string;
      readonly httpStatus: number;
      readonly cause?: unknown;
    }
  ) {
    super(message, "cause" in input ? { cause: input.cause } : undefined);
    this.name = "RuntimeError";
    this.errorCode = input.errorCode;
    this.guideMessage = input.guideMessage;
    this.httpStatus = input.httpStatus;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function toRuntimeError(error: unknown): RuntimeError {
  if (error instanceof RuntimeError) {
    return error;
  }

  const message = asMessage(error);
  if (error instanceof ConfigurationError || message.includes("CONFIGURATION_ERROR")) {
    return new RuntimeError(message, {
      errorCode: RUNTIME_ERROR_CODES.CONFIGURATION_ERROR,
      guideMessage: "abort_with_error(configuration_invalid)",
      httpStatus: 400,
      cause: error,
    });
  }

  if (message.startsWith("INVALID_INPUT") || message.startsWith("VALIDATION_ERROR")) {
    return new RuntimeError(message, {
      errorCode: RUNTIME_ERROR_CODES.INVALID_INPUT,
      guideMessage: "abort_with_error(invalid_input)",
      httpStatus: 400,
      cause: error,
    });
  }

  return new RuntimeError(message, {
    errorCode: RUNTIME_ERROR_CODES.RUNTIME_FAILED,
    guideMessage: "abort_with_error(runtime_failed)",
    httpStatus: 500,
    cause: error,
  });
}
