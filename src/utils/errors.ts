/**
 * Standard error classes for typecensus
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  INVALID_INPUT = "INVALID_INPUT",
  TYPE_RESOLUTION_ERROR = "TYPE_RESOLUTION_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
}

/**
 * Render a thrown value as text. Thrown values can be anything, including
 * objects with no prototype or revoked proxies that refuse conversion.
 */
export function describeCause(cause: unknown): string {
  try {
    return String(cause);
  } catch {
    return "[unprintable value]";
  }
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class TypeCensusError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TypeCensusError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
        ...(this.cause !== undefined ? { cause: describeCause(this.cause) } : {}),
      },
    };
  }
}

/**
 * A record was absent or could not be introspected at all
 */
export class InvalidInputError extends TypeCensusError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INVALID_INPUT, message, details, options);
    this.name = "InvalidInputError";
  }
}

/**
 * The type of a single property value could not be determined.
 * Always recovered by the aggregator, never thrown to callers.
 */
export class TypeResolutionError extends TypeCensusError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.TYPE_RESOLUTION_ERROR, message, details, options);
    this.name = "TypeResolutionError";
  }
}

export class ConfigError extends TypeCensusError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends TypeCensusError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class InputReadError extends TypeCensusError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

/**
 * Wrap any thrown value into a TypeCensusError
 */
export function toTypeCensusError(error: unknown): TypeCensusError {
  if (error instanceof TypeCensusError) {
    return error;
  }
  return new TypeCensusError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : describeCause(error),
    undefined,
    { cause: error },
  );
}
