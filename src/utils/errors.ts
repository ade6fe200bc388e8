/**
 * Standard error classes for burstgen
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  SCHEMA_ERROR = "SCHEMA_ERROR",
  CONTRACT_VIOLATION = "CONTRACT_VIOLATION",
  CANCELLED = "CANCELLED",
}

export class BurstgenError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BurstgenError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends BurstgenError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends BurstgenError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class SchemaError extends BurstgenError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_ERROR, message, details, options);
    this.name = "SchemaError";
  }
}

/**
 * Raised when a value that configuration validation should have rejected
 * reaches the generator. Never caught inside the engine.
 */
export class ContractViolationError extends BurstgenError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.CONTRACT_VIOLATION, message, details);
    this.name = "ContractViolationError";
  }
}

/**
 * Raised by every blocking wait when its abort signal fires.
 */
export class CancelledError extends BurstgenError {
  constructor(message = "operation cancelled", options?: ErrorOptions) {
    super(ErrorCode.CANCELLED, message, undefined, options);
    this.name = "CancelledError";
  }
}

export function isCancelled(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}
