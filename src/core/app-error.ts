/**
 * Application Error Hierarchy
 *
 * Standardized error handling with error class hierarchy.
 * All application errors should extend from AppError.
 */

import type { ErrorCode, JobError } from "@pptmp4/types";

/**
 * Base application error class
 *
 * Provides standardized error structure with error codes and cause tracking.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: Error,
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      metadata: this.metadata,
    };
  }

  /**
   * Flatten into the record kept on a job
   */
  toJobError(): JobError {
    return { code: this.code, message: this.message };
  }

  /**
   * Check if error is of a specific type
   */
  static isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
  }
}

/**
 * ffmpeg or ffprobe missing / not executable
 */
export class ToolNotFoundError extends AppError {
  constructor(
    public readonly tool: string,
    cause?: Error,
    metadata?: Record<string, unknown>
  ) {
    super(`${tool} not found or not executable`, "TOOL_NOT_FOUND", cause, metadata);
  }
}

/**
 * Source cannot be read, has no video, or reports no duration
 */
export class InvalidSourceError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "INVALID_SOURCE", cause, metadata);
  }
}

/**
 * Encoder exited with a non-zero status
 */
export class EncodingFailedError extends AppError {
  constructor(
    public readonly exitCode: number | null,
    public readonly diagnostics: string,
    metadata?: Record<string, unknown>
  ) {
    super(
      exitCode === null
        ? "Encoding was terminated by a signal"
        : `Encoding failed with code ${exitCode}`,
      "ENCODING_FAILED",
      undefined,
      metadata
    );
  }

  override toJobError(): JobError {
    return {
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      diagnostics: this.diagnostics,
    };
  }
}

/**
 * User-initiated abort
 */
export class CancelledError extends AppError {
  constructor(message = "Conversion cancelled") {
    super(message, "CANCELLED");
  }
}

/**
 * Validation errors
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: Error
  ) {
    super(message, "VALIDATION_ERROR", cause, issues.length > 0 ? { issues } : undefined);
  }
}

/**
 * File system errors
 */
export class FileSystemError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "FILE_SYSTEM_ERROR", cause, metadata);
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", cause, metadata);
  }
}

/**
 * Batch lifecycle errors
 */
export class BatchError extends AppError {
  constructor(message: string) {
    super(message, "BATCH_BUSY");
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === "string" ? error : "Unknown error occurred");
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error occurred";
}
