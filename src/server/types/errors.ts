/**
 * Centralized error type definitions for the ingestion pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  EXTRACTION_ERROR = 'EXTRACTION_ERROR',
  CHANNEL_CLOSED = 'CHANNEL_CLOSED',
  STAGE_FAILED = 'STAGE_FAILED',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid or unreadable configuration. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      ErrorCode.CONFIGURATION_ERROR,
      false,
      { issues, ...context }
    );
    this.issues = issues;
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      true,
      { service, ...context }
    );
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.PERSISTENCE_ERROR, true, context);
  }
}

export class ExtractionError extends AppError {
  constructor(format: 'html' | 'pdf' | 'json', message: string, context?: Record<string, unknown>) {
    super(`${format.toUpperCase()} extraction failed: ${message}`, ErrorCode.EXTRACTION_ERROR, true, { format, ...context });
  }
}

/**
 * Raised by a channel sender once the receiving side is gone or the sender itself was closed
 */
export class ChannelClosedError extends AppError {
  constructor(channel: string, reason: 'receiver_dropped' | 'sender_closed') {
    super(
      reason === 'receiver_dropped'
        ? `Channel '${channel}' has no receiver`
        : `Sender for channel '${channel}' is already closed`,
      ErrorCode.CHANNEL_CLOSED,
      true,
      { channel, reason }
    );
  }
}

/**
 * A stage's run function failed; the stage has been torn down
 */
export class StageError extends AppError {
  public readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(
      `Stage '${stage}' failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.STAGE_FAILED,
      false,
      { stage }
    );
    this.stage = stage;
    this.cause = cause;
  }
}

/**
 * Message of an unknown thrown value, for log fields
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
