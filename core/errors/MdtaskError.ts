import { ExitCode } from '@core/constants/exit-codes';

/**
 * Defines the severity levels for mdtask errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

/**
 * Base interface for error details.
 * Specific error types extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a MdtaskError instance.
 */
export interface MdtaskErrorOptions {
  code: string;
  severity: ErrorSeverity;
  exitCode?: number;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Base class for all custom mdtask errors.
 * Carries an error code, a severity and the process exit code the CLI reports for it.
 */
export class MdtaskError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Exit status the CLI uses when this error ends an invocation */
  public readonly exitCode: number;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;

  constructor(message: string, options: MdtaskErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.exitCode = options.exitCode ?? ExitCode.Failure;
    this.details = options.details;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  public toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  /**
   * Serializes the error to a plain record.
   */
  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      exitCode: this.exitCode
    };

    if (this.details) {
      result.details = this.details;
    }

    return result;
  }
}
