/**
 * Defines the severity levels for textblocks errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Warning message */
  Warning = 'warning',
}

/**
 * Base interface for error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a BlocksError instance.
 */
export interface BlocksErrorOptions<TDetails extends BaseErrorDetails = BaseErrorDetails> {
  code: string;
  severity: ErrorSeverity;
  details?: TDetails;
  cause?: unknown;
}

/**
 * Base class for all custom textblocks errors.
 * Provides structure for error codes, severity and details.
 */
export class BlocksError<TDetails extends BaseErrorDetails = BaseErrorDetails> extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: TDetails;

  constructor(message: string, options: BlocksErrorOptions<TDetails>) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    return `[${this.code}] ${this.message} (Severity: ${this.severity})`;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    return result;
  }
}
