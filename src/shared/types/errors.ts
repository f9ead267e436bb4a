/**
 * Structured error types for clipring.
 *
 * ClipringError carries an error code, severity and a recovery hint so that
 * callers can tell transient clipboard failures from fatal ones.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // Clipboard queries
  NO_CONTENT = 'NO_CONTENT',
  COMMAND_FAILED = 'COMMAND_FAILED',
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',

  // History
  INVALID_INDEX = 'INVALID_INDEX',

  // Persistence / scratch files
  SAVE_FAILED = 'SAVE_FAILED',
  LOAD_FAILED = 'LOAD_FAILED',
  INVALID_PATH = 'INVALID_PATH',

  // Config
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Generic
  INVALID_STATE = 'INVALID_STATE',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

// ─── Severity ───

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

/** Codes the poller absorbs with backoff instead of failing */
export const TRANSIENT_CLIPBOARD_CODES: readonly ErrorCode[] = [ErrorCode.NO_CONTENT, ErrorCode.COMMAND_FAILED];

// ─── ClipringError ───

export class ClipringError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  /** Can the process keep running after this error */
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;
  /** Original error that caused this one */
  public readonly originalError?: Error;
  /** ISO timestamp of when the error occurred */
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      severity?: ErrorSeverity;
      recoverable?: boolean;
      context?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'ClipringError';
    this.code = code;
    this.severity = options.severity ?? 'error';
    this.recoverable = options.recoverable ?? true;
    this.context = options.context;
    this.originalError = options.originalError;
    this.timestamp = new Date().toISOString();

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  /** Serialize for logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp,
    };
  }

  static isClipringError(value: unknown): value is ClipringError {
    return value instanceof ClipringError;
  }

  /** True when `value` is a ClipringError carrying one of `codes` */
  static hasCode(value: unknown, ...codes: ErrorCode[]): value is ClipringError {
    return value instanceof ClipringError && codes.includes(value.code);
  }

  /** Wrap any thrown value into a ClipringError */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): ClipringError {
    if (error instanceof ClipringError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ClipringError(originalError.message, code, {
      originalError,
      context,
    });
  }
}
