/**
 * Structured error types for hostwatch.
 *
 * TelemetryError carries an error code, context and cause;
 * CollectorError marks a failure that takes down a whole collection cycle.
 */

import type { TelemetryCategory } from './system';

// ─── Error Codes ───

export enum ErrorCode {
  // Collectors
  PLATFORM_QUERY_ERROR = 'PLATFORM_QUERY_ERROR',
  NETWORK_QUERY_ERROR = 'NETWORK_QUERY_ERROR',
  HARDWARE_QUERY_ERROR = 'HARDWARE_QUERY_ERROR',
  PROCESS_QUERY_ERROR = 'PROCESS_QUERY_ERROR',

  // Host sources
  COMMAND_FAILED = 'COMMAND_FAILED',
  MALFORMED_ENTRY = 'MALFORMED_ENTRY',

  // Config
  CONFIG_LOAD_ERROR = 'CONFIG_LOAD_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Export
  EXPORT_WRITE_ERROR = 'EXPORT_WRITE_ERROR',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  INVALID_STATE = 'INVALID_STATE',
}

export const CATEGORY_ERROR_CODES: Readonly<Record<TelemetryCategory, ErrorCode>> = {
  platform: ErrorCode.PLATFORM_QUERY_ERROR,
  network: ErrorCode.NETWORK_QUERY_ERROR,
  hardware: ErrorCode.HARDWARE_QUERY_ERROR,
  process: ErrorCode.PROCESS_QUERY_ERROR,
};

// ─── TelemetryError ───

export class TelemetryError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      context?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'TelemetryError';
    this.code = code;
    this.context = options.context;
    this.originalError = options.originalError;

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  /** Wrap any thrown value into a TelemetryError */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): TelemetryError {
    if (error instanceof TelemetryError) return error;

    const originalError = toError(error);
    return new TelemetryError(originalError.message, code, { originalError, context });
  }
}

// ─── CollectorError ───

/** A category-wide failure: the cycle that hit it produces no snapshot. */
export class CollectorError extends TelemetryError {
  public readonly category: TelemetryCategory;

  constructor(category: TelemetryCategory, message: string, originalError?: Error) {
    super(message, CATEGORY_ERROR_CODES[category], { originalError, context: { category } });
    this.name = 'CollectorError';
    this.category = category;
  }

  /** Wrap a thrown value as a fatal error of the given category */
  static wrap(category: TelemetryCategory, error: unknown): CollectorError {
    if (error instanceof CollectorError) return error;
    const cause = toError(error);
    return new CollectorError(category, `${category} collector failed: ${cause.message}`, cause);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
