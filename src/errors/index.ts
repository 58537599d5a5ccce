/**
 * Centralized Error Types
 *
 * Typed, categorized errors for chart construction, style parsing,
 * configuration loading and CLI input handling.
 *
 * Error Categories:
 * - VALIDATION: bad data or options passed to a chart or style
 * - CONFIG: a config file could not be applied
 * - INPUT: data could not be read or parsed (CLI)
 * - INTERNAL: anything else
 *
 * @example
 * ```typescript
 * throw new ValidationError('Data cannot be empty', ['data']);
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

/**
 * Categories of errors.
 */
export enum ErrorCategory {
  /** Invalid data, options or style tokens */
  VALIDATION = 'VALIDATION',

  /** Configuration file problems */
  CONFIG = 'CONFIG',

  /** Unreadable or malformed input */
  INPUT = 'INPUT',

  /** Unexpected internal failures */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all termbars errors.
 */
export class ChartError extends Error {
  readonly category: ErrorCategory;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'ChartError';
    this.category = category;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [
      `[${this.name}]`,
      `(${this.category})`,
      this.message,
    ];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Error from validation failures.
 */
export class ValidationError extends ChartError {
  /** Field(s) that failed validation */
  readonly fields?: string[];

  constructor(
    message: string,
    fields?: string[],
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCategory.VALIDATION, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from Zod validation result.
   */
  static fromZodError(
    error: { issues: Array<{ path: (string | number)[]; message: string }> },
    prefix = 'Validation failed'
  ): ValidationError {
    const fields = error.issues.map(i => i.path.join('.'));
    const messages = error.issues.map(i =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
    );
    return new ValidationError(
      `${prefix}: ${messages.join(', ')}`,
      fields
    );
  }
}

/**
 * Error from configuration loading.
 */
export class ConfigError extends ChartError {
  /** Path of the offending config file */
  readonly path: string;

  constructor(message: string, path: string, cause?: Error) {
    super(message, ErrorCategory.CONFIG, { path }, cause);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * Error from reading chart input.
 */
export class InputError extends ChartError {
  /** Where the input came from: a file path or 'stdin' */
  readonly source: string;

  constructor(message: string, source: string, cause?: Error) {
    super(message, ErrorCategory.INPUT, { source }, cause);
    this.name = 'InputError';
    this.source = source;
  }

  static unreadable(source: string, cause: Error): InputError {
    return new InputError(`Cannot read ${source}: ${cause.message}`, source, cause);
  }

  static invalidJson(source: string, cause: Error): InputError {
    return new InputError(`Invalid JSON in ${source}: ${cause.message}`, source, cause);
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Wrap an unknown error as a ChartError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): ChartError {
  if (error instanceof ChartError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  return new ChartError(err.message, ErrorCategory.INTERNAL, context, err);
}

/**
 * Type guard for ChartError.
 */
export function isChartError(error: unknown): error is ChartError {
  return error instanceof ChartError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof ChartError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof ChartError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
