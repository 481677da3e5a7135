/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "FETCH_FAILED")
 * - `statusCode`    HTTP-compatible status code, surfaced in CLI JSON output
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/**
 * Raised by source strategies and the content fetcher when a channel
 * cannot be read. The orchestrator catches these per source.
 */
export class DiscoveryError extends AppError {
  public readonly source: string;

  constructor(
    message: string,
    code: string,
    source: string,
    statusCode = 502,
  ) {
    super(message, code, statusCode);
    this.source = source;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      source: this.source,
    };
  }
}

/**
 * Missing or malformed event-type configuration. This is the one error
 * class a discovery run does not recover from.
 */
export class ConfigurationError extends AppError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], statusCode = 500) {
    super(message, 'CONFIGURATION_ERROR', statusCode);
    this.issues = issues;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}

export class ValidationError extends AppError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(
    message: string,
    field: string,
    value?: unknown,
    statusCode = 422,
  ) {
    super(message, 'VALIDATION_ERROR', statusCode);
    this.field = field;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      value: this.value,
    };
  }
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs). Used by the CLI's top-level handler to
 * decide how much detail to print.
 */
export function isOperationalError(error: unknown): error is AppError {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/** Flattens an unknown thrown value into a log-friendly message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
