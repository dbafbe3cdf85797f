/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "DUPLICATE_FINGERPRINT")
 * - `statusCode`    HTTP-compatible status code for API responses
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
    options?: { cause?: unknown },
  ) {
    super(message, options);
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

/** A source collector could not produce its candidates. */
export class CollectorError extends AppError {
  public readonly source: string;

  constructor(message: string, code: string, source: string, cause?: unknown) {
    super(message, code, 502, true, { cause });
    this.source = source;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      source: this.source,
    };
  }
}

/** A validator strategy failed before it could reach a verdict. */
export class ValidatorError extends AppError {
  public readonly validator: string;

  constructor(message: string, code: string, validator: string, cause?: unknown) {
    super(message, code, 502, true, { cause });
    this.validator = validator;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      validator: this.validator,
    };
  }
}

export class NotificationError extends AppError {
  public readonly channel: string;
  public readonly httpStatus?: number;

  constructor(
    message: string,
    code: string,
    channel: string,
    httpStatus?: number,
    cause?: unknown,
  ) {
    super(message, code, 502, true, { cause });
    this.channel = channel;
    this.httpStatus = httpStatus;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      channel: this.channel,
      httpStatus: this.httpStatus,
    };
  }
}

export class StoreError extends AppError {
  public readonly operation: string;

  constructor(message: string, code: string, operation: string, cause?: unknown) {
    super(message, code, 500, true, { cause });
    this.operation = operation;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
    };
  }
}

/** Request input rejected by a schema. */
export class ValidationError extends AppError {
  public readonly details: Array<{ field: string; message: string }>;

  constructor(message: string, details: Array<{ field: string; message: string }>) {
    super(message, 'VALIDATION_ERROR', 400);
    this.details = details;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    };
  }
}

/**
 * Missing or contradictory configuration. Only raised while the process
 * starts; never mid-run.
 */
export class ConfigError extends AppError {
  public readonly key: string;

  constructor(message: string, key: string) {
    super(message, 'CONFIG_ERROR', 500, false);
    this.key = key;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      key: this.key,
    };
  }
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs). Used by top-level error handlers to
 * decide whether to shut the process down.
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/** Message text of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
