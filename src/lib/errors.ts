/**
 * Error classes for the extraction run.
 *
 * Parsing a table never throws for malformed content: an unusable cell is
 * skipped and an unusable row reads as empty. These errors cover what the
 * caller must see: bad input files, bad configuration, and a table whose
 * processing raised.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR'
  | 'INPUT_NOT_FOUND'
  | 'TABLE_FAILED';

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface SerializedError {
  code: ErrorCode;
  message: string;
  details?: ErrorDetail[];
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: ErrorDetail[]) {
    super('VALIDATION_ERROR', message, details);
  }

  static fromZodError(
    error: { issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }> },
    message = 'Validation failed',
  ): ValidationError {
    const details = error.issues.map(issue => ({
      field: issue.path.map(p => String(p)).join('.'),
      message: issue.message,
    }));
    return new ValidationError(message, details);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super('CONFIG_ERROR', message, details);
  }
}

export class InputNotFoundError extends AppError {
  constructor(public readonly path: string) {
    super('INPUT_NOT_FOUND', `Input file not found: ${path}`);
  }
}

/** A table (or a whole page) whose processing raised; its output is dropped. */
export class TableExtractionError extends AppError {
  constructor(
    public readonly pageNo: number,
    public readonly tableIndex: number | null,
    cause: unknown,
  ) {
    const where = tableIndex === null ? `page ${pageNo}` : `page ${pageNo}, table ${tableIndex + 1}`;
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('TABLE_FAILED', `Extraction failed for ${where}: ${reason}`, undefined, { cause });
  }
}

export function errorMessage(err: unknown, fallback = 'Extraction failed'): string {
  return err instanceof Error ? err.message : fallback;
}
