export class AppError extends Error {
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(status: number, code: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export type UniqueField = 'username' | 'email';

export class UniquenessViolationError extends AppError {
  readonly field: UniqueField;

  constructor(field: UniqueField) {
    super(409, 40901, `That ${field} is already registered`, { field });
    this.field = field;
  }
}

export class ValueParsingError extends AppError {
  constructor(message: string, value: string) {
    super(400, 40005, message, { value });
  }
}

/** A persisted value that can no longer be interpreted, e.g. a truncated password hash. */
export class DataCorruptionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(500, 50001, message, details);
  }
}
