export type ErrorDetails = Record<string, string[]>;

/** Error envelope returned by every API failure: `{ error: { code, message, details? } }`. */
export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    details?: ErrorDetails;
  };
};

export class AppError extends Error {
  readonly status: 400 | 404 | 413 | 500;
  readonly code: string;

  constructor(message: string, opts: { status: AppError["status"]; code: string }) {
    super(message);
    this.name = "AppError";
    this.status = opts.status;
    this.code = opts.code;
  }

  toEnvelope(): ErrorEnvelope {
    return { error: { code: this.code, message: this.message } };
  }
}

export class ValidationError extends AppError {
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, { status: 400, code: "validation_error" });
    this.name = "ValidationError";
    this.details = details;
  }

  override toEnvelope(): ErrorEnvelope {
    const hasDetails = Object.keys(this.details).length > 0;
    return {
      error: { code: this.code, message: this.message, ...(hasDetails ? { details: this.details } : {}) },
    };
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, { status: 404, code: "not_found" });
    this.name = "NotFoundError";
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string) {
    super(message, { status: 413, code: "payload_too_large" });
    this.name = "PayloadTooLargeError";
  }
}

/** Wraps SQLite failures; the API shows only the generic message. */
export class DatabaseError extends AppError {
  constructor(operation: string, cause: unknown) {
    super(`Database operation failed: ${operation}`, { status: 500, code: "database_error" });
    this.name = "DatabaseError";
    this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
