export type ErrorCategory = "VALIDATION_ERROR" | "INGESTION_ERROR" | "CONFIGURATION_ERROR" | "NOT_FOUND" | "INTERNAL_ERROR";

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  VALIDATION_ERROR: 400,
  INGESTION_ERROR: 422,
  CONFIGURATION_ERROR: 500,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500
};

export class AppError extends Error {
  public readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = "AppError";
    this.category = category;
  }

  get status(): number {
    return STATUS_BY_CATEGORY[this.category];
  }
}

// Rejected input: wrong file type, out-of-range resolution, missing upload.
export class ValidationError extends AppError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class IngestionError extends AppError {
  constructor(
    message: string,
    public readonly fileName?: string
  ) {
    super("INGESTION_ERROR", message);
    this.name = "IngestionError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
    this.name = "ConfigError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "not found") {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export type ErrorResponse = {
  error: string;
  detail: string | null;
};

/**
 * Client-facing body for a failure. Validation and lookup errors keep their
 * message; anything else becomes a generic processing error whose detail is
 * only exposed in debug mode.
 */
export function toErrorResponse(e: unknown, debug: boolean): { status: number; body: ErrorResponse } {
  if (e instanceof ValidationError || e instanceof NotFoundError) {
    return { status: e.status, body: { error: e.message, detail: null } };
  }
  const status = e instanceof AppError ? e.status : 500;
  const error = e instanceof IngestionError ? "Error processing documents" : "Internal server error";
  return { status, body: { error, detail: debug ? errorMessage(e) : null } };
}
