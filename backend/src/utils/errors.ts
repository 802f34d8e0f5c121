/**
 * Error taxonomy shared by the stores, the services and the HTTP layer.
 * `statusCode` is what the HTTP error handler answers with; `message` is safe to show.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not Found") {
    super(message, 404);
  }
}

export class ValidationError extends AppError {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message, 400);
    this.hint = hint;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "This action is restricted to admins") {
    super(message, 403);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** Storage unavailable or a write conflict; safe to retry. */
export class TransientStoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, { cause });
  }
}

/** The chat platform refused or failed a delivery. */
export class GatewayError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, { cause });
  }
}

// SQLSTATE codes and socket errors worth a retry.
const TRANSIENT_CODES = new Set([
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
  "53300", // too_many_connections
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE"
]);

function errorCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

export function isTransientStoreFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (!code) return false;
  // Class 08: connection exceptions
  return TRANSIENT_CODES.has(code) || code.startsWith("08");
}

/** Wraps retryable driver failures in TransientStoreError; returns anything else untouched. */
export function toStoreError(err: unknown): unknown {
  if (err instanceof AppError) return err;
  if (isTransientStoreFailure(err)) {
    return new TransientStoreError("Storage temporarily unavailable", err);
  }
  return err;
}
