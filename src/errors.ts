export type ErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "STORE_ERROR" | "CONFIG_ERROR";

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or missing input. */
export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
  readonly status = 400;
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";
  readonly status = 404;
}

/**
 * Connectivity, timeout, write or decode failure in the document store.
 * `message` is what the client sees; `detail` carries the driver's reason.
 */
export class StoreError extends AppError {
  readonly code = "STORE_ERROR";
  readonly status = 500;

  constructor(message: string, readonly detail: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends AppError {
  readonly code = "CONFIG_ERROR";
  readonly status = 500;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
