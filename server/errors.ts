/**
 * @module server/errors
 * @description Application error hierarchy. Each error carries the HTTP status
 * and machine-readable code the routes respond with.
 */

export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields merged into the JSON error body. */
  details(): Record<string, unknown> {
    return {};
  }
}

export class NotFoundError extends AppError {
  constructor(readonly entity: string, readonly id?: string) {
    super(`${entity} not found`, 404, "NOT_FOUND");
  }
}

export interface ValidationDetails {
  field?: string;
  questionIndex?: number; // 1-based
  answerIndex?: number; // 1-based
}

export class ValidationError extends AppError {
  constructor(message: string, readonly info: ValidationDetails = {}) {
    super(message, 400, "VALIDATION_FAILED");
  }

  override details(): Record<string, unknown> {
    return { ...this.info };
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, "STORAGE_UNAVAILABLE", { cause });
  }
}

// PostgreSQL unique_violation
const UNIQUE_VIOLATION = "23505";

function pgCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Drizzle may wrap driver errors, so the cause chain is checked as well.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (pgCode(error) === UNIQUE_VIOLATION) return true;
  if (error instanceof Error && error.cause !== undefined) {
    return isUniqueViolation(error.cause);
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
