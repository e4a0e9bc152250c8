/* Typed engine errors. Every error carries a stable `code` and whether retrying the same call can succeed.
 * Validation, duplicate and conflict errors are raised before any remote write.
 */

export type EngineErrorCode =
  | "NOT_FOUND"
  | "DUPLICATE"
  | "CONFLICT"
  | "VALIDATION"
  | "NETWORK"
  | "PERMISSION_DENIED"
  | "UNKNOWN"
  | "CASCADE_INCOMPLETE";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends EngineError {
  readonly code = "NOT_FOUND";
  readonly retryable = false;
  constructor(readonly entityKind: string, readonly id: string) {
    super(`${entityKind} not found: ${id}`);
  }
}

export class DuplicateError extends EngineError {
  readonly code = "DUPLICATE";
  readonly retryable = false;
  constructor(readonly entityKind: string, readonly naturalKey: string) {
    super(`${entityKind} already exists: ${naturalKey}`);
  }
}

export class ConflictError extends EngineError {
  readonly code = "CONFLICT";
  readonly retryable = false;
  constructor(readonly entityKind: string, readonly id: string, readonly reason: string) {
    super(`${entityKind} ${id}: ${reason}`);
  }
}

export class ValidationError extends EngineError {
  readonly code = "VALIDATION";
  readonly retryable = false;
  constructor(readonly field: string, readonly reason: string) {
    super(`invalid ${field}: ${reason}`);
  }
}

export class NetworkError extends EngineError {
  readonly code = "NETWORK";
  readonly retryable = true;
  constructor(readonly underlying: unknown) {
    super(`store unavailable: ${describe(underlying)}`, { cause: underlying });
  }
}

export class PermissionDeniedError extends EngineError {
  readonly code = "PERMISSION_DENIED";
  readonly retryable = false;
  constructor(readonly operation: string, cause?: unknown) {
    super(`permission denied: ${operation}`, { cause });
  }
}

export class UnknownError extends EngineError {
  readonly code = "UNKNOWN";
  readonly retryable = false;
  constructor(readonly underlying: unknown) {
    super(`unexpected store failure: ${describe(underlying)}`, { cause: underlying });
  }
}

// The primary entity is gone; only the named dependent collections still hold rows for it.
export class CascadeError extends EngineError {
  readonly code = "CASCADE_INCOMPLETE";
  readonly retryable = true;
  constructor(
    readonly entityKind: string,
    readonly id: string,
    readonly failedCollections: string[],
    readonly causes: unknown[] = [],
  ) {
    super(`${entityKind} ${id} deleted; dependents not purged from: ${failedCollections.join(", ")}`);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function isRetryable(err: unknown): boolean {
  return isEngineError(err) && err.retryable;
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
