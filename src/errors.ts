export type ErrorKind = "validation" | "not_found" | "permission" | "conflict" | "storage";

/** Base class for every failure a core operation can report. */
export abstract class TrackerError extends Error {
  abstract readonly kind: ErrorKind;
}

export class ValidationError extends TrackerError {
  readonly kind = "validation";
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export class NotFoundError extends TrackerError {
  readonly kind = "not_found";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class PermissionError extends TrackerError {
  readonly kind = "permission";

  constructor(message: string) {
    super(message);
    this.name = "PermissionError";
  }
}

export class ConflictError extends TrackerError {
  readonly kind = "conflict";

  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

/** The store itself failed (I/O, corruption, locked database). */
export class StorageError extends TrackerError {
  readonly kind = "storage";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageError";
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: TrackerError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: TrackerError): Result<T> {
  return { ok: false, error };
}

export function isConstraintError(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export function isUniqueViolation(err: unknown): boolean {
  return (
    isConstraintError(err, "SQLITE_CONSTRAINT_UNIQUE") ||
    isConstraintError(err, "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

export function toTrackerError(err: unknown): TrackerError {
  if (err instanceof TrackerError) {
    return err;
  }
  if (isUniqueViolation(err)) {
    return new ConflictError("A record with the same key already exists.");
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(`Storage failure: ${message}`, err);
}

/**
 * Runs a core operation and folds anything it throws into a failed Result.
 * Throwing inside a kysely transaction rolls it back before we get here.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return fail(toTrackerError(err));
  }
}

/** Like attempt, for predicates that answer directly: store failures still surface typed. */
export async function guardStorage<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toTrackerError(err);
  }
}
