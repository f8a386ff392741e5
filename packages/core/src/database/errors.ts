// ABOUTME: Error taxonomy raised by the configuration store.
// ABOUTME: Also translates better-sqlite3 driver errors into these classes.

import BetterSqlite3 from "better-sqlite3";

export type StoreErrorCode =
  | "UNIQUE_VIOLATION"
  | "NOT_FOUND"
  | "VALIDATION_FAILED"
  | "INVALID_TRANSITION"
  | "STORAGE_UNAVAILABLE";

/**
 * Base class for every error the store raises on purpose.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(message: string, code: StoreErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
    this.code = code;
  }
}

/**
 * Thrown when an origin name is already registered.
 *
 * @example
 * ```ts
 * throw new UniqueConstraintError("origins", "name", "shop");
 * ```
 */
export class UniqueConstraintError extends StoreError {
  readonly table: string;
  readonly column: string;

  constructor(table: string, column: string, value: string, options?: { cause?: unknown }) {
    super(`${table}.${column} "${value}" already exists`, "UNIQUE_VIOLATION", options);
    this.name = "UniqueConstraintError";
    this.table = table;
    this.column = column;
  }
}

/**
 * Thrown when an id does not reference an existing row.
 */
export class NotFoundError extends StoreError {
  readonly entity: string;
  readonly id: number;

  constructor(entity: string, id: number) {
    super(`${entity} #${id} not found`, "NOT_FOUND");
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

export class ValidationError extends StoreError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field} ${message}`, "VALIDATION_FAILED");
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * Thrown when a status field is asked to move along an edge that
 * its state machine does not have.
 */
export class InvalidTransitionError extends StoreError {
  readonly from: string;
  readonly to: string;

  constructor(entity: string, from: string, to: string) {
    super(`${entity} cannot move from "${from}" to "${to}"`, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

/**
 * The database file could not be opened, read or written.
 */
export class StorageUnavailableError extends StoreError {
  readonly sqliteCode: string | null;

  constructor(message: string, sqliteCode: string | null, options?: { cause?: unknown }) {
    super(message, "STORAGE_UNAVAILABLE", options);
    this.name = "StorageUnavailableError";
    this.sqliteCode = sqliteCode;
  }
}

const UNAVAILABLE_CODES = [
  "SQLITE_CANTOPEN",
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_FULL",
  "SQLITE_READONLY",
  "SQLITE_PERM",
  "SQLITE_IOERR",
  "SQLITE_NOTADB",
];

/**
 * Whether a driver error code means the storage itself is unusable.
 * Extended codes (SQLITE_IOERR_WRITE, SQLITE_BUSY_SNAPSHOT...) count too.
 */
export function isUnavailableCode(code: string): boolean {
  return UNAVAILABLE_CODES.some(
    (prefix) => code === prefix || code.startsWith(`${prefix}_`)
  );
}

/**
 * Map a thrown driver error onto the store taxonomy. Errors that are not
 * SQLite errors, or SQLite errors with no mapping, come back unchanged.
 */
export function translateSqliteError(err: unknown): unknown {
  if (!(err instanceof BetterSqlite3.SqliteError)) {
    return err;
  }
  if (isUnavailableCode(err.code)) {
    return new StorageUnavailableError(`Storage unavailable: ${err.message}`, err.code, {
      cause: err,
    });
  }
  return err;
}

/**
 * Safely extract a message from an unknown error value
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
