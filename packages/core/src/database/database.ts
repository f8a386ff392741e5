import BetterSqlite3 from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { getBusyTimeout, resolvePaths } from "../config/paths";
import { debug, error } from "../utils/logging";
import { StorageUnavailableError, getErrorMessage, translateSqliteError } from "./errors";
import { MigrationManager } from "./migrations";

export type SqlValue = string | number | bigint | Buffer | null;

export interface DatabaseOptions {
  /** Directory holding cdn-ledger.db; ignored when filename is given */
  dataDir?: string;
  /** Explicit database file, or ":memory:" */
  filename?: string;
  /** Milliseconds to wait on a locked database */
  busyTimeout?: number;
}

export interface RunResult {
  lastInsertRowid: number;
  changes: number;
}

/**
 * SQLite connection wrapper. Every instance owns its own connection,
 * so tests can point separate instances at separate files.
 */
export class Database {
  private db: BetterSqlite3.Database;
  readonly filename: string;

  private constructor(db: BetterSqlite3.Database, filename: string) {
    this.db = db;
    this.filename = filename;
  }

  /**
   * Open (and create if needed) a database file
   */
  public static open(options: DatabaseOptions = {}): Database {
    const filename = options.filename ?? Database.prepareDataDir(options.dataDir);

    let db: BetterSqlite3.Database | undefined;
    try {
      db = new BetterSqlite3(filename, {
        timeout: options.busyTimeout ?? getBusyTimeout(),
      });
      db.pragma("foreign_keys = ON");
      if (filename !== ":memory:") {
        db.pragma("journal_mode = WAL");
      }
      debug(`Connected to database at: ${filename}`);
      return new Database(db, filename);
    } catch (err) {
      error(`Failed to connect to database: ${getErrorMessage(err)}`);
      db?.close();
      const code = err instanceof BetterSqlite3.SqliteError ? err.code : null;
      throw new StorageUnavailableError(
        `Cannot open database at ${filename}: ${getErrorMessage(err)}`,
        code,
        { cause: err }
      );
    }
  }

  /**
   * Ensure the data directory exists and return the database path in it
   */
  private static prepareDataDir(dataDir?: string): string {
    const paths = resolvePaths({ dataDir });
    if (!existsSync(paths.dataDir)) {
      try {
        mkdirSync(paths.dataDir, { recursive: true });
      } catch (err) {
        error(`Failed to create data directory: ${getErrorMessage(err)}`);
        throw new StorageUnavailableError(
          `Cannot create data directory ${paths.dataDir}: ${getErrorMessage(err)}`,
          null,
          { cause: err }
        );
      }
    }
    return paths.database;
  }

  /**
   * Execute a SQL statement
   * Returns an object with lastInsertRowid and changes
   */
  public run(sql: string, params: SqlValue[] = []): RunResult {
    try {
      const result = this.db.prepare(sql).run(...params);
      return {
        lastInsertRowid: Number(result.lastInsertRowid),
        changes: result.changes,
      };
    } catch (err) {
      error(`Database error executing: ${sql}`);
      error(getErrorMessage(err));
      throw translateSqliteError(err);
    }
  }

  /**
   * Execute one or more statements without parameters (schema changes)
   */
  public exec(sql: string): void {
    try {
      this.db.exec(sql);
    } catch (err) {
      error(`Database error executing: ${sql}`);
      error(getErrorMessage(err));
      throw translateSqliteError(err);
    }
  }

  /**
   * Execute a query and return results
   */
  public query<T>(sql: string, params: SqlValue[] = []): T[] {
    try {
      return this.db.prepare<SqlValue[], T>(sql).all(...params);
    } catch (err) {
      error(`Database error querying: ${sql}`);
      error(getErrorMessage(err));
      throw translateSqliteError(err);
    }
  }

  /**
   * Execute a query and return the first row, or null
   */
  public get<T>(sql: string, params: SqlValue[] = []): T | null {
    try {
      return this.db.prepare<SqlValue[], T>(sql).get(...params) ?? null;
    } catch (err) {
      error(`Database error querying: ${sql}`);
      error(getErrorMessage(err));
      throw translateSqliteError(err);
    }
  }

  /**
   * Run fn inside a transaction. A throw anywhere in fn rolls back every
   * write it made; nested calls become savepoints.
   */
  public transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      throw translateSqliteError(err);
    }
  }

  /**
   * Apply every pending schema migration
   */
  public runMigrations(): void {
    new MigrationManager(this).runMigrations();
  }

  /**
   * Close the database connection
   */
  public close(): void {
    if (this.db.open) {
      this.db.close();
      debug(`Closed database at: ${this.filename}`);
    }
  }
}
