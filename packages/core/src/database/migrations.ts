import type { Database } from "./database";
import { debug, error, info } from "../utils/logging";
import * as initialSchema from "./migrations/001-initial-schema";
import * as lookupIndexes from "./migrations/002-lookup-indexes";

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => void;
}

/**
 * Schema migrations, in the order they are applied
 */
export const migrations: Migration[] = [initialSchema, lookupIndexes];

/**
 * Migration manager for database schema updates
 */
export class MigrationManager {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
    this.initializeMigrationsTable();
  }

  /**
   * Create the migrations tracking table
   */
  private initializeMigrationsTable(): void {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS _migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      )
    `);
  }

  /**
   * Get the current schema version
   */
  public getCurrentVersion(): number {
    const row = this.db.get<{ version: number | null }>(
      `SELECT MAX(version) AS version FROM _migrations`
    );
    return row?.version ?? 0;
  }

  /**
   * Execute a single migration together with its bookkeeping row
   */
  private executeMigration(migration: Migration): void {
    try {
      debug(`Running migration ${migration.version}: ${migration.name}`);
      this.db.transaction(() => {
        migration.up(this.db);
        this.db.run(`INSERT INTO _migrations (version, name) VALUES (?, ?)`, [
          migration.version,
          migration.name,
        ]);
      });
      info(`Applied migration ${migration.name}`);
    } catch (err) {
      error(`Migration ${migration.version} failed: ${err}`);
      throw err;
    }
  }

  /**
   * Run all pending migrations
   */
  public runMigrations(): void {
    const currentVersion = this.getCurrentVersion();
    const pending = migrations.filter((migration) => migration.version > currentVersion);

    if (pending.length === 0) {
      debug(`Database at version ${currentVersion}, no pending migrations`);
      return;
    }

    for (const migration of pending) {
      this.executeMigration(migration);
    }
  }

  /**
   * Get migration status
   */
  public getStatus(): { current: number; available: number; pending: number } {
    const current = this.getCurrentVersion();
    const available = Math.max(0, ...migrations.map((m) => m.version));
    return { current, available, pending: available - current };
  }
}
