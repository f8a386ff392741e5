// ABOUTME: Model for Origin operations against the origins table.
// ABOUTME: Provides create, lookup, filtered listing, counts, purge stamping and status updates.

import BetterSqlite3 from "better-sqlite3";
import type { Database, SqlValue } from "../database";
import { UniqueConstraintError } from "../errors";
import type { Origin, OriginStatus } from "../schema";

/**
 * Data required to create a new origin
 */
export interface CreateOriginData {
  name: string;
  origin_url: string;
  cdn_url: string;
  provider?: string;
  cache_ttl?: number;
  notes?: string;
}

/**
 * Origin model for managing origin records in the database
 */
export class OriginModel {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  /**
   * Create a new origin
   */
  public create(data: CreateOriginData, createdAt: string): Origin {
    try {
      const result = this.db.run(
        `INSERT INTO origins (name, origin_url, cdn_url, provider, status, cache_ttl, notes, created_at, last_purge)
         VALUES (?, ?, ?, ?, 'active', ?, ?, ?, NULL)`,
        [
          data.name,
          data.origin_url,
          data.cdn_url,
          data.provider ?? "cloudflare",
          data.cache_ttl ?? 3600,
          data.notes ?? "",
          createdAt,
        ]
      );

      return {
        id: result.lastInsertRowid,
        name: data.name,
        origin_url: data.origin_url,
        cdn_url: data.cdn_url,
        provider: data.provider ?? "cloudflare",
        status: "active",
        cache_ttl: data.cache_ttl ?? 3600,
        notes: data.notes ?? "",
        created_at: createdAt,
        last_purge: null,
      };
    } catch (err) {
      if (err instanceof BetterSqlite3.SqliteError && err.code === "SQLITE_CONSTRAINT_UNIQUE") {
        throw new UniqueConstraintError("origins", "name", data.name, { cause: err });
      }
      throw err;
    }
  }

  /**
   * Find an origin by ID
   */
  public findById(id: number): Origin | null {
    return this.db.get<Origin>(`SELECT * FROM origins WHERE id = ? LIMIT 1`, [id]);
  }

  /**
   * Find an origin by name
   */
  public findByName(name: string): Origin | null {
    return this.db.get<Origin>(`SELECT * FROM origins WHERE name = ? LIMIT 1`, [name]);
  }

  /**
   * Find all origins ordered by name, optionally for one provider.
   * An empty provider means no filter.
   */
  public findAll(provider?: string): Origin[] {
    const params: SqlValue[] = [];
    let sql = `SELECT * FROM origins`;
    if (provider) {
      sql += ` WHERE provider = ?`;
      params.push(provider);
    }
    sql += ` ORDER BY name`;
    return this.db.query<Origin>(sql, params);
  }

  public count(): number {
    return this.db.get<{ count: number }>(`SELECT COUNT(*) AS count FROM origins`)?.count ?? 0;
  }

  /**
   * Count origins grouped by a column
   */
  public countBy(column: "provider" | "status"): Record<string, number> {
    const rows = this.db.query<{ key: string; count: number }>(
      `SELECT ${column} AS key, COUNT(*) AS count FROM origins GROUP BY ${column} ORDER BY ${column}`
    );
    const counts: Record<string, number> = {};
    for (const row of rows) {
      counts[row.key] = row.count;
    }
    return counts;
  }

  /**
   * Record the time of the latest purge
   */
  public stampPurge(id: number, timestamp: string): boolean {
    const result = this.db.run(`UPDATE origins SET last_purge = ? WHERE id = ?`, [timestamp, id]);
    return result.changes > 0;
  }

  /**
   * Update origin status
   */
  public updateStatus(id: number, status: OriginStatus): boolean {
    const result = this.db.run(`UPDATE origins SET status = ? WHERE id = ?`, [status, id]);
    return result.changes > 0;
  }
}
