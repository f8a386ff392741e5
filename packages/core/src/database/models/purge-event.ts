// ABOUTME: Model for PurgeEvent operations against the purge_events table.
// ABOUTME: Events are created queued; recent-first listing backs the export and the purges command.

import type { Database, SqlValue } from "../database";
import type { PurgeEvent, PurgeStatus, PurgeType } from "../schema";

/**
 * Data required to queue a purge
 */
export interface CreatePurgeEventData {
  origin_id: number;
  purge_type?: PurgeType;
  target?: string;
  triggered_by?: string;
}

/**
 * PurgeEvent model for managing purge records in the database
 */
export class PurgeEventModel {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  /**
   * Create a new queued purge event
   */
  public create(data: CreatePurgeEventData, createdAt: string): PurgeEvent {
    const event: Omit<PurgeEvent, "id"> = {
      origin_id: data.origin_id,
      purge_type: data.purge_type ?? "full",
      target: data.target ?? "*",
      status: "queued",
      triggered_by: data.triggered_by ?? "cli",
      created_at: createdAt,
    };

    const result = this.db.run(
      `INSERT INTO purge_events (origin_id, purge_type, target, status, triggered_by, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        event.origin_id,
        event.purge_type,
        event.target,
        event.status,
        event.triggered_by,
        event.created_at,
      ]
    );

    return { id: result.lastInsertRowid, ...event };
  }

  /**
   * Find a purge event by ID
   */
  public findById(id: number): PurgeEvent | null {
    return this.db.get<PurgeEvent>(`SELECT * FROM purge_events WHERE id = ? LIMIT 1`, [id]);
  }

  /**
   * Most recent events first, optionally for one origin
   */
  public findRecent(options: { originId?: number; limit?: number } = {}): PurgeEvent[] {
    const params: SqlValue[] = [];
    let sql = `SELECT * FROM purge_events`;
    if (options.originId !== undefined) {
      sql += ` WHERE origin_id = ?`;
      params.push(options.originId);
    }
    sql += ` ORDER BY created_at DESC, id DESC LIMIT ?`;
    params.push(options.limit ?? 100);
    return this.db.query<PurgeEvent>(sql, params);
  }

  public count(): number {
    return this.db.get<{ count: number }>(`SELECT COUNT(*) AS count FROM purge_events`)?.count ?? 0;
  }

  /**
   * Count events created strictly after the given ISO timestamp
   */
  public countSince(since: string): number {
    return (
      this.db.get<{ count: number }>(
        `SELECT COUNT(*) AS count FROM purge_events WHERE created_at > ?`,
        [since]
      )?.count ?? 0
    );
  }

  /**
   * Update purge event status
   */
  public updateStatus(id: number, status: PurgeStatus): boolean {
    const result = this.db.run(`UPDATE purge_events SET status = ? WHERE id = ?`, [status, id]);
    return result.changes > 0;
  }
}
