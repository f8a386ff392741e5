// ABOUTME: Model for CacheRule operations against the cache_rules table.
// ABOUTME: Converts the 0/1 cache_headers column to a boolean on the way out.

import type { Database, SqlValue } from "../database";
import type { CacheRule, CacheRuleRow, RuleType } from "../schema";

/**
 * Data required to create a new cache rule
 */
export interface CreateCacheRuleData {
  origin_id: number;
  path_pattern: string;
  ttl?: number;
  cache_headers?: boolean;
  rule_type?: RuleType;
}

function fromRow(row: CacheRuleRow): CacheRule {
  return { ...row, cache_headers: row.cache_headers !== 0 };
}

/**
 * CacheRule model for managing rule records in the database
 */
export class CacheRuleModel {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  /**
   * Create a new cache rule
   */
  public create(data: CreateCacheRuleData, createdAt: string): CacheRule {
    const rule: Omit<CacheRule, "id"> = {
      origin_id: data.origin_id,
      path_pattern: data.path_pattern,
      ttl: data.ttl ?? 3600,
      cache_headers: data.cache_headers ?? true,
      rule_type: data.rule_type ?? "cache",
      created_at: createdAt,
    };

    const result = this.db.run(
      `INSERT INTO cache_rules (origin_id, path_pattern, ttl, cache_headers, rule_type, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        rule.origin_id,
        rule.path_pattern,
        rule.ttl,
        rule.cache_headers ? 1 : 0,
        rule.rule_type,
        rule.created_at,
      ]
    );

    return { id: result.lastInsertRowid, ...rule };
  }

  /**
   * Find a rule by ID
   */
  public findById(id: number): CacheRule | null {
    const row = this.db.get<CacheRuleRow>(`SELECT * FROM cache_rules WHERE id = ? LIMIT 1`, [id]);
    return row ? fromRow(row) : null;
  }

  /**
   * Find all rules in insertion order, optionally for one origin
   */
  public findAll(originId?: number): CacheRule[] {
    const params: SqlValue[] = [];
    let sql = `SELECT * FROM cache_rules`;
    if (originId !== undefined) {
      sql += ` WHERE origin_id = ?`;
      params.push(originId);
    }
    sql += ` ORDER BY id`;
    return this.db.query<CacheRuleRow>(sql, params).map(fromRow);
  }

  public count(): number {
    return this.db.get<{ count: number }>(`SELECT COUNT(*) AS count FROM cache_rules`)?.count ?? 0;
  }
}
