// ABOUTME: Initial migration creating the origins, cache_rules and purge_events tables.
// ABOUTME: Enum columns carry CHECK constraints; rules cascade when their origin goes.

import type { Database } from "../database";

export const version = 1;

export const name = "001-initial-schema";

/**
 * Apply the migration - creates all tables
 */
export function up(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS origins (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      origin_url TEXT NOT NULL,
      cdn_url TEXT NOT NULL,
      provider TEXT NOT NULL DEFAULT 'cloudflare',
      status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'paused', 'error')),
      cache_ttl INTEGER NOT NULL DEFAULT 3600,
      notes TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
      last_purge TEXT
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS cache_rules (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      origin_id INTEGER NOT NULL,
      path_pattern TEXT NOT NULL,
      ttl INTEGER NOT NULL DEFAULT 3600,
      cache_headers INTEGER NOT NULL DEFAULT 1,
      rule_type TEXT NOT NULL DEFAULT 'cache' CHECK (rule_type IN ('cache', 'bypass', 'stream')),
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
      FOREIGN KEY (origin_id) REFERENCES origins(id) ON DELETE CASCADE
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS purge_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      origin_id INTEGER NOT NULL,
      purge_type TEXT NOT NULL DEFAULT 'full' CHECK (purge_type IN ('full', 'path', 'tag')),
      target TEXT NOT NULL DEFAULT '*',
      status TEXT NOT NULL DEFAULT 'queued' CHECK (status IN ('queued', 'complete', 'failed')),
      triggered_by TEXT NOT NULL DEFAULT 'cli',
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
      FOREIGN KEY (origin_id) REFERENCES origins(id)
    )
  `);
}
