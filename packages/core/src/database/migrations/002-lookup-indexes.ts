// ABOUTME: Indexes for the provider filter, per-origin lookups and the 24h purge window.

import type { Database } from "../database";

export const version = 2;

export const name = "002-lookup-indexes";

export function up(db: Database): void {
  db.exec(`CREATE INDEX IF NOT EXISTS idx_origins_provider ON origins(provider)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_cache_rules_origin ON cache_rules(origin_id)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_purge_events_origin ON purge_events(origin_id)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_purge_events_created ON purge_events(created_at)`);
}
