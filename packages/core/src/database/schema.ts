// ABOUTME: Type definitions for the ledger's database schema.
// ABOUTME: Defines interfaces for origins, cache rules, purge events and the derived views.

export const ORIGIN_STATUSES = ["active", "paused", "error"] as const;
export type OriginStatus = (typeof ORIGIN_STATUSES)[number];

export const RULE_TYPES = ["cache", "bypass", "stream"] as const;
export type RuleType = (typeof RULE_TYPES)[number];

export const PURGE_TYPES = ["full", "path", "tag"] as const;
export type PurgeType = (typeof PURGE_TYPES)[number];

export const PURGE_STATUSES = ["queued", "complete", "failed"] as const;
export type PurgeStatus = (typeof PURGE_STATUSES)[number];

/**
 * Providers the CLI suggests. The provider column stays free text.
 */
export const KNOWN_PROVIDERS = ["cloudflare", "fastly", "cloudfront", "bunny"] as const;

export const DEFAULT_TTL = 3600;

/**
 * A CDN-fronted site
 */
export interface Origin {
  id: number;
  name: string;
  origin_url: string;
  cdn_url: string;
  provider: string;
  status: OriginStatus;
  cache_ttl: number;      // seconds
  notes: string;
  created_at: string;
  last_purge: string | null;
}

/**
 * A path-scoped caching override for one origin
 */
export interface CacheRule {
  id: number;
  origin_id: number;
  path_pattern: string;   // e.g. /static/*
  ttl: number;
  cache_headers: boolean;
  rule_type: RuleType;
  created_at: string;
}

/**
 * Raw cache_rules row; SQLite stores booleans as 0/1
 */
export interface CacheRuleRow extends Omit<CacheRule, "cache_headers"> {
  cache_headers: number;
}

/**
 * A recorded cache invalidation request
 */
export interface PurgeEvent {
  id: number;
  origin_id: number;
  purge_type: PurgeType;
  target: string;
  status: PurgeStatus;
  triggered_by: string;
  created_at: string;
}

/**
 * Aggregate fleet figures
 */
export interface StatusSummary {
  total_origins: number;
  total_rules: number;
  total_purges: number;
  purges_24h: number;
  by_provider: Record<string, number>;
  by_status: Record<string, number>;
}

/**
 * Everything the export command writes to disk
 */
export interface ExportPayload {
  exported_at: string;
  origins: Origin[];
  cache_rules: CacheRule[];
  recent_purge_events: PurgeEvent[];
}
