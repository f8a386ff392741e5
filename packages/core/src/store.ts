// ABOUTME: The configuration store: origins, cache rules and purge events behind one handle.
// ABOUTME: Validates input, enforces origin references and keeps purge writes atomic.

import { Database, type DatabaseOptions } from "./database/database";
import { InvalidTransitionError, NotFoundError } from "./database/errors";
import { CacheRuleModel, OriginModel, PurgeEventModel } from "./database/models";
import {
  DEFAULT_TTL,
  ORIGIN_STATUSES,
  PURGE_STATUSES,
  PURGE_TYPES,
  RULE_TYPES,
  type CacheRule,
  type ExportPayload,
  type Origin,
  type OriginStatus,
  type PurgeEvent,
  type PurgeStatus,
  type PurgeType,
  type RuleType,
  type StatusSummary,
} from "./database/schema";
import { info } from "./utils/logging";
import { requireId, requireOneOf, requireString, requireTtl } from "./utils/validation";

const DAY_MS = 24 * 60 * 60 * 1000;

export const EXPORT_PURGE_LIMIT = 100;

export interface StoreOptions extends DatabaseOptions {
  /** Source of "now"; every timestamp the store writes comes from here */
  clock?: () => Date;
}

export interface AddOriginInput {
  name: string;
  origin_url: string;
  cdn_url: string;
  provider?: string;
  cache_ttl?: number;
  notes?: string;
}

export interface AddCacheRuleInput {
  origin_id: number;
  path_pattern: string;
  ttl?: number;
  cache_headers?: boolean;
  rule_type?: RuleType | string;
}

export interface PurgeCacheInput {
  origin_id: number;
  purge_type?: PurgeType | string;
  target?: string;
  triggered_by?: string;
}

/**
 * Allowed origin status moves. Staying put is always allowed.
 */
export const ORIGIN_TRANSITIONS: Record<OriginStatus, readonly OriginStatus[]> = {
  active: ["paused", "error"],
  paused: ["active", "error"],
  error: ["active", "paused"],
};

/**
 * Allowed purge status moves; complete and failed are terminal.
 */
export const PURGE_TRANSITIONS: Record<PurgeStatus, readonly PurgeStatus[]> = {
  queued: ["complete", "failed"],
  complete: [],
  failed: [],
};

export class CdnStore {
  readonly db: Database;
  private origins: OriginModel;
  private rules: CacheRuleModel;
  private purges: PurgeEventModel;
  private clock: () => Date;

  private constructor(db: Database, clock: () => Date) {
    this.db = db;
    this.clock = clock;
    this.origins = new OriginModel(db);
    this.rules = new CacheRuleModel(db);
    this.purges = new PurgeEventModel(db);
  }

  /**
   * Open the store and bring its schema up to date
   */
  public static open(options: StoreOptions = {}): CdnStore {
    const db = Database.open(options);
    try {
      db.runMigrations();
    } catch (err) {
      db.close();
      throw err;
    }
    return new CdnStore(db, options.clock ?? (() => new Date()));
  }

  public close(): void {
    this.db.close();
  }

  private now(): string {
    return this.clock().toISOString();
  }

  /**
   * Register a new origin
   */
  public addOrigin(input: AddOriginInput): Origin {
    const origin = this.origins.create(
      {
        name: requireString(input.name, "name"),
        origin_url: requireString(input.origin_url, "origin_url"),
        cdn_url: requireString(input.cdn_url, "cdn_url"),
        provider: input.provider === undefined ? "cloudflare" : requireString(input.provider, "provider"),
        cache_ttl: requireTtl(input.cache_ttl, "cache_ttl", DEFAULT_TTL),
        notes: input.notes ?? "",
      },
      this.now()
    );
    info(`Registered origin #${origin.id} ${origin.name}`);
    return origin;
  }

  /**
   * Get an origin, or throw NotFoundError
   */
  public getOrigin(id: number): Origin {
    const origin = this.origins.findById(requireId(id, "origin_id"));
    if (!origin) {
      throw new NotFoundError("Origin", id);
    }
    return origin;
  }

  public findOriginByName(name: string): Origin | null {
    return this.origins.findByName(name);
  }

  /**
   * All origins by name, optionally only those of one provider
   */
  public listOrigins(provider?: string): Origin[] {
    return this.origins.findAll(provider);
  }

  /**
   * Attach a path-scoped rule to an existing origin
   */
  public addCacheRule(input: AddCacheRuleInput): CacheRule {
    const data = {
      origin_id: requireId(input.origin_id, "origin_id"),
      path_pattern: requireString(input.path_pattern, "path_pattern"),
      ttl: requireTtl(input.ttl, "ttl", DEFAULT_TTL),
      cache_headers: input.cache_headers ?? true,
      rule_type: requireOneOf(input.rule_type, RULE_TYPES, "rule_type", "cache"),
    };

    const rule = this.db.transaction(() => {
      this.getOrigin(data.origin_id);
      return this.rules.create(data, this.now());
    });
    info(`Added cache rule #${rule.id} ${rule.path_pattern} to origin #${rule.origin_id}`);
    return rule;
  }

  public listCacheRules(originId?: number): CacheRule[] {
    if (originId !== undefined) {
      this.getOrigin(originId);
    }
    return this.rules.findAll(originId);
  }

  /**
   * Queue a purge and stamp the origin's last_purge with the same time.
   * Both writes commit together or not at all.
   */
  public purgeCache(input: PurgeCacheInput): PurgeEvent {
    const originId = requireId(input.origin_id, "origin_id");
    const data = {
      origin_id: originId,
      purge_type: requireOneOf(input.purge_type, PURGE_TYPES, "purge_type", "full"),
      target: input.target ?? "*",
      triggered_by: input.triggered_by ?? "cli",
    };

    const event = this.db.transaction(() => {
      this.getOrigin(originId);
      const created = this.purges.create(data, this.now());
      this.origins.stampPurge(originId, created.created_at);
      return created;
    });
    info(`Queued ${event.purge_type} purge #${event.id} for origin #${originId}`);
    return event;
  }

  public getPurgeEvent(id: number): PurgeEvent {
    const event = this.purges.findById(requireId(id, "event_id"));
    if (!event) {
      throw new NotFoundError("PurgeEvent", id);
    }
    return event;
  }

  /**
   * Purge events, newest first
   */
  public listPurgeEvents(options: { originId?: number; limit?: number } = {}): PurgeEvent[] {
    if (options.originId !== undefined) {
      this.getOrigin(options.originId);
    }
    return this.purges.findRecent({
      originId: options.originId,
      limit: options.limit === undefined ? EXPORT_PURGE_LIMIT : requireId(options.limit, "limit"),
    });
  }

  /**
   * Move an origin to a new status along ORIGIN_TRANSITIONS
   */
  public setOriginStatus(id: number, status: OriginStatus | string): Origin {
    const next = requireOneOf(status, ORIGIN_STATUSES, "status", "active");
    return this.db.transaction(() => {
      const origin = this.getOrigin(id);
      if (origin.status === next) {
        return origin;
      }
      if (!ORIGIN_TRANSITIONS[origin.status].includes(next)) {
        throw new InvalidTransitionError("Origin", origin.status, next);
      }
      this.origins.updateStatus(id, next);
      info(`Origin #${id} ${origin.status} -> ${next}`);
      return { ...origin, status: next };
    });
  }

  /**
   * Move a purge event to a new status along PURGE_TRANSITIONS
   */
  public setPurgeStatus(id: number, status: PurgeStatus | string): PurgeEvent {
    const next = requireOneOf(status, PURGE_STATUSES, "status", "queued");
    return this.db.transaction(() => {
      const event = this.getPurgeEvent(id);
      if (event.status === next) {
        return event;
      }
      if (!PURGE_TRANSITIONS[event.status].includes(next)) {
        throw new InvalidTransitionError("PurgeEvent", event.status, next);
      }
      this.purges.updateStatus(id, next);
      info(`Purge #${id} ${event.status} -> ${next}`);
      return { ...event, status: next };
    });
  }

  /**
   * Aggregate fleet figures, read as one snapshot
   */
  public cdnStatus(): StatusSummary {
    return this.db.transaction(() => {
      const since = new Date(this.clock().getTime() - DAY_MS).toISOString();
      return {
        total_origins: this.origins.count(),
        total_rules: this.rules.count(),
        total_purges: this.purges.count(),
        purges_24h: this.purges.countSince(since),
        by_provider: this.origins.countBy("provider"),
        by_status: this.origins.countBy("status"),
      };
    });
  }

  /**
   * Everything needed to write an export file
   */
  public exportAll(): ExportPayload {
    return this.db.transaction(() => ({
      exported_at: this.now(),
      origins: this.origins.findAll(),
      cache_rules: this.rules.findAll(),
      recent_purge_events: this.purges.findRecent({ limit: EXPORT_PURGE_LIMIT }),
    }));
  }
}
