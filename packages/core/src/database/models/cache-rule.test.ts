// ABOUTME: Test file for CacheRule model operations.

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { Database } from "../database";
import { CacheRuleModel } from "./cache-rule";
import { OriginModel } from "./origin";

const CREATED_AT = "2026-02-01T08:30:00.000Z";

describe("CacheRuleModel", () => {
  let db: Database;
  let ruleModel: CacheRuleModel;
  let originId: number;

  beforeEach(() => {
    db = Database.open({ filename: ":memory:" });
    db.runMigrations();
    ruleModel = new CacheRuleModel(db);
    originId = new OriginModel(db).create(
      { name: "shop", origin_url: "https://a.example.com", cdn_url: "https://b.example.com" },
      CREATED_AT
    ).id;
  });

  afterEach(() => {
    db.close();
  });

  test("creates a rule with defaults", () => {
    const rule = ruleModel.create({ origin_id: originId, path_pattern: "/static/*" }, CREATED_AT);

    expect(rule).toEqual({
      id: 1,
      origin_id: originId,
      path_pattern: "/static/*",
      ttl: 3600,
      cache_headers: true,
      rule_type: "cache",
      created_at: CREATED_AT,
    });
  });

  test("reads cache_headers back as a boolean", () => {
    const rule = ruleModel.create(
      { origin_id: originId, path_pattern: "/api/*", ttl: 0, cache_headers: false, rule_type: "bypass" },
      CREATED_AT
    );

    expect(ruleModel.findById(rule.id)?.cache_headers).toBe(false);
  });

  test("findAll keeps insertion order and filters by origin", () => {
    const otherId = new OriginModel(db).create(
      { name: "blog", origin_url: "https://c.example.com", cdn_url: "https://d.example.com" },
      CREATED_AT
    ).id;
    ruleModel.create({ origin_id: originId, path_pattern: "/z/*" }, CREATED_AT);
    ruleModel.create({ origin_id: otherId, path_pattern: "/a/*" }, CREATED_AT);
    ruleModel.create({ origin_id: originId, path_pattern: "/m/*" }, CREATED_AT);

    expect(ruleModel.findAll().map((r) => r.path_pattern)).toEqual(["/z/*", "/a/*", "/m/*"]);
    expect(ruleModel.findAll(originId).map((r) => r.path_pattern)).toEqual(["/z/*", "/m/*"]);
    expect(ruleModel.count()).toBe(3);
  });

  test("rules are deleted with their origin", () => {
    ruleModel.create({ origin_id: originId, path_pattern: "/static/*" }, CREATED_AT);

    db.run(`DELETE FROM origins WHERE id = ?`, [originId]);

    expect(ruleModel.count()).toBe(0);
  });

  test("foreign key rejects an unknown origin", () => {
    expect(() => ruleModel.create({ origin_id: 42, path_pattern: "/x/*" }, CREATED_AT)).toThrow(
      /FOREIGN KEY constraint failed/
    );
  });
});
