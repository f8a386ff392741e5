import { describe, test, expect, beforeAll } from "vitest";
import chalk from "chalk";
import type { CacheRule, Origin, PurgeEvent } from "@cdn-ledger/core";
import { colorStatus, formatOrigin, formatPurgeEvent, formatRule, formatStatus } from "./display";

const origin: Origin = {
  id: 12,
  name: "media",
  origin_url: "https://media-origin.example.com",
  cdn_url: "https://media.example.com",
  provider: "bunny",
  status: "paused",
  cache_ttl: 45,
  notes: "large files",
  created_at: "2026-04-01T09:00:00.000Z",
  last_purge: "2026-04-02T10:11:12.345Z",
};

describe("display", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  test("formatOrigin includes purge time and notes when present", () => {
    expect(formatOrigin(origin)).toEqual([
      "  [ 12] media  (bunny)",
      "        Status : paused   TTL: 45s",
      "        Origin : https://media-origin.example.com",
      "        CDN    : https://media.example.com",
      "        Purged : 2026-04-02 10:11:12",
      "        Notes  : large files",
    ]);
  });

  test("formatOrigin omits empty optional lines", () => {
    expect(formatOrigin({ ...origin, last_purge: null, notes: "" })).toHaveLength(4);
  });

  test("formatRule marks rules without cache headers", () => {
    const rule: CacheRule = {
      id: 3,
      origin_id: 12,
      path_pattern: "/live/*",
      ttl: 120,
      cache_headers: false,
      rule_type: "stream",
      created_at: "2026-04-01T09:00:00.000Z",
    };

    expect(formatRule(rule)).toBe("  [  3] origin #12  /live/*  stream  TTL 2m  (no cache headers)");
  });

  test("formatPurgeEvent shows type, target and actor", () => {
    const event: PurgeEvent = {
      id: 8,
      origin_id: 12,
      purge_type: "tag",
      target: "thumbnails",
      status: "queued",
      triggered_by: "deploy-bot",
      created_at: "2026-04-02T10:11:12.345Z",
    };

    expect(formatPurgeEvent(event)).toBe(
      "  #8 2026-04-02 10:11:12  origin #12  tag thumbnails  queued  by deploy-bot"
    );
  });

  test("formatStatus skips empty breakdowns", () => {
    expect(
      formatStatus({
        total_origins: 0,
        total_rules: 0,
        total_purges: 0,
        purges_24h: 0,
        by_provider: {},
        by_status: {},
      })
    ).toHaveLength(5);
  });

  test("colorStatus colors by tone", () => {
    chalk.level = 1;
    try {
      expect(colorStatus("active")).toBe(chalk.green("active"));
      expect(colorStatus("error")).toBe(chalk.red("error"));
      expect(colorStatus("paused")).toBe(chalk.yellow("paused"));
    } finally {
      chalk.level = 0;
    }
  });
});
