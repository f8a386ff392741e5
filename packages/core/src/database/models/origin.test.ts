// ABOUTME: Test file for Origin model operations.
// ABOUTME: Verifies create, lookup, ordering, grouped counts and the unique name constraint.

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { Database } from "../database";
import { UniqueConstraintError } from "../errors";
import { OriginModel } from "./origin";

const CREATED_AT = "2026-01-10T12:00:00.000Z";

describe("OriginModel", () => {
  let db: Database;
  let originModel: OriginModel;

  beforeEach(() => {
    db = Database.open({ filename: ":memory:" });
    db.runMigrations();
    originModel = new OriginModel(db);
  });

  afterEach(() => {
    db.close();
  });

  describe("create", () => {
    test("creates an origin with defaults", () => {
      const origin = originModel.create(
        { name: "shop", origin_url: "https://origin.example.com", cdn_url: "https://cdn.example.com" },
        CREATED_AT
      );

      expect(origin).toEqual({
        id: 1,
        name: "shop",
        origin_url: "https://origin.example.com",
        cdn_url: "https://cdn.example.com",
        provider: "cloudflare",
        status: "active",
        cache_ttl: 3600,
        notes: "",
        created_at: CREATED_AT,
        last_purge: null,
      });
    });

    test("returned origin matches the stored row", () => {
      const created = originModel.create(
        {
          name: "docs",
          origin_url: "https://docs-origin.example.com",
          cdn_url: "https://docs.example.com",
          provider: "fastly",
          cache_ttl: 600,
          notes: "static docs",
        },
        CREATED_AT
      );

      expect(originModel.findById(created.id)).toEqual(created);
    });

    test("rejects a duplicate name without adding a row", () => {
      originModel.create({ name: "shop", origin_url: "https://a.example.com", cdn_url: "https://b.example.com" }, CREATED_AT);

      expect(() =>
        originModel.create({ name: "shop", origin_url: "https://c.example.com", cdn_url: "https://d.example.com" }, CREATED_AT)
      ).toThrow(UniqueConstraintError);
      expect(originModel.count()).toBe(1);
    });
  });

  describe("findByName", () => {
    test("returns null for an unknown name", () => {
      expect(originModel.findByName("missing")).toBeNull();
    });
  });

  describe("findAll", () => {
    beforeEach(() => {
      for (const [name, provider] of [
        ["zeta", "fastly"],
        ["alpha", "cloudflare"],
        ["mid", "fastly"],
      ]) {
        originModel.create(
          { name, origin_url: `https://${name}.example.com`, cdn_url: `https://cdn-${name}.example.com`, provider },
          CREATED_AT
        );
      }
    });

    test("orders by name", () => {
      expect(originModel.findAll().map((o) => o.name)).toEqual(["alpha", "mid", "zeta"]);
    });

    test("filters by exact provider", () => {
      expect(originModel.findAll("fastly").map((o) => o.name)).toEqual(["mid", "zeta"]);
      expect(originModel.findAll("Fastly")).toEqual([]);
    });

    test("an empty provider is no filter", () => {
      expect(originModel.findAll("").map((o) => o.name)).toEqual(["alpha", "mid", "zeta"]);
    });

    test("countBy groups origins", () => {
      expect(originModel.countBy("provider")).toEqual({ cloudflare: 1, fastly: 2 });
      expect(originModel.countBy("status")).toEqual({ active: 3 });
    });
  });

  describe("stampPurge", () => {
    test("sets last_purge and reports missing rows", () => {
      const origin = originModel.create(
        { name: "shop", origin_url: "https://a.example.com", cdn_url: "https://b.example.com" },
        CREATED_AT
      );

      expect(originModel.stampPurge(origin.id, "2026-01-11T00:00:00.000Z")).toBe(true);
      expect(originModel.findById(origin.id)?.last_purge).toBe("2026-01-11T00:00:00.000Z");
      expect(originModel.stampPurge(999, "2026-01-11T00:00:00.000Z")).toBe(false);
    });
  });
});
