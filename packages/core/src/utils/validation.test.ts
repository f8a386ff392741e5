import { describe, test, expect } from "vitest";
import { ValidationError } from "../database/errors";
import { requireId, requireOneOf, requireString, requireTtl } from "./validation";

describe("validation helpers", () => {
  test("requireString trims and rejects blanks", () => {
    expect(requireString("  shop ", "name")).toBe("shop");
    expect(() => requireString("", "name")).toThrow("name is required and cannot be empty");
    expect(() => requireString(undefined, "name")).toThrow(ValidationError);
  });

  test("requireTtl accepts zero and falls back when absent", () => {
    expect(requireTtl(0, "ttl", 3600)).toBe(0);
    expect(requireTtl(undefined, "ttl", 3600)).toBe(3600);
    expect(() => requireTtl(1.5, "ttl", 3600)).toThrow("ttl must be a non-negative integer (got 1.5)");
  });

  test("requireTtl rejects integers past the safe range", () => {
    expect(requireTtl(Number.MAX_SAFE_INTEGER, "ttl", 3600)).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => requireTtl(1e300, "ttl", 3600)).toThrow("ttl must be a non-negative integer (got 1e+300)");
    expect(() => requireTtl(9007199254740993, "ttl", 3600)).toThrow(ValidationError);
  });

  test("requireId wants a positive integer", () => {
    expect(requireId(3, "origin_id")).toBe(3);
    expect(() => requireId(0, "origin_id")).toThrow(ValidationError);
    expect(() => requireId(Number.NaN, "origin_id")).toThrow(ValidationError);
    expect(() => requireId(2 ** 60, "origin_id")).toThrow(ValidationError);
  });

  test("requireOneOf narrows to the allowed set", () => {
    const allowed = ["full", "path", "tag"] as const;
    expect(requireOneOf("tag", allowed, "purge_type", "full")).toBe("tag");
    expect(requireOneOf(undefined, allowed, "purge_type", "full")).toBe("full");
    expect(() => requireOneOf("all", allowed, "purge_type", "full")).toThrow(
      'purge_type must be one of full, path, tag (got "all")'
    );
  });
});
