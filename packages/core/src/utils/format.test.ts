import { describe, test, expect } from "vitest";
import { shortTimestamp, statusTone, ttlLabel } from "./format";

describe("ttlLabel", () => {
  test("uses the largest whole unit", () => {
    expect(ttlLabel(45)).toBe("45s");
    expect(ttlLabel(120)).toBe("2m");
    expect(ttlLabel(7200)).toBe("2h");
    expect(ttlLabel(172800)).toBe("2d");
  });

  test("drops remainders at each boundary", () => {
    expect(ttlLabel(0)).toBe("0s");
    expect(ttlLabel(59)).toBe("59s");
    expect(ttlLabel(60)).toBe("1m");
    expect(ttlLabel(3599)).toBe("59m");
    expect(ttlLabel(3600)).toBe("1h");
    expect(ttlLabel(86399)).toBe("23h");
    expect(ttlLabel(86400)).toBe("1d");
    expect(ttlLabel(200000)).toBe("2d");
  });
});

describe("statusTone", () => {
  test("maps known statuses", () => {
    expect(statusTone("active")).toBe("healthy");
    expect(statusTone("error")).toBe("alarm");
    expect(statusTone("paused")).toBe("warning");
  });

  test("anything else is neutral", () => {
    expect(statusTone("retired")).toBe("neutral");
  });
});

describe("shortTimestamp", () => {
  test("keeps date and time to the second", () => {
    expect(shortTimestamp("2026-05-01T12:00:05.123Z")).toBe("2026-05-01 12:00:05");
  });
});
