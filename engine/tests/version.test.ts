/**
 * Compile-CAR Engine -- Version Utility Tests
 */

import { describe, it, expect } from "vitest";
import {
  parseVersion,
  formatVersion,
  compareVersions,
  isVersionAtLeast,
} from "../src/utils/version";

// ────────────────────────────────────────────────────────────────
// parseVersion / formatVersion
// ────────────────────────────────────────────────────────────────

describe("parseVersion", () => {
  it("splits a two-part version", () => {
    expect(parseVersion("26.0")).toEqual([26, 0]);
  });

  it("accepts a single component", () => {
    expect(parseVersion("27")).toEqual([27]);
  });

  it("accepts more than three components", () => {
    expect(parseVersion("26.0.1.4")).toEqual([26, 0, 1, 4]);
  });

  it("trims surrounding whitespace", () => {
    expect(parseVersion(" 26.1\n")).toEqual([26, 1]);
  });

  it("rejects empty components", () => {
    expect(parseVersion("26..1")).toBeNull();
    expect(parseVersion("")).toBeNull();
  });

  it("rejects signs and letters", () => {
    expect(parseVersion("-1.0")).toBeNull();
    expect(parseVersion("26.0b1")).toBeNull();
    expect(parseVersion("v26.0")).toBeNull();
  });
});

describe("formatVersion", () => {
  it("joins components with dots", () => {
    expect(formatVersion([26, 0, 1])).toBe("26.0.1");
  });

  it.each(["26.0", "25.3", "1.12", "100.7"])(
    "round-trips %s through parse and format",
    (input) => {
      const parsed = parseVersion(input);
      expect(parsed).not.toBeNull();
      expect(formatVersion(parsed ?? [])).toBe(input);
    },
  );
});

// ────────────────────────────────────────────────────────────────
// compareVersions
// ────────────────────────────────────────────────────────────────

describe("compareVersions", () => {
  it("returns 0 for equal versions", () => {
    expect(compareVersions([26, 0], [26, 0])).toBe(0);
  });

  it("orders by the first differing component", () => {
    expect(compareVersions([25, 9], [26, 0])).toBe(-1);
    expect(compareVersions([26, 1], [26, 0])).toBe(1);
  });

  it("compares numerically, not lexically", () => {
    expect(compareVersions([26, 10], [26, 9])).toBe(1);
  });

  it("orders a prefix before the longer version", () => {
    expect(compareVersions([26], [26, 1])).toBe(-1);
    expect(compareVersions([26], [26, 0])).toBe(-1);
    expect(compareVersions([26, 0, 1], [26])).toBe(1);
  });

  it("lets an earlier component outweigh a longer tail", () => {
    expect(compareVersions([27], [26, 0, 1])).toBe(1);
  });
});

describe("isVersionAtLeast", () => {
  it("accepts equal and newer versions", () => {
    expect(isVersionAtLeast([26, 0], [26, 0])).toBe(true);
    expect(isVersionAtLeast([27, 0], [26, 0])).toBe(true);
  });

  it("rejects older versions", () => {
    expect(isVersionAtLeast([25, 3], [26, 0])).toBe(false);
    expect(isVersionAtLeast([26], [26, 0])).toBe(false);
  });
});
