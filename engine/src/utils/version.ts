/**
 * Compile-CAR Engine — Version Utilities
 *
 * actool reports versions like "26.0" or "26.0.1". These are compared as
 * plain integer tuples, not as semver: any number of components, and a
 * version that is a prefix of another sorts first ("26" < "26.0").
 */

import type { Version } from "../types";

/**
 * Parse a dotted version string into its integer components.
 * Returns null if any component is not a run of digits.
 *
 *   "26.0"   → [26, 0]
 *   "27"     → [27]
 *   "26..1"  → null
 */
export function parseVersion(version: string): Version | null {
  const parts = version.trim().split(".");
  if (!parts.every((part) => /^\d+$/.test(part))) return null;
  return parts.map((part) => parseInt(part, 10));
}

export function formatVersion(version: Version): string {
  return version.join(".");
}

/**
 * Compare two versions component by component, left to right.
 * When one runs out first, the shorter version is the smaller one.
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    if (a[i] !== b[i]) return a[i] > b[i] ? 1 : -1;
  }
  if (a.length === b.length) return 0;
  return a.length > b.length ? 1 : -1;
}

export function isVersionAtLeast(version: Version, minimum: Version): boolean {
  return compareVersions(version, minimum) >= 0;
}
