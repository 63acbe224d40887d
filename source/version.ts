import { VersionFormatError } from "./errors.ts";

export type VersionValue = readonly number[];

const COMPONENT_PATTERN = /^\d+$/;

/**
 * Integer tuple of a dotted version string: "10.0.0" -> [10, 0, 0].
 * Throws VersionFormatError for empty or non-numeric components.
 */
export function parseVersion(version: string): VersionValue {
  const parts = version.split(".");
  const value: number[] = [];
  for (const part of parts) {
    if (!COMPONENT_PATTERN.test(part)) {
      throw new VersionFormatError(version);
    }
    value.push(Number.parseInt(part, 10));
  }
  return value;
}

export function isVersionString(version: string): boolean {
  return version.split(".").every((part) => COMPONENT_PATTERN.test(part));
}

/**
 * Lexicographic comparison of integer tuples. Missing trailing components
 * count as zero, so "8.0" and "8.0.0" compare equal.
 */
export function compareValues(a: VersionValue, b: VersionValue): number {
  const len = Math.max(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return 0;
}

/** Numeric order; numerically equal spellings fall back to string order. */
export function compareVersions(a: string, b: string): number {
  const byValue = compareValues(parseVersion(a), parseVersion(b));
  if (byValue !== 0) {
    return byValue;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortVersions(versions: Iterable<string>): string[] {
  return [...versions].sort(compareVersions);
}
