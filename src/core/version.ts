// src/core/version.ts

/**
 * Version string for a platform's rolling release (Chrome, Windows)
 */
export const CURRENT_VERSION = "current";

const NUMERIC_VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;

// Numeric core, then an optional "-pre.release" and "+build" suffix
const VERSION_PATTERN =
  /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

const NUMERIC_IDENTIFIER = /^\d+$/;

/**
 * A numeric version with its pre-release identifiers; build metadata is dropped
 */
export interface ParsedVersion {
  readonly core: readonly [number, number, number];
  readonly prerelease: readonly string[];
}

export function isCurrentVersion(version: string): boolean {
  return version === CURRENT_VERSION;
}

/**
 * Parse a dotted numeric version of one to three components ("15", "17.4", "12.1.3").
 * Missing components are zero, so "15" and "15.0.0" parse identically.
 * Returns null when the string is not a numeric version.
 */
export function parseNumericVersion(version: string): [number, number, number] | null {
  const match = NUMERIC_VERSION_PATTERN.exec(version.trim());
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2] ?? 0), Number(match[3] ?? 0)];
}

/**
 * Parse a numeric version that may carry a pre-release or build suffix
 * ("17.0-beta", "16.4-rc.1", "15.0+build.7")
 */
export function parseVersion(version: string): ParsedVersion | null {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    return null;
  }
  return {
    core: [Number(match[1]), Number(match[2] ?? 0), Number(match[3] ?? 0)],
    prerelease: match[4] ? match[4].split(".") : [],
  };
}

/**
 * Compare two parsed numeric versions component-wise
 */
export function compareNumericVersions(
  a: readonly [number, number, number],
  b: readonly [number, number, number],
): -1 | 0 | 1 {
  for (let i = 0; i < 3; i++) {
    if (a[i] < b[i]) return -1;
    if (a[i] > b[i]) return 1;
  }
  return 0;
}

function comparePrereleaseIdentifiers(a: string, b: string): -1 | 0 | 1 {
  const aNumeric = NUMERIC_IDENTIFIER.test(a);
  const bNumeric = NUMERIC_IDENTIFIER.test(b);
  if (aNumeric && bNumeric) {
    const diff = Number(a) - Number(b);
    return diff < 0 ? -1 : diff > 0 ? 1 : 0;
  }
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Semantic-versioning precedence: the numeric core first, then a pre-release
 * sorts below the plain release and identifiers compare left to right
 */
export function compareParsedVersions(a: ParsedVersion, b: ParsedVersion): -1 | 0 | 1 {
  const core = compareNumericVersions(a.core, b.core);
  if (core !== 0) return core;

  if (a.prerelease.length === 0 || b.prerelease.length === 0) {
    if (a.prerelease.length === b.prerelease.length) return 0;
    return a.prerelease.length === 0 ? 1 : -1;
  }

  const shared = Math.min(a.prerelease.length, b.prerelease.length);
  for (let i = 0; i < shared; i++) {
    const cmp = comparePrereleaseIdentifiers(a.prerelease[i], b.prerelease[i]);
    if (cmp !== 0) return cmp;
  }
  if (a.prerelease.length === b.prerelease.length) return 0;
  return a.prerelease.length < b.prerelease.length ? -1 : 1;
}

/**
 * Total ordering over version strings.
 *
 * "current" sorts after everything else and equals only itself. Numeric versions,
 * with or without a pre-release or build suffix, follow semantic-versioning
 * precedence and sort before strings that are not versions; two such strings
 * compare lexicographically.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const aCurrent = isCurrentVersion(a);
  const bCurrent = isCurrentVersion(b);
  if (aCurrent && bCurrent) return 0;
  if (aCurrent) return 1;
  if (bCurrent) return -1;

  const va = parseVersion(a);
  const vb = parseVersion(b);
  if (va && vb) {
    return compareParsedVersions(va, vb);
  }
  if (va) return -1;
  if (vb) return 1;

  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
