import { InvalidVersionFormatError } from "../core/errors.js";

// Versions travel through the matrix as canonical "major.minor" strings so they
// can be used directly as map keys and JSON values.

export type ParsedVersion = {
  major: number;
  minor: number;
};

/**
 * Secondary versions that name a moving target instead of a release. Each one
 * resolves to a concrete version through the compatibility table's targets.
 */
export const PSEUDO_VERSIONS = ["milestone", "devel"] as const;

export type PseudoVersion = (typeof PSEUDO_VERSIONS)[number];

const VERSION_PATTERN = /^(\d+)\.(\d+)$/;

export function parseVersion(value: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidVersionFormatError(value);
  }

  const major = Number(match[1]);
  const minor = Number(match[2]);
  // Larger components lose precision and would compare equal to their neighbours.
  if (!Number.isSafeInteger(major) || !Number.isSafeInteger(minor)) {
    throw new InvalidVersionFormatError(value);
  }

  return { major, minor };
}

export function normalizeVersion(value: string): string {
  const parsed = parseVersion(value);
  return `${parsed.major}.${parsed.minor}`;
}

export function compareVersions(left: string, right: string): number {
  const a = parseVersion(left);
  const b = parseVersion(right);
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  return a.minor - b.minor;
}

/** Canonical, ascending, duplicate-free copy of `values`. */
export function sortVersions(values: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const value of values) {
    unique.add(normalizeVersion(value));
  }
  return Array.from(unique).sort(compareVersions);
}

export function isPseudoVersion(value: string): value is PseudoVersion {
  return PSEUDO_VERSIONS.some((pseudo) => pseudo === value);
}

export function isReleaseVersion(value: string): boolean {
  return VERSION_PATTERN.test(value.trim());
}

/**
 * Orders secondary labels: releases ascending, then `milestone`, then `devel`,
 * then any other label (development branches) by name.
 */
export function compareSecondaryLabels(left: string, right: string): number {
  const leftRank = labelRank(left);
  const rightRank = labelRank(right);
  if (leftRank !== rightRank) {
    return leftRank - rightRank;
  }
  if (leftRank === 0) {
    return compareVersions(left, right);
  }
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function labelRank(label: string): number {
  if (isReleaseVersion(label)) return 0;
  if (isPseudoVersion(label)) return 1 + PSEUDO_VERSIONS.indexOf(label);
  return 1 + PSEUDO_VERSIONS.length;
}
