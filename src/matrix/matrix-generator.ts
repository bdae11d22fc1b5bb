/*
Purpose: compute the CI test matrix from a compatibility table and a per-kind request.
Assumptions: pure and synchronous; identical input yields identical output, order included.
Usage: generateMatrix(table, { testKind: "units", primaryVersions: "all", secondaryVersions: "all" }).
*/

import { ConfigError, UnknownVersionError } from "../core/errors.js";

import {
  controllerSecondaries,
  createCompatibilityTable,
  type CompatibilityTable,
} from "./compatibility.js";
import { createVersionFilter } from "./supported-versions.js";
import {
  TEST_KINDS,
  type CompatibilityEntry,
  type DevelLikeBranch,
  type MatrixDocument,
  type MatrixEntry,
  type MatrixRequest,
  type TestKind,
} from "./types.js";
import {
  compareSecondaryLabels,
  isPseudoVersion,
  normalizeVersion,
  type PseudoVersion,
} from "./version.js";

export const NO_COMPATIBLE_VERSIONS_REASON = "no compatible versions for requested constraints";

// =============================================================================
// PUBLIC API
// =============================================================================

export function generateMatrix(
  entries: readonly CompatibilityEntry[],
  request: MatrixRequest,
): MatrixEntry[] {
  const table = createCompatibilityTable(entries);
  const primaries = resolvePrimaryVersions(table, request.primaryVersions);
  const requestedSecondaries =
    request.secondaryVersions === "all" ? "all" : toVersionSet(request.secondaryVersions);
  const localVersions = request.inCi ? new Set<string>() : toVersionSet(request.localVersions ?? []);
  const excepted = request.exceptSecondaryVersions ?? [];
  const inBounds = createVersionFilter({
    minVersion: request.minSecondaryVersion,
    maxVersion: request.maxSecondaryVersion,
    exceptVersions: excepted.filter((version) => !isPseudoVersion(version.trim())),
  });
  const moving = resolveMovingTargets(request, new Set(excepted.map((version) => version.trim())));
  const availability = resolveAvailability(request);

  const candidates: MatrixEntry[] = [];
  for (const primary of primaries) {
    const secondaries = selectSecondaries(table, primary, request);
    const skipReason = availability(primary);

    for (const secondary of secondaries) {
      if (requestedSecondaries !== "all" && !requestedSecondaries.has(secondary)) continue;
      if (!inBounds(secondary)) continue;
      candidates.push(createEntry(request.testKind, primary, secondary, skipReason));
    }

    // Local extension: versions valid for this primary even when not requested.
    for (const secondary of secondaries) {
      if (!localVersions.has(secondary) || !inBounds(secondary)) continue;
      candidates.push(createEntry(request.testKind, primary, secondary, skipReason));
    }

    // Pseudo versions and development branches follow the release they stand for.
    for (const target of moving) {
      if (!secondaries.includes(target.release)) continue;
      candidates.push(createEntry(request.testKind, primary, target.label, skipReason));
    }
  }

  const matrix = sortMatrixEntries(dedupeMatrixEntries(candidates));
  if (matrix.length === 0) {
    return [createPlaceholderEntry(request.testKind)];
  }
  return matrix;
}

/** One matrix per requested kind, keyed in sanity/units/integration order. */
export function generateMatrices(
  entries: readonly CompatibilityEntry[],
  requests: readonly MatrixRequest[],
): MatrixDocument {
  const byKind = new Map<TestKind, MatrixRequest>();
  for (const request of requests) {
    if (byKind.has(request.testKind)) {
      throw new ConfigError(`More than one matrix request for test kind "${request.testKind}".`);
    }
    byKind.set(request.testKind, request);
  }

  const document: MatrixDocument = {};
  for (const kind of TEST_KINDS) {
    const request = byKind.get(kind);
    if (request) {
      document[kind] = generateMatrix(entries, request);
    }
  }
  return document;
}

/**
 * Keeps one entry per (test_kind, primary, secondary), preserving first-seen
 * order. On collision an entry without a skip reason replaces one that has one.
 */
export function dedupeMatrixEntries(entries: readonly MatrixEntry[]): MatrixEntry[] {
  const byKey = new Map<string, MatrixEntry>();
  for (const entry of entries) {
    const key = matrixEntryKey(entry);
    const existing = byKey.get(key);
    if (!existing || (existing.skip_reason !== null && entry.skip_reason === null)) {
      byKey.set(key, entry);
    }
  }
  return Array.from(byKey.values());
}

/** Primary ascending, then secondary: releases ascending, `milestone`, `devel`, branches. */
export function sortMatrixEntries(entries: readonly MatrixEntry[]): MatrixEntry[] {
  return [...entries].sort(
    (a, b) =>
      compareNullable(a.primary_version, b.primary_version) ||
      compareNullable(a.secondary_version, b.secondary_version),
  );
}

/** Secondary label of a development branch: `<repository>-<branch>` with `/` replaced by `-`. */
export function develLikeBranchLabel(branch: DevelLikeBranch): string {
  const prefix = branch.repository === null ? "" : `${branch.repository.replace(/\//g, "-")}-`;
  return `${prefix}${branch.branch.replace(/\//g, "-")}`;
}

export function createPlaceholderEntry(
  testKind: TestKind,
  reason: string = NO_COMPATIBLE_VERSIONS_REASON,
): MatrixEntry {
  return {
    test_kind: testKind,
    primary_version: null,
    secondary_version: null,
    skip: true,
    skip_reason: reason,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolvePrimaryVersions(
  table: CompatibilityTable,
  selection: MatrixRequest["primaryVersions"],
): string[] {
  if (selection === "all") {
    return table.entries.map((entry) => entry.primaryVersion);
  }

  const requested = toVersionSet(selection);
  const unknown = Array.from(requested).filter((version) => !table.byPrimary.has(version));
  if (unknown.length > 0) {
    throw new UnknownVersionError(unknown[0] ?? "", "primary");
  }

  return table.entries
    .map((entry) => entry.primaryVersion)
    .filter((version) => requested.has(version));
}

/** Sanity and units need a controller on the primary; integration may target it remotely. */
function selectSecondaries(
  table: CompatibilityTable,
  primary: string,
  request: MatrixRequest,
): readonly string[] {
  const entry = table.byPrimary.get(primary);
  if (!entry) return [];
  if (request.testKind === "integration" && !request.controllerVersionsOnly) {
    return entry.secondaryVersions;
  }
  return controllerSecondaries(entry);
}

type MovingTarget = { label: string; release: string };

function resolveMovingTargets(
  request: MatrixRequest,
  excepted: ReadonlySet<string>,
): MovingTarget[] {
  const wanted: { label: string; pseudo: PseudoVersion }[] = [];
  if (request.includeMilestone && !excepted.has("milestone")) {
    wanted.push({ label: "milestone", pseudo: "milestone" });
  }
  if (request.includeDevel && !excepted.has("devel")) {
    wanted.push({ label: "devel", pseudo: "devel" });
  }
  for (const branch of request.develLikeBranches ?? []) {
    wanted.push({ label: develLikeBranchLabel(branch), pseudo: "devel" });
  }
  if (wanted.length === 0) {
    return [];
  }

  const targets = request.pseudoVersionTargets;
  if (!targets) {
    throw new ConfigError(
      `Test kind "${request.testKind}" requests ${wanted[0]?.label ?? "devel"} but no release is configured for the pseudo versions.`,
    );
  }
  return wanted.map(({ label, pseudo }) => ({ label, release: normalizeVersion(targets[pseudo]) }));
}

function resolveAvailability(request: MatrixRequest): (primary: string) => string | null {
  if (!request.localOnly || request.inCi) {
    return () => null;
  }

  const available = toVersionSet(request.availablePrimaryVersions ?? []);
  return (primary) =>
    available.has(primary) ? null : `primary version ${primary} is not available locally`;
}

function toVersionSet(values: readonly string[]): Set<string> {
  return new Set(values.map(normalizeVersion));
}

function createEntry(
  testKind: TestKind,
  primary: string,
  secondary: string,
  skipReason: string | null,
): MatrixEntry {
  return {
    test_kind: testKind,
    primary_version: primary,
    secondary_version: secondary,
    skip: skipReason !== null,
    skip_reason: skipReason,
  };
}

function matrixEntryKey(entry: MatrixEntry): string {
  return `${entry.test_kind}|${entry.primary_version ?? "-"}|${entry.secondary_version ?? "-"}`;
}

function compareNullable(left: string | null, right: string | null): number {
  if (left === right) return 0;
  if (left === null) return -1;
  if (right === null) return 1;
  return compareSecondaryLabels(left, right);
}
