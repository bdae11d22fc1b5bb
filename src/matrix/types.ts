// Matrix types.
// Request and table types are in-memory shapes; MatrixEntry is also the CI wire format,
// so its fields use snake_case.

import type { PseudoVersion } from "./version.js";

export const TEST_KINDS = ["sanity", "units", "integration"] as const;

export type TestKind = (typeof TEST_KINDS)[number];

/**
 * `secondaryVersions` lists every secondary that supports the primary.
 * `controllerVersions` narrows that to the secondaries that can also run their
 * controller on it; when absent, all of them can. A controller-only entry has
 * no remote-only secondaries.
 */
export type CompatibilityEntry = {
  primaryVersion: string;
  secondaryVersions: string[];
  controllerOnly: boolean;
  controllerVersions?: string[];
};

/** The release each pseudo version stands for. */
export type PseudoVersionTargets = Record<PseudoVersion, string>;

/** A development branch tested like `devel`; `repository` defaults to the upstream one. */
export type DevelLikeBranch = {
  repository: string | null;
  branch: string;
};

export type VersionSelection = "all" | string[];

export type MatrixRequest = {
  testKind: TestKind;
  primaryVersions: VersionSelection;
  secondaryVersions: VersionSelection;
  /** Secondary versions found in the local environment; extend coverage outside CI. */
  localVersions?: string[];
  minSecondaryVersion?: string | null;
  maxSecondaryVersion?: string | null;
  exceptSecondaryVersions?: string[];
  /** Primary versions installed locally. Only consulted when `localOnly` is set. */
  availablePrimaryVersions?: string[];
  localOnly?: boolean;
  /** In CI the matrix depends on the table alone: local versions and `localOnly` are ignored. */
  inCi?: boolean;
  includeDevel?: boolean;
  includeMilestone?: boolean;
  develLikeBranches?: DevelLikeBranch[];
  /** Required when any pseudo version or development branch is requested. */
  pseudoVersionTargets?: PseudoVersionTargets;
  /** Integration only: restrict to secondaries that run their controller on the primary. */
  controllerVersionsOnly?: boolean;
};

export type MatrixEntry = {
  test_kind: TestKind;
  primary_version: string | null;
  secondary_version: string | null;
  skip: boolean;
  skip_reason: string | null;
};

export type MatrixDocument = Partial<Record<TestKind, MatrixEntry[]>>;
