import {
  TestKindSessionSchema,
  type SessionsConfig,
  type TestKindSessionConfig,
} from "../core/config.js";
import { ConfigError } from "../core/errors.js";

import {
  TEST_KINDS,
  type MatrixRequest,
  type PseudoVersionTargets,
  type TestKind,
  type VersionSelection,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

/** Command-line values that take precedence over the per-kind config. */
export type MatrixOverrides = {
  kinds?: string[];
  primaryVersions?: string[];
  secondaryVersions?: string[];
  minVersion?: string;
  maxVersion?: string;
  localOnly?: boolean;
};

export type MatrixEnvironment = {
  localVersions: string[];
  availablePrimaryVersions: string[];
  inCi: boolean;
  pseudoVersionTargets?: PseudoVersionTargets;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function isTestKind(value: string): value is TestKind {
  return TEST_KINDS.some((kind) => kind === value);
}

/**
 * Builds one request per selected test kind. Without explicit kinds, every kind
 * with a config section is selected; an explicit kind without one uses defaults.
 */
export function buildMatrixRequests(
  sessions: SessionsConfig,
  overrides: MatrixOverrides,
  environment: MatrixEnvironment,
): MatrixRequest[] {
  return selectKinds(sessions, overrides.kinds).map((kind) =>
    buildMatrixRequest(kind, sessions[kind] ?? TestKindSessionSchema.parse({}), overrides, environment),
  );
}

export function buildMatrixRequest(
  kind: TestKind,
  config: TestKindSessionConfig,
  overrides: MatrixOverrides,
  environment: MatrixEnvironment,
): MatrixRequest {
  return {
    testKind: kind,
    primaryVersions: pickSelection(overrides.primaryVersions, config.primary),
    secondaryVersions: pickSelection(overrides.secondaryVersions, config.secondary),
    localVersions: environment.localVersions,
    minSecondaryVersion: overrides.minVersion ?? config.min_version,
    maxSecondaryVersion: overrides.maxVersion ?? config.max_version,
    exceptSecondaryVersions: config.except_versions,
    availablePrimaryVersions: environment.availablePrimaryVersions,
    localOnly: overrides.localOnly || config.local_only,
    inCi: environment.inCi,
    includeDevel: config.include_devel,
    includeMilestone: config.include_milestone,
    develLikeBranches: config.add_devel_like_branches.map((branch) => ({ ...branch })),
    pseudoVersionTargets: environment.pseudoVersionTargets,
    controllerVersionsOnly: config.controller_versions_only,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function selectKinds(sessions: SessionsConfig, requested: string[] | undefined): TestKind[] {
  if (!requested || requested.length === 0) {
    return TEST_KINDS.filter((kind) => sessions[kind] !== undefined);
  }

  const selected = new Set<TestKind>();
  for (const value of requested) {
    if (!isTestKind(value)) {
      throw new ConfigError(
        `Unknown test kind "${value}". Expected one of: ${TEST_KINDS.join(", ")}.`,
      );
    }
    selected.add(value);
  }
  return TEST_KINDS.filter((kind) => selected.has(kind));
}

function pickSelection(
  override: string[] | undefined,
  configured: VersionSelection,
): VersionSelection {
  if (!override || override.length === 0) {
    return configured;
  }
  return override.includes("all") ? "all" : override;
}
