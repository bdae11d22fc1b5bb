import fs from "node:fs";

import {
  BuiltInTableSchema,
  formatConfigIssues,
  type CompatibilityEntryConfig,
} from "../core/config.js";
import { resolveDataFile } from "../core/config-discovery.js";
import { ConfigError } from "../core/errors.js";

import type { CompatibilityEntry, PseudoVersionTargets } from "./types.js";
import { compareVersions, normalizeVersion, sortVersions } from "./version.js";

const DEFAULT_TABLE_FILE = "compatibility.json";

/**
 * Validated compatibility table: primaries ascending and unique, secondaries
 * ascending, canonical and non-empty unless the entry is controller-only.
 * Controller lists are canonical subsets of their entry's secondaries.
 */
export type CompatibilityTable = {
  entries: readonly CompatibilityEntry[];
  byPrimary: ReadonlyMap<string, CompatibilityEntry>;
};

export function createCompatibilityTable(entries: readonly CompatibilityEntry[]): CompatibilityTable {
  const byPrimary = new Map<string, CompatibilityEntry>();

  for (const entry of entries) {
    const primaryVersion = normalizeVersion(entry.primaryVersion);
    if (byPrimary.has(primaryVersion)) {
      throw new ConfigError(`Primary version ${primaryVersion} is declared more than once.`);
    }

    const secondaryVersions = sortVersions(entry.secondaryVersions);
    if (secondaryVersions.length === 0 && !entry.controllerOnly) {
      throw new ConfigError(
        `Primary version ${primaryVersion} declares no secondary versions and is not controller-only.`,
      );
    }

    const normalized: CompatibilityEntry = {
      primaryVersion,
      secondaryVersions,
      controllerOnly: entry.controllerOnly,
    };
    if (entry.controllerVersions) {
      normalized.controllerVersions = validateControllerVersions(normalized, entry.controllerVersions);
    }
    byPrimary.set(primaryVersion, normalized);
  }

  const sorted = Array.from(byPrimary.values()).sort((a, b) =>
    compareVersions(a.primaryVersion, b.primaryVersion),
  );

  return { entries: sorted, byPrimary: new Map(sorted.map((e) => [e.primaryVersion, e])) };
}

/** Secondaries whose controller runs on the entry's primary. */
export function controllerSecondaries(entry: CompatibilityEntry): readonly string[] {
  return entry.controllerVersions ?? entry.secondaryVersions;
}

export function fromCompatibilityConfig(
  entries: readonly CompatibilityEntryConfig[],
): CompatibilityEntry[] {
  return entries.map((entry) => {
    const converted: CompatibilityEntry = {
      primaryVersion: entry.primary,
      secondaryVersions: entry.secondary,
      controllerOnly: entry.controller_only,
    };
    if (entry.controller) {
      converted.controllerVersions = entry.controller;
    }
    return converted;
  });
}

export type CompatibilitySource = {
  entries: CompatibilityEntry[];
  pseudoVersionTargets: PseudoVersionTargets;
};

export function loadBuiltInTable(filePath?: string): CompatibilitySource {
  const resolved = filePath ?? resolveDataFile(DEFAULT_TABLE_FILE);
  const parsed = BuiltInTableSchema.safeParse(JSON.parse(fs.readFileSync(resolved, "utf8")));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid compatibility table ${resolved}: ${formatConfigIssues(parsed.error.issues).join("; ")}`,
      parsed.error,
    );
  }
  return {
    entries: fromCompatibilityConfig(parsed.data.entries),
    pseudoVersionTargets: {
      devel: normalizeVersion(parsed.data.devel),
      milestone: normalizeVersion(parsed.data.milestone),
    },
  };
}

function validateControllerVersions(
  entry: CompatibilityEntry,
  controllerVersions: readonly string[],
): string[] {
  if (entry.controllerOnly) {
    throw new ConfigError(
      `Primary version ${entry.primaryVersion} is controller-only and cannot narrow its controller versions.`,
    );
  }

  const normalized = sortVersions(controllerVersions);
  const unknown = normalized.filter((version) => !entry.secondaryVersions.includes(version));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Primary version ${entry.primaryVersion} lists controller versions that are not secondaries: ${unknown.join(", ")}.`,
    );
  }
  return normalized;
}
