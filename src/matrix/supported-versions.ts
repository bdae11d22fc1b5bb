import { compareVersions, normalizeVersion } from "./version.js";

export type VersionBounds = {
  minVersion?: string | null;
  maxVersion?: string | null;
  exceptVersions?: readonly string[];
};

/** Builds a predicate for inclusive min/max bounds minus an exception list. */
export function createVersionFilter(bounds: VersionBounds): (version: string) => boolean {
  const min = bounds.minVersion ? normalizeVersion(bounds.minVersion) : null;
  const max = bounds.maxVersion ? normalizeVersion(bounds.maxVersion) : null;
  const except = new Set((bounds.exceptVersions ?? []).map(normalizeVersion));

  return (version: string): boolean => {
    if (min !== null && compareVersions(version, min) < 0) return false;
    if (max !== null && compareVersions(version, max) > 0) return false;
    return !except.has(normalizeVersion(version));
  };
}

export function selectSupportedVersions(
  versions: readonly string[],
  bounds: VersionBounds,
): string[] {
  return versions.filter(createVersionFilter(bounds));
}
