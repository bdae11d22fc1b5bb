import { execa } from "execa";

import type { LocalDetectionConfig } from "../core/config.js";

const VERSION_PLACEHOLDER = "{version}";

export const DEFAULT_LOCAL_DETECTION: LocalDetectionConfig = {
  command: "python{version}",
  args: ["--version"],
  timeout_seconds: 10,
};

export type DetectionResult = {
  version: string;
  available: boolean;
  detail: string;
};

// =============================================================================
// ENVIRONMENT
// =============================================================================

export function detectCi(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.CI?.trim().toLowerCase();
  return value === "true" || value === "1";
}

// =============================================================================
// DETECTION
// =============================================================================

/**
 * Runs the detection command once per candidate version, substituting `{version}`
 * in the command and its arguments. A version counts as installed when the
 * command exits 0. Results keep the order of `versions`.
 */
export async function detectLocalVersions(
  versions: readonly string[],
  detection: LocalDetectionConfig = DEFAULT_LOCAL_DETECTION,
): Promise<DetectionResult[]> {
  return Promise.all(versions.map((version) => detectVersion(version, detection)));
}

export async function findAvailableVersions(
  versions: readonly string[],
  detection: LocalDetectionConfig = DEFAULT_LOCAL_DETECTION,
): Promise<string[]> {
  const results = await detectLocalVersions(versions, detection);
  return results.filter((result) => result.available).map((result) => result.version);
}

async function detectVersion(
  version: string,
  detection: LocalDetectionConfig,
): Promise<DetectionResult> {
  const command = substitute(detection.command, version);
  const args = detection.args.map((arg) => substitute(arg, version));

  const result = await execa(command, args, {
    stdio: "pipe",
    reject: false,
    timeout: detection.timeout_seconds * 1000,
  });

  if (!result.failed && result.exitCode === 0) {
    const output = `${result.stdout}${result.stderr}`.trim();
    return { version, available: true, detail: output.length > 0 ? output : command };
  }

  return { version, available: false, detail: describeFailure(command, result) };
}

function describeFailure(
  command: string,
  result: { timedOut: boolean; exitCode?: number },
): string {
  if (result.timedOut) {
    return `${command} timed out`;
  }
  // exitCode is unset when the command could not be spawned.
  return typeof result.exitCode === "number"
    ? `${command} exited with code ${result.exitCode}`
    : `${command} could not be started`;
}

function substitute(value: string, version: string): string {
  return value.split(VERSION_PLACEHOLDER).join(version);
}
