import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildCli } from "./index.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];
const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

beforeEach(() => {
  vi.stubEnv("CI", "false");
  vi.stubEnv("GITHUB_OUTPUT", "");
  vi.stubEnv("COLLECTION_QA_MATRIX_JSON", "");
});

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;

  logSpy.mockClear();
  errorSpy.mockClear();
  vi.unstubAllEnvs();
  process.exitCode = undefined;
});

// =============================================================================
// HELPERS
// =============================================================================

function writeConfig(lines: string[]): { dir: string; configPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "collection-qa-cli-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.yaml");
  fs.writeFileSync(configPath, `${lines.join("\n")}\n`, "utf8");
  return { dir, configPath };
}

async function runCli(args: string[]): Promise<void> {
  await buildCli().parseAsync(["node", "collection-qa", ...args]);
}

function loggedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

const TWO_PRIMARY_TABLE = [
  "compatibility:",
  "  - primary: \"3.9\"",
  "    secondary: [\"2.14\", \"2.15\"]",
  "  - primary: \"3.10\"",
  "    secondary: [\"2.15\", \"2.16\"]",
];

// =============================================================================
// TESTS
// =============================================================================

describe("collection-qa CLI", () => {
  it("prints and writes the units matrix", async () => {
    const { dir, configPath } = writeConfig([
      ...TWO_PRIMARY_TABLE,
      "sessions:",
      "  units:",
      "    default: true",
    ]);
    const jsonPath = path.join(dir, "matrix.json");

    await runCli(["--config", configPath, "matrix", "--json-output", jsonPath]);

    expect(process.exitCode).toBeUndefined();
    expect(loggedLines(logSpy)).toEqual([
      "units (4):",
      "  3.9/2.14",
      "  3.9/2.15",
      "  3.10/2.15",
      "  3.10/2.16",
    ]);
    const document = JSON.parse(fs.readFileSync(jsonPath, "utf8"));
    expect(document.units).toHaveLength(4);
    expect(document.units[0]).toEqual({
      test_kind: "units",
      primary_version: "3.9",
      secondary_version: "2.14",
      skip: false,
      skip_reason: null,
    });
  });

  it("reports unknown primary versions as matrix errors", async () => {
    const { configPath } = writeConfig([...TWO_PRIMARY_TABLE, "sessions:", "  units: {}"]);

    await runCli(["--config", configPath, "matrix", "--primary", "2.7"]);

    expect(process.exitCode).toBe(1);
    const output = loggedLines(errorSpy).join("\n");
    expect(output).toContain("Matrix generation failed.");
    expect(output).toContain('Unknown primary version "2.7"');
  });

  it("prints default sessions dependencies-first", async () => {
    const { configPath } = writeConfig(["sessions:", "  lint:", "    config_lint: false"]);

    await runCli(["--config", configPath, "sessions"]);

    expect(loggedLines(logSpy)).toEqual(["formatters", "codeqa", "typing", "lint"]);
  });

  it("fails on session cycles", async () => {
    const { configPath } = writeConfig([
      "sessions:",
      "  custom:",
      "    - { name: a, depends_on: [b] }",
      "    - { name: b, depends_on: [a] }",
    ]);

    await runCli(["--config", configPath, "sessions", "a"]);

    expect(process.exitCode).toBe(1);
    expect(loggedLines(errorSpy).join("\n")).toContain("Session dependency cycle: a -> b -> a");
  });

  it("lists action-group errors and sets the exit code", async () => {
    const { configPath } = writeConfig([
      "sessions:",
      "  extra_checks:",
      "    action_groups:",
      "      - { name: docker, pattern: docker_, required_attribute: actiongroup_docker }",
      "inventory:",
      "  - { name: docker_container, attributes: [actiongroup_docker] }",
      "  - { name: docker_image }",
    ]);

    await runCli(["--config", configPath, "action-groups"]);

    expect(process.exitCode).toBe(1);
    expect(loggedLines(logSpy)).toEqual([
      "MissingAttribute: docker_image (action group docker) does not declare actiongroup_docker",
    ]);
  });

  it("prints the effective compatibility table", async () => {
    const { configPath } = writeConfig([...TWO_PRIMARY_TABLE]);

    await runCli(["--config", configPath, "table"]);

    expect(loggedLines(logSpy)).toEqual([
      `Compatibility (${configPath}):`,
      "  3.9: 2.14, 2.15",
      "  3.10: 2.15, 2.16",
      "Pseudo versions: devel=2.19, milestone=2.19",
    ]);
  });

  it("falls back to the built-in table", async () => {
    const { configPath } = writeConfig(["sessions: {}"]);

    await runCli(["--config", configPath, "table"]);

    const lines = loggedLines(logSpy);
    expect(lines[0]).toBe("Compatibility (built-in table):");
    expect(lines[1]).toBe("  2.6: 2.9, 2.10, 2.11, 2.12 (controller: -)");
    expect(lines[2]).toBe(
      "  2.7: 2.9, 2.10, 2.11, 2.12, 2.13, 2.14, 2.15, 2.16 (controller: 2.9, 2.10, 2.11)",
    );
    expect(lines.slice(-3)).toEqual([
      "  3.15: 2.22, 2.23, 2.24, 2.25 (controller only)",
      "  3.16: 2.24, 2.25 (controller only)",
      "Pseudo versions: devel=2.19, milestone=2.19",
    ]);
  });

  it("adds devel entries resolved through the configured pseudo version", async () => {
    const { configPath } = writeConfig([
      ...TWO_PRIMARY_TABLE,
      "pseudo_versions:",
      "  devel: \"2.16\"",
      "sessions:",
      "  units:",
      "    include_devel: true",
    ]);

    await runCli(["--config", configPath, "matrix"]);

    expect(process.exitCode).toBeUndefined();
    expect(loggedLines(logSpy)).toEqual([
      "units (5):",
      "  3.9/2.14",
      "  3.9/2.15",
      "  3.10/2.15",
      "  3.10/2.16",
      "  3.10/devel",
    ]);
  });

  it("writes JSONL events when a log file is given", async () => {
    const { dir, configPath } = writeConfig([...TWO_PRIMARY_TABLE, "sessions:", "  units: {}"]);
    const logFile = path.join(dir, "logs", "events.jsonl");

    await runCli(["--config", configPath, "--log-file", logFile, "matrix"]);

    const events = fs
      .readFileSync(logFile, "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(events.map((event) => event.type)).toEqual(["config.loaded", "matrix.generated"]);
    expect(events[1].command).toBe("matrix");
    expect(events[1].payload).toEqual({ in_ci: false, kinds: ["units"], entries: 4, written: [] });
  });

  it("maps a missing config to a config error", async () => {
    const { dir } = writeConfig([]);

    await runCli(["--config", path.join(dir, "absent.yaml"), "sessions"]);

    expect(process.exitCode).toBe(1);
    expect(loggedLines(errorSpy).join("\n")).toContain("Project config missing.");
  });
});
