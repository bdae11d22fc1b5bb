import type { SessionsConfig } from "../core/config.js";
import { TEST_KINDS, type MatrixDocument, type MatrixEntry, type TestKind } from "../matrix/types.js";

import type { Session } from "./types.js";

// =============================================================================
// REGISTRY CONSTRUCTION
// =============================================================================

/**
 * Derives the session registry from the project config. Declaration order is
 * lint sessions, standalone checks, test sessions, tool sessions, then custom
 * sessions; it is the tie-break order for default selection.
 */
export function buildSessionRegistry(
  config: SessionsConfig,
  matrices: MatrixDocument = {},
): Session[] {
  const registry: Session[] = [];

  if (config.lint) {
    registry.push(...buildLintSessions(config.lint));
  }
  if (config.docs_check) {
    registry.push({
      name: "docs-check",
      dependsOn: [],
      isDefault: config.docs_check.default,
      group: "docs",
      description: "Validate plugin and role documentation",
    });
  }
  if (config.license_check) {
    registry.push({
      name: "license-check",
      dependsOn: [],
      isDefault: config.license_check.default,
      group: "license",
      description: "Check license headers and license files",
    });
  }
  if (config.extra_checks) {
    registry.push({
      name: "extra-checks",
      dependsOn: [],
      isDefault: config.extra_checks.default,
      group: "extra",
      description: composeDescription("Run extra checker", [
        "no-unwanted-files",
        ...(config.extra_checks.action_groups.length > 0 ? ["action-groups"] : []),
      ]),
    });
  }
  if (config.build_import_check) {
    registry.push({
      name: "build-import-check",
      dependsOn: [],
      isDefault: config.build_import_check.default,
      group: "build",
      description: "Build the collection and run the import checker on it",
    });
  }

  for (const kind of TEST_KINDS) {
    const kindConfig = config[kind];
    if (kindConfig) {
      registry.push(...buildTestSessions(kind, kindConfig.default, matrices[kind] ?? []));
    }
  }

  if (config.ansible_lint) {
    registry.push({
      name: "ansible-lint",
      dependsOn: [],
      isDefault: config.ansible_lint.default,
      group: "codeqa",
      description: config.ansible_lint.strict ? "Run ansible-lint in strict mode" : "Run ansible-lint",
    });
  }
  if (config.ee_check) {
    registry.push(...buildEnvironmentCheckSessions(config.ee_check));
  }
  if (config.molecule) {
    registry.push({
      name: "molecule",
      dependsOn: [],
      isDefault: config.molecule.default,
      group: "tests",
      description:
        config.molecule.scenarios.length > 0
          ? composeDescription("Run molecule scenario", config.molecule.scenarios)
          : "Run molecule",
    });
  }

  for (const custom of config.custom) {
    registry.push({
      name: custom.name,
      dependsOn: [...custom.depends_on],
      isDefault: custom.default,
      group: custom.group,
      description: custom.description,
    });
  }

  return registry;
}

export function testSessionName(entry: MatrixEntry): string | null {
  if (entry.skip || entry.primary_version === null || entry.secondary_version === null) {
    return null;
  }
  return `test-${entry.test_kind}-${entry.secondary_version}-${entry.primary_version}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function buildLintSessions(lint: NonNullable<SessionsConfig["lint"]>): Session[] {
  const parts: Session[] = [];
  if (lint.formatters) {
    parts.push(component("formatters", "formatters", "Run code formatters"));
  }
  if (lint.codeqa) {
    parts.push(component("codeqa", "codeqa", "Run code quality checkers"));
  }
  if (lint.yamllint) {
    parts.push(component("yamllint", "codeqa", "Lint YAML files and embedded YAML"));
  }
  if (lint.typing) {
    parts.push(component("typing", "typing", "Run the type checker"));
  }
  if (lint.config_lint) {
    parts.push(component("config-lint", "extra", "Lint the collection-qa config"));
  }

  const names = parts.map((session) => session.name);
  const meta: Session = {
    name: "lint",
    dependsOn: names,
    isDefault: lint.default,
    group: "codeqa",
    description: composeDescription("Meta session for triggering the following session", names),
  };
  return [...parts, meta];
}

function buildTestSessions(
  kind: TestKind,
  isDefault: boolean,
  entries: readonly MatrixEntry[],
): Session[] {
  const sessions: Session[] = [];
  for (const entry of entries) {
    const name = testSessionName(entry);
    if (name === null) continue;
    sessions.push({
      name,
      dependsOn: [],
      isDefault: false,
      group: "tests",
      description: `Run ${kind} tests with secondary version ${entry.secondary_version} on primary version ${entry.primary_version}`,
    });
  }

  const meta: Session = {
    name: `test-${kind}`,
    dependsOn: sessions.map((session) => session.name),
    isDefault,
    group: "tests",
    description: `Meta session for running all test-${kind}-* sessions`,
  };
  return [...sessions, meta];
}

// One session per execution environment image, plus the `ee-check` meta session.
function buildEnvironmentCheckSessions(eeCheck: NonNullable<SessionsConfig["ee_check"]>): Session[] {
  const images = eeCheck.execution_environments.map((environment) =>
    component(
      `ee-check-${environment.name}`,
      "build",
      `Build and test execution environment image: ${environment.description}`,
    ),
  );

  const meta: Session = {
    name: "ee-check",
    dependsOn: images.map((session) => session.name),
    isDefault: eeCheck.default,
    group: "build",
    description: "Meta session for building and testing execution environment images",
  };
  return [...images, meta];
}

function component(name: string, group: Session["group"], description: string): Session {
  return { name, dependsOn: [], isDefault: false, group, description };
}

function composeDescription(prefix: string, items: readonly string[]): string {
  if (items.length === 0) {
    return `${prefix}s: (none)`;
  }
  const noun = items.length === 1 ? prefix : `${prefix}s`;
  return `${noun}: ${items.join(", ")}`;
}
