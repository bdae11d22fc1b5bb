import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const REPO_CONFIG_DIR = ".collection-qa";
const REPO_CONFIG_FILE = "config.yaml";
const DATA_DIR = "data";

export type ConfigSource = "explicit" | "repo" | "cwd";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const repoRoot = findRepoRoot(cwd);
  if (repoRoot) {
    return { configPath: repoConfigPath(repoRoot), source: "repo" };
  }

  return { configPath: repoConfigPath(path.resolve(cwd)), source: "cwd" };
}

export function initRepoConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const root = findRepoRoot(cwd) ?? path.resolve(cwd);
  const configPath = repoConfigPath(root);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, buildDefaultConfig(), "utf8");
  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

export function findRepoRoot(startDir: string): string | null {
  return findUp(startDir, (dir) => fs.existsSync(path.join(dir, ".git")));
}

/** Locates a file shipped in the package's data/ directory, from sources or from dist/. */
export function resolveDataFile(fileName: string): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const root = findUp(moduleDir, (dir) => fs.existsSync(path.join(dir, DATA_DIR, fileName)));
  if (!root) {
    throw new Error(`Data file ${fileName} not found above ${moduleDir}.`);
  }
  return path.join(root, DATA_DIR, fileName);
}

function repoConfigPath(root: string): string {
  return path.join(root, REPO_CONFIG_DIR, REPO_CONFIG_FILE);
}

function buildDefaultConfig(): string {
  return [
    "# Auto-generated collection-qa config. Update as needed.",
    "# Omit `compatibility` to use the built-in table (see `collection-qa table`).",
    "",
    "sessions:",
    "  lint:",
    "    default: true",
    "    formatters: true",
    "    codeqa: true",
    "    yamllint: false",
    "    typing: true",
    "  docs_check:",
    "    default: true",
    "  license_check:",
    "    default: true",
    "  extra_checks:",
    "    default: true",
    "    action_groups: []",
    "  build_import_check:",
    "    default: true",
    "  sanity:",
    "    default: false",
    "  units:",
    "    default: false",
    "",
  ].join("\n");
}

function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
