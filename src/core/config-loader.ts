import fs from "node:fs";
import path from "node:path";

import { parse, YAMLParseError } from "yaml";

import { formatConfigIssues, ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

const CONFIG_HINT = "Run `collection-qa init` to create a starter config, or pass --config <path>.";

export function loadProjectConfig(configPath: string): ProjectConfig {
  const resolvedPath = path.resolve(configPath);
  if (!fs.existsSync(resolvedPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No config file at ${resolvedPath}.`,
      hint: CONFIG_HINT,
    });
  }

  const raw = fs.readFileSync(resolvedPath, "utf8");
  return parseProjectConfig(raw, resolvedPath);
}

export function parseProjectConfig(raw: string, source: string): ProjectConfig {
  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    const detail = err instanceof YAMLParseError ? err.message : String(err);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config is not valid YAML.",
      message: `${source}: ${detail}`,
      hint: "Fix the YAML syntax and rerun.",
      cause: err,
    });
  }

  // An empty file parses to null; treat it as an empty mapping.
  const parsed = ProjectConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `${source}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      hint: "Version numbers must be quoted strings such as \"3.10\".",
      cause: parsed.error,
    });
  }

  return parsed.data;
}
