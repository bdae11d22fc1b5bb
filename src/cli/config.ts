import path from "node:path";

import type { Command } from "commander";

import type { ProjectConfig } from "../core/config.js";
import { resolveProjectConfigPath, type ConfigSource } from "../core/config-discovery.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { JsonlLogger } from "../core/logger.js";
import { fromCompatibilityConfig, loadBuiltInTable, type CompatibilitySource } from "../matrix/compatibility.js";
import { normalizeVersion } from "../matrix/version.js";

export type GlobalOptions = {
  config?: string;
  logFile?: string;
  debug?: boolean;
};

export type CommandContext = {
  config: ProjectConfig;
  configPath: string;
  configSource: ConfigSource;
  logger?: JsonlLogger;
  debug: boolean;
};

export function readGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function loadConfigForCli(args: { explicitConfigPath?: string; cwd?: string }): {
  config: ProjectConfig;
  configPath: string;
  configSource: ConfigSource;
} {
  const resolved = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd ?? process.cwd(),
  });

  const config = loadProjectConfig(resolved.configPath);
  return { config, configPath: resolved.configPath, configSource: resolved.source };
}

export function createCommandContext(command: Command, commandName: string): CommandContext {
  const opts = readGlobalOptions(command);
  const loaded = loadConfigForCli({ explicitConfigPath: opts.config });
  const logger = opts.logFile
    ? new JsonlLogger(path.resolve(opts.logFile), { command: commandName })
    : undefined;

  logger?.log({
    type: "config.loaded",
    payload: { path: loaded.configPath, source: loaded.configSource },
  });

  return { ...loaded, logger, debug: opts.debug ?? false };
}

/**
 * The project's own table when declared, otherwise the built-in one. Pseudo
 * version targets the project leaves out come from the built-in table.
 */
export function resolveCompatibility(config: ProjectConfig): CompatibilitySource {
  const declared = config.pseudo_versions ?? {};
  if (config.compatibility && declared.devel && declared.milestone) {
    return {
      entries: fromCompatibilityConfig(config.compatibility),
      pseudoVersionTargets: {
        devel: normalizeVersion(declared.devel),
        milestone: normalizeVersion(declared.milestone),
      },
    };
  }

  const builtIn = loadBuiltInTable();
  return {
    entries: config.compatibility ? fromCompatibilityConfig(config.compatibility) : builtIn.entries,
    pseudoVersionTargets: {
      devel: declared.devel ? normalizeVersion(declared.devel) : builtIn.pseudoVersionTargets.devel,
      milestone: declared.milestone
        ? normalizeVersion(declared.milestone)
        : builtIn.pseudoVersionTargets.milestone,
    },
  };
}
