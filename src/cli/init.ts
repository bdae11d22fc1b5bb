import type { Command } from "commander";

import { initRepoConfig } from "../core/config-discovery.js";

import { runCommandAction } from "./output.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Write a starter config to .collection-qa/config.yaml")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force?: boolean }, command: Command) => {
      await runCommandAction(command, () => initCommand(opts));
    });
}

export function initCommand(opts: { force?: boolean; cwd?: string }): void {
  const result = initRepoConfig({ cwd: opts.cwd ?? process.cwd(), force: opts.force });

  if (result.status === "created") {
    console.log(`Created collection-qa config at ${result.configPath}`);
    console.log(`Edit ${result.configPath} to enable sessions and test kinds.`);
    return;
  }

  if (result.status === "overwritten") {
    console.log(`Overwrote collection-qa config at ${result.configPath}`);
    return;
  }

  console.log(`Config already exists at ${result.configPath}`);
}
