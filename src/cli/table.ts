import type { Command } from "commander";

import { createCompatibilityTable } from "../matrix/compatibility.js";
import type { CompatibilityEntry } from "../matrix/types.js";

import { createCommandContext, resolveCompatibility, type CommandContext } from "./config.js";
import { runCommandAction } from "./output.js";

export function registerTableCommand(program: Command): void {
  program
    .command("table")
    .description("Print the effective version compatibility table")
    .action(async (_opts, command: Command) => {
      await runCommandAction(command, () => {
        const ctx = createCommandContext(command, "table");
        tableCommand(ctx);
      });
    });
}

export function tableCommand(ctx: CommandContext): string[] {
  const { entries, pseudoVersionTargets } = resolveCompatibility(ctx.config);
  const table = createCompatibilityTable(entries);
  const source = ctx.config.compatibility ? ctx.configPath : "built-in table";

  const lines = [`Compatibility (${source}):`];
  for (const entry of table.entries) {
    lines.push(`  ${entry.primaryVersion}: ${listOrDash(entry.secondaryVersions)}${controllerSuffix(entry)}`);
  }
  lines.push(`Pseudo versions: devel=${pseudoVersionTargets.devel}, milestone=${pseudoVersionTargets.milestone}`);

  for (const line of lines) {
    console.log(line);
  }
  return lines;
}

function controllerSuffix(entry: CompatibilityEntry): string {
  if (entry.controllerOnly) return " (controller only)";
  if (entry.controllerVersions) return ` (controller: ${listOrDash(entry.controllerVersions)})`;
  return "";
}

function listOrDash(versions: readonly string[]): string {
  return versions.length > 0 ? versions.join(", ") : "-";
}
