import type { Command } from "commander";

import { logQaEvent } from "../core/logger.js";
import {
  createActionGroup,
  createInventoryItem,
  formatActionGroupError,
  validateActionGroups,
  type ActionGroupValidationError,
} from "../validators/action-groups.js";

import { createCommandContext, type CommandContext } from "./config.js";
import { runCommandAction } from "./output.js";

export function registerActionGroupsCommand(program: Command): void {
  program
    .command("action-groups")
    .description("Check action-group attributes and exclusions against the inventory")
    .action(async (_opts, command: Command) => {
      await runCommandAction(command, () => {
        const ctx = createCommandContext(command, "action-groups");
        actionGroupsCommand(ctx);
      });
    });
}

export function actionGroupsCommand(ctx: CommandContext): ActionGroupValidationError[] {
  const groups = (ctx.config.sessions.extra_checks?.action_groups ?? []).map(createActionGroup);
  const inventory = ctx.config.inventory.map((item) => createInventoryItem(item.name, item.attributes));

  const errors = validateActionGroups(groups, inventory);
  logQaEvent(ctx.logger, "action_groups.validated", {
    groups: groups.length,
    items: inventory.length,
    errors: errors.length,
  });

  if (errors.length === 0) {
    console.log(`Action groups OK (${groups.length} groups, ${inventory.length} items).`);
    return errors;
  }

  for (const error of errors) {
    console.log(formatActionGroupError(error));
  }
  console.error(`Found ${errors.length} action-group error(s).`);
  process.exitCode = 1;
  return errors;
}
