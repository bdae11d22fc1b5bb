import { Command } from "commander";

import { registerActionGroupsCommand } from "./action-groups.js";
import { registerInitCommand } from "./init.js";
import { registerMatrixCommand } from "./matrix.js";
import { registerSessionsCommand } from "./sessions.js";
import { registerTableCommand } from "./table.js";

export const CLI_VERSION = "0.1.0";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("collection-qa")
    .description("Test matrices and QA session selection for plugin collections")
    .version(CLI_VERSION)
    .option("--config <path>", "Path to the project config (default: <repo>/.collection-qa/config.yaml)")
    .option("--log-file <path>", "Append JSONL events to this file")
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerInitCommand(program);
  registerMatrixCommand(program);
  registerSessionsCommand(program);
  registerActionGroupsCommand(program);
  registerTableCommand(program);

  return program;
}
