import type { Command } from "commander";

import { logQaEvent } from "../core/logger.js";
import { buildSessionRegistry } from "../sessions/registry.js";
import { resolveSessionNames } from "../sessions/resolver.js";
import type { Session } from "../sessions/types.js";

import { createCommandContext, type CommandContext } from "./config.js";
import { buildMatrixDocument, EMPTY_MATRIX_OPTIONS } from "./matrix.js";
import { runCommandAction } from "./output.js";

export type SessionsOptions = {
  list?: boolean;
};

export function registerSessionsCommand(program: Command): void {
  program
    .command("sessions")
    .description("Print the sessions to run, dependencies first")
    .argument("[names...]", "Sessions to run (default: the default sessions)")
    .option("--list", "List every available session instead", false)
    .action(async (names: string[], opts: SessionsOptions, command: Command) => {
      await runCommandAction(command, async () => {
        const ctx = createCommandContext(command, "sessions");
        await sessionsCommand(ctx, names, opts);
      });
    });
}

export async function sessionsCommand(
  ctx: CommandContext,
  names: string[],
  opts: SessionsOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string[]> {
  const registry = await loadRegistry(ctx, env);

  if (opts.list) {
    for (const session of registry) {
      console.log(formatSessionRow(session));
    }
    return registry.map((session) => session.name);
  }

  const order = resolveSessionNames(registry, names);
  for (const name of order) {
    console.log(name);
  }

  logQaEvent(ctx.logger, "sessions.resolved", { requested: names, order });
  return order;
}

// Test sessions are named after matrix entries, so the configured matrices are generated first.
async function loadRegistry(ctx: CommandContext, env: NodeJS.ProcessEnv): Promise<Session[]> {
  const { document } = await buildMatrixDocument(ctx, EMPTY_MATRIX_OPTIONS, env);
  return buildSessionRegistry(ctx.config.sessions, document);
}

function formatSessionRow(session: Session): string {
  const marker = session.isDefault ? "*" : " ";
  const description = session.description ? `  ${session.description}` : "";
  return `${marker} ${session.name} [${session.group}]${description}`;
}
