import type { Command } from "commander";

import { formatErrorLines, renderErrorLines, shouldColorize } from "../core/error-format.js";

import { readGlobalOptions } from "./config.js";

export function reportCliError(error: unknown, options: { debug?: boolean } = {}): void {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  console.error(renderErrorLines(lines, { color: shouldColorize(process.stderr) }));
  process.exitCode = 1;
}

/** Runs a command handler and reports anything it throws; nothing propagates to commander. */
export async function runCommandAction(
  command: Command,
  handler: () => Promise<void> | void,
): Promise<void> {
  try {
    await handler();
  } catch (err) {
    reportCliError(err, { debug: readGlobalOptions(command).debug });
  }
}
