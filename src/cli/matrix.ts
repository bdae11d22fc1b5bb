import type { Command } from "commander";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { logQaEvent } from "../core/logger.js";
import { detectCi, findAvailableVersions } from "../env/local-versions.js";
import { formatMatrixSummary, writeMatrixOutputs } from "../matrix/ci-output.js";
import { generateMatrices } from "../matrix/matrix-generator.js";
import { buildMatrixRequests } from "../matrix/requests.js";
import { TEST_KINDS, type CompatibilityEntry, type MatrixDocument } from "../matrix/types.js";

import { createCommandContext, resolveCompatibility, type CommandContext } from "./config.js";
import { runCommandAction } from "./output.js";

export const MATRIX_JSON_ENV = "COLLECTION_QA_MATRIX_JSON";

export type MatrixOptions = {
  kind: string[];
  primary: string[];
  secondary: string[];
  local: string[];
  detectLocal?: boolean;
  localOnly?: boolean;
  min?: string;
  max?: string;
  jsonOutput?: string;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerMatrixCommand(program: Command): void {
  program
    .command("matrix")
    .description("Generate the CI test matrix for the configured test kinds")
    .option("--kind <kind>", `Test kind to generate (${TEST_KINDS.join(", ")}; repeatable)`, collect, [])
    .option("--primary <version>", "Primary version to include, or \"all\" (repeatable)", collect, [])
    .option("--secondary <version>", "Secondary version to include, or \"all\" (repeatable)", collect, [])
    .option("--local <version>", "Secondary version available locally (repeatable)", collect, [])
    .option("--detect-local", "Detect which primary versions are installed locally", false)
    .option("--local-only", "Skip primary versions that are not installed locally", false)
    .option("--min <version>", "Lowest secondary version to include")
    .option("--max <version>", "Highest secondary version to include")
    .option("--json-output <path>", `Write the matrix JSON here (default: $${MATRIX_JSON_ENV})`)
    .action(async (opts: MatrixOptions, command: Command) => {
      await runCommandAction(command, async () => {
        const ctx = createCommandContext(command, "matrix");
        await matrixCommand(ctx, opts);
      });
    });
}

// =============================================================================
// COMMAND
// =============================================================================

export const EMPTY_MATRIX_OPTIONS: MatrixOptions = { kind: [], primary: [], secondary: [], local: [] };

export async function matrixCommand(
  ctx: CommandContext,
  opts: MatrixOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<MatrixDocument> {
  const { document, inCi } = await buildMatrixDocument(ctx, opts, env);

  for (const line of formatMatrixSummary(document)) {
    console.log(line);
  }

  const { written } = await writeMatrixOutputs(document, {
    jsonPath: opts.jsonOutput ?? env[MATRIX_JSON_ENV],
    githubOutputPath: env.GITHUB_OUTPUT,
  });

  logQaEvent(ctx.logger, "matrix.generated", {
    in_ci: inCi,
    kinds: Object.keys(document),
    entries: TEST_KINDS.reduce((sum, kind) => sum + (document[kind]?.length ?? 0), 0),
    written,
  });

  return document;
}

/** Generates the matrices for the selected kinds, detecting local versions when needed. */
export async function buildMatrixDocument(
  ctx: CommandContext,
  opts: MatrixOptions,
  env: NodeJS.ProcessEnv,
): Promise<{ document: MatrixDocument; inCi: boolean }> {
  const { entries: table, pseudoVersionTargets } = resolveCompatibility(ctx.config);
  const inCi = detectCi(env);
  const availablePrimaryVersions = shouldDetect(ctx, opts, inCi)
    ? await detectPrimaryVersions(ctx, table)
    : [];

  const requests = buildMatrixRequests(
    ctx.config.sessions,
    {
      kinds: opts.kind,
      primaryVersions: opts.primary,
      secondaryVersions: opts.secondary,
      minVersion: opts.min,
      maxVersion: opts.max,
      localOnly: opts.localOnly,
    },
    { localVersions: opts.local, availablePrimaryVersions, inCi, pseudoVersionTargets },
  );

  return { document: generateMatrices(table, requests), inCi };
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function shouldDetect(ctx: CommandContext, opts: MatrixOptions, inCi: boolean): boolean {
  if (inCi) return false;
  if (opts.detectLocal || opts.localOnly) return true;
  return TEST_KINDS.some((kind) => ctx.config.sessions[kind]?.local_only === true);
}

async function detectPrimaryVersions(
  ctx: CommandContext,
  table: readonly CompatibilityEntry[],
): Promise<string[]> {
  const candidates = table.map((entry) => entry.primaryVersion);

  let available: string[];
  try {
    available = await findAvailableVersions(candidates, ctx.config.local_detection);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.detection,
      title: "Local version detection failed.",
      message: err instanceof Error ? err.message : String(err),
      hint: "Check `local_detection.command` in the project config.",
      cause: err,
    });
  }

  logQaEvent(ctx.logger, "detection.complete", { candidates, available });
  console.error(`Local primary versions: ${available.length > 0 ? available.join(", ") : "(none)"}`);
  return available;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
