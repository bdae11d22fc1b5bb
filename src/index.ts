import { buildCli } from "./cli/index.js";
import { reportCliError } from "./cli/output.js";

export { buildCli } from "./cli/index.js";
export * from "./core/errors.js";
export { createActionGroup, createInventoryItem, validateActionGroups } from "./validators/action-groups.js";
export { generateMatrices, generateMatrix } from "./matrix/matrix-generator.js";
export { buildSessionRegistry } from "./sessions/registry.js";
export { resolveSessionNames, resolveSessions } from "./sessions/resolver.js";
export type {
  CompatibilityEntry,
  DevelLikeBranch,
  MatrixDocument,
  MatrixEntry,
  MatrixRequest,
  PseudoVersionTargets,
  TestKind,
} from "./matrix/types.js";
export type { Session } from "./sessions/types.js";

export async function main(argv: string[]): Promise<void> {
  try {
    await buildCli().parseAsync(argv);
  } catch (err) {
    reportCliError(err, { debug: argv.includes("--debug") });
  }
}
