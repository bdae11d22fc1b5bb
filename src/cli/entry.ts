import fs from "node:fs";
import { fileURLToPath } from "node:url";

/**
 * True when `scriptPath` (usually `process.argv[1]`) is the module at `moduleUrl`.
 * npm installs the bin as a symlink, so both sides are compared after resolving links.
 */
export function isDirectRun(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) return false;

  const modulePath = fileURLToPath(moduleUrl);
  return resolveRealPath(scriptPath) === resolveRealPath(modulePath);
}

function resolveRealPath(filePath: string): string | null {
  try {
    return fs.realpathSync(filePath);
  } catch (err) {
    if (isMissingPathError(err)) return null;
    throw err;
  }
}

function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
