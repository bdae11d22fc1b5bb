// CI output for generated matrices.
// Purpose: serialize a MatrixDocument for CI consumers and render a short summary for humans.

import path from "node:path";

import fse from "fs-extra";

import { TEST_KINDS, type MatrixDocument, type MatrixEntry } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type MatrixOutputTargets = {
  /** Combined JSON document. */
  jsonPath?: string;
  /** File receiving `kind=<json>` lines, as GitHub Actions reads `$GITHUB_OUTPUT`. */
  githubOutputPath?: string;
};

export type MatrixOutputResult = {
  written: string[];
};

// =============================================================================
// RENDERING
// =============================================================================

export function renderMatrixJson(document: MatrixDocument): string {
  return `${JSON.stringify(orderDocument(document), null, 2)}\n`;
}

export function formatGithubOutputLines(document: MatrixDocument): string[] {
  const lines: string[] = [];
  for (const kind of TEST_KINDS) {
    const entries = document[kind];
    if (entries) {
      lines.push(`${kind}=${JSON.stringify(entries)}`);
    }
  }
  return lines;
}

export function formatMatrixSummary(document: MatrixDocument): string[] {
  const lines: string[] = [];
  for (const kind of TEST_KINDS) {
    const entries = document[kind];
    if (!entries) continue;

    lines.push(`${kind} (${entries.length}):`);
    lines.push(...entries.map(formatSummaryEntry));
  }
  return lines;
}

// =============================================================================
// WRITING
// =============================================================================

export async function writeMatrixOutputs(
  document: MatrixDocument,
  targets: MatrixOutputTargets,
): Promise<MatrixOutputResult> {
  const written: string[] = [];

  if (targets.jsonPath) {
    await fse.outputFile(targets.jsonPath, renderMatrixJson(document), "utf8");
    written.push(targets.jsonPath);
  }

  if (targets.githubOutputPath) {
    await fse.ensureDir(path.dirname(targets.githubOutputPath));
    const lines = formatGithubOutputLines(document);
    await fse.appendFile(targets.githubOutputPath, `${lines.join("\n")}\n`, "utf8");
    written.push(targets.githubOutputPath);
  }

  return { written };
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatSummaryEntry(entry: MatrixEntry): string {
  if (entry.primary_version === null || entry.secondary_version === null) {
    return `  skip: ${entry.skip_reason ?? "no reason given"}`;
  }

  const pair = `  ${entry.primary_version}/${entry.secondary_version}`;
  return entry.skip_reason ? `${pair} (skip: ${entry.skip_reason})` : pair;
}

function orderDocument(document: MatrixDocument): MatrixDocument {
  const ordered: MatrixDocument = {};
  for (const kind of TEST_KINDS) {
    const entries = document[kind];
    if (entries) {
      ordered[kind] = entries;
    }
  }
  return ordered;
}
