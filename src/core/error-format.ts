/*
Purpose: turn thrown errors into display lines for the CLI, colored by line kind on a terminal.
Assumptions: debug mode adds the error code, name, context, cause and stack; NO_COLOR or a non-TTY stream disables color.
Usage: renderErrorLines(formatErrorLines(err, { mode: "debug" }), { color: shouldColorize(process.stderr) }).
*/

import { CollectionQaError, toUserFacingError, type UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorLineKind = "title" | "message" | "hint" | "code" | "name" | "context" | "cause" | "stack";

export type ErrorLine = {
  kind: ErrorLineKind;
  text: string;
};

export type RenderOptions = {
  color: boolean;
};

// =============================================================================
// COLOR
// =============================================================================

const SGR_RESET = "\x1b[0m";

// Title bold red, hint yellow, debug detail dim; the message stays plain.
const LINE_COLORS: Partial<Record<ErrorLineKind, string>> = {
  title: "\x1b[1m\x1b[31m",
  hint: "\x1b[33m",
  code: "\x1b[2m",
  name: "\x1b[2m",
  context: "\x1b[2m",
  cause: "\x1b[2m",
  stack: "\x1b[2m",
};

export function shouldColorize(
  stream: { isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    return false;
  }
  return stream.isTTY === true;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorLine[] {
  const mode = options.mode ?? "short";
  const userError = toUserFacingError(error);
  const lines: ErrorLine[] = [{ kind: "title", text: userError.title }];

  if (userError.message.trim() && userError.message.trim() !== userError.title.trim()) {
    lines.push({ kind: "message", text: userError.message.trim() });
  }
  if (userError.hint) {
    lines.push({ kind: "hint", text: userError.hint });
  }

  if (mode !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: userError.code });

  const origin = resolveOrigin(error, userError);
  lines.push({ kind: "name", text: origin.name });

  if (origin instanceof CollectionQaError) {
    for (const [key, value] of Object.entries(origin.context)) {
      lines.push({ kind: "context", text: `${key}: ${formatContextValue(value)}` });
    }
  }

  const cause = origin instanceof Error ? origin.cause : undefined;
  const causeMessage = cause === undefined || cause === null ? undefined : formatErrorMessage(cause);
  if (causeMessage && causeMessage !== userError.message) {
    lines.push({ kind: "cause", text: causeMessage });
  }

  if (origin.stack) {
    lines.push({ kind: "stack", text: origin.stack });
  }

  return lines;
}

export function renderErrorLines(lines: readonly ErrorLine[], options: RenderOptions): string {
  return lines
    .map((line) => {
      const text = labelLine(line);
      const color = options.color ? LINE_COLORS[line.kind] : undefined;
      return color ? `${color}${text}${SGR_RESET}` : text;
    })
    .join("\n");
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function labelLine(line: ErrorLine): string {
  switch (line.kind) {
    case "title":
      return `Error: ${line.text}`;
    case "hint":
      return `Hint: ${line.text}`;
    case "message":
      return line.text;
    default:
      return `${line.kind}: ${line.text}`;
  }
}

// Debug output describes the thrown error, not its user-facing mapping.
function resolveOrigin(error: unknown, userError: UserFacingError): Error {
  return error instanceof Error ? error : userError;
}

function formatContextValue(value: string | string[] | null): string {
  if (value === null) {
    return "-";
  }
  return Array.isArray(value) ? value.join(", ") : value;
}
