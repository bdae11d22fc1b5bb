/*
Purpose: error types raised by the matrix, session and config layers, plus user-facing errors for CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new UnknownVersionError("2.7", "primary"); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export type ErrorContext = Record<string, string | string[] | null>;

export class CollectionQaError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = "CollectionQaError";
  }
}

export class ConfigError extends CollectionQaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type VersionAxis = "primary" | "secondary";

export class UnknownVersionError extends CollectionQaError {
  constructor(
    public readonly version: string,
    public readonly axis: VersionAxis = "primary",
  ) {
    super(`Unknown ${axis} version "${version}": not present in the compatibility table.`, undefined, {
      version,
      axis,
    });
    this.name = "UnknownVersion";
  }
}

export class InvalidVersionFormatError extends CollectionQaError {
  constructor(public readonly value: string) {
    super(`Invalid version "${value}": expected <major>.<minor>.`, undefined, {
      value,
    });
    this.name = "InvalidVersionFormat";
  }
}

export class UnknownSessionError extends CollectionQaError {
  constructor(
    public readonly session: string,
    public readonly requiredBy: string | null = null,
  ) {
    super(
      requiredBy
        ? `Unknown session "${session}" (required by "${requiredBy}").`
        : `Unknown session "${session}".`,
      undefined,
      { session, requiredBy },
    );
    this.name = "UnknownSession";
  }
}

export class SessionCycleError extends CollectionQaError {
  constructor(public readonly cycle: string[]) {
    super(`Session dependency cycle: ${cycle.join(" -> ")}`, undefined, { cycle });
    this.name = "SessionCycle";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  matrix: "MATRIX_ERROR",
  session: "SESSION_ERROR",
  detection: "DETECTION_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof UnknownVersionError || error instanceof InvalidVersionFormatError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.matrix,
      title: "Matrix generation failed.",
      message: error.message,
      hint: "Check the requested versions against `collection-qa table`.",
      cause: error,
    });
  }

  if (error instanceof UnknownSessionError || error instanceof SessionCycleError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.session,
      title: "Session selection failed.",
      message: error.message,
      hint: "Check session names and depends_on entries in the project config.",
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: error.message,
      hint: "Fix the project config and rerun.",
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}
