/*
Purpose: core error types used by the topology builder, manifest loader, and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new TopologyError("...", issues); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class GeneratorError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "GeneratorError";
  }
}

// Caller broke a builder precondition; fatal to the current generation pass.
export class TopologyError extends GeneratorError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [message], cause?: unknown) {
    super(message, cause);
    this.name = "TopologyError";
    this.issues = issues;
  }
}

// Contract violation: a consumed builder was used again.
export class BuilderStateError extends GeneratorError {
  constructor(message: string) {
    super(message);
    this.name = "BuilderStateError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  manifest: "MANIFEST_ERROR",
  topology: "TOPOLOGY_ERROR",
  template: "TEMPLATE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

const TOPOLOGY_HINT = "Fix the topology manifest and run generate again.";

export function toUserFacingTopologyError(error: TopologyError): UserFacingError {
  const message =
    error.issues.length > 1
      ? [error.message, ...error.issues.map((issue) => `- ${issue}`)].join("\n")
      : (error.issues[0] ?? error.message);

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.topology,
    title: "Invalid realm topology.",
    message,
    hint: TOPOLOGY_HINT,
    cause: error,
  });
}
