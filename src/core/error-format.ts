/*
Purpose: turn any thrown value into labelled lines for the CLI, with optional ANSI styling.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: renderErrorText(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(true)).
*/

import {
  TopologyError,
  toUserFacingTopologyError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

const LINE_LABELS: Partial<Record<ErrorFormatLineKind, string>> = {
  hint: "Hint: ",
  next: "Next: ",
  code: "Code: ",
  cause: "Cause: ",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    return `${styles.map((style) => ANSI_STYLES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean } = {},
): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return (options.useColor ?? true) && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if ((options.mode ?? "short") === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: cause });
    }

    const stack = resolveStack(error) ?? resolveStack(normalized.cause);
    if (stack) lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

export function renderErrorText(lines: ErrorFormatLine[], format: AnsiFormatter): string {
  return lines
    .map((line) => format(`${LINE_LABELS[line.kind] ?? ""}${line.text}`, LINE_STYLES[line.kind]))
    .join("\n");
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeError(error: unknown): UserFacingErrorInput {
  const resolved = error instanceof TopologyError ? toUserFacingTopologyError(error) : error;

  if (resolved instanceof UserFacingError) {
    return {
      code: resolved.code,
      title: resolved.title.trim() || DEFAULT_ERROR_TITLE,
      message: resolved.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: resolved.hint?.trim() || undefined,
      next: resolved.next?.trim() || undefined,
      cause: resolved.cause,
    };
  }

  if (resolved === null || resolved === undefined) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: DEFAULT_ERROR_MESSAGE,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: formatErrorMessage(resolved).trim() || DEFAULT_ERROR_MESSAGE,
    cause: resolved instanceof Error ? resolved.cause : undefined,
  };
}

function resolveStack(value: unknown): string | undefined {
  return value instanceof Error && value.stack ? value.stack : undefined;
}
