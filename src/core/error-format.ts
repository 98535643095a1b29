/*
Purpose: turn any thrown value into user-facing lines and render them with optional ANSI color.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: renderErrorLines(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(resolveColorEnabled())).
*/

import {
  toUserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "green" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

/** NO_COLOR always wins; otherwise color follows the flag, and only ever on a TTY. */
export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const env = options.env ?? process.env;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    return false;
  }

  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);
  return (options.useColor ?? true) && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if ((options.mode ?? "short") === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    if (error instanceof Error && error.name) {
      lines.push({ kind: "name", text: error.name });
    }

    const cause = describeCause(normalized.cause, normalized.message);
    if (cause) {
      lines.push({ kind: "cause", text: cause });
    }

    const stack = resolveStack(error, normalized.cause);
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], style: AnsiFormatter): string[] {
  return lines.map((line) => {
    switch (line.kind) {
      case "title":
        return style(`error: ${line.text}`, ["bold", "red"]);
      case "hint":
        return style(`hint: ${line.text}`, ["yellow"]);
      case "next":
        return style(`next: ${line.text}`, ["cyan"]);
      case "code":
      case "name":
        return style(`${line.kind}: ${line.text}`, ["dim"]);
      case "cause":
        return style(`cause: ${line.text}`, ["dim"]);
      case "stack":
        return style(line.text, ["dim"]);
      default:
        return line.text;
    }
  });
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
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
  const userFacing = toUserFacingError(error);
  if (userFacing) {
    return {
      code: userFacing.code,
      title: textOr(userFacing.title, DEFAULT_ERROR_TITLE),
      message: textOr(userFacing.message, DEFAULT_ERROR_MESSAGE),
      hint: optionalText(userFacing.hint),
      next: optionalText(userFacing.next),
      cause: userFacing.cause,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message:
      error === null || error === undefined
        ? DEFAULT_ERROR_MESSAGE
        : textOr(formatErrorMessage(error), DEFAULT_ERROR_MESSAGE),
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function textOr(value: string, fallback: string): string {
  return optionalText(value) ?? fallback;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function describeCause(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }

  const resolved = optionalText(formatErrorMessage(cause));
  return resolved && resolved !== message ? resolved : undefined;
}

function resolveStack(error: unknown, cause: unknown): string | undefined {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }
  if (cause instanceof Error && cause.stack) {
    return cause.stack;
  }
  return undefined;
}
