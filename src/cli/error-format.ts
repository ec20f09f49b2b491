/*
Purpose: map domain failures to user-facing errors and render them for CLI output.
Assumptions: stderr is the default stream; non-TTY output should disable color.
Usage: console.error(renderCliError(toUserFacingError(err), { debug: isDebugEnabled }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import {
  ConfigError,
  DirectoryError,
  PreconditionError,
  StatusServiceError,
  SweepError,
  ThresholdExceededError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// NORMALIZATION
// =============================================================================

export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof ThresholdExceededError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.threshold,
      title: "Run halted: error threshold exceeded.",
      message: error.message,
      hint: "Review the per-subject report for failures, or rerun with --max-errors / --continue-on-errors.",
      next: "Subjects not reached are reported as no_action_required; a rerun picks them up.",
      cause: error,
    });
  }

  if (error instanceof PreconditionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.precondition,
      title: `Precondition failed (${error.check}).`,
      message: error.message,
      hint:
        error.check === "directory"
          ? "Set HOLDSWEEP_GRAPH_TOKEN (or directory.token_env) to a valid Graph access token."
          : "Check that pwsh is installed and status_service.connect_command authenticates.",
      cause: error.cause ?? error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration invalid.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof DirectoryError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.directory,
      title: "Directory request failed.",
      message: error.message,
      hint: "Check the Graph base URL and that the token can read users and subscribed SKUs.",
      cause: error.cause ?? error,
    });
  }

  if (error instanceof StatusServiceError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.status,
      title: "Status service failed.",
      message: error.message,
      hint: "Rerun with --debug to see the PowerShell error output.",
      cause: error.cause ?? error,
    });
  }

  if (error instanceof SweepError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.unknown,
      title: "Sweep failed.",
      message: error.message,
      cause: error.cause ?? error,
    });
  }

  return error;
}

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });

  const stream = options.stream ?? process.stderr;
  const useColor = resolveColorEnabled({ stream, useColor: options.useColor });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
      return `${format("Code:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "name":
      return `${format("Name:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "cause":
      return `${format("Cause:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
    default:
      return line.text;
  }
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
