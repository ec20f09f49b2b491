// =============================================================================
// DOMAIN ERRORS
// =============================================================================

export class SweepError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SweepError";
  }
}

export class ConfigError extends SweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DirectoryError extends SweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DirectoryError";
  }
}

export class StatusServiceError extends SweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StatusServiceError";
  }
}

export class PreconditionError extends SweepError {
  constructor(
    message: string,
    public readonly check: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "PreconditionError";
  }
}

export type ThresholdPhase = "reconcile" | "mutate";

export class ThresholdExceededError extends SweepError {
  readonly errors: number;
  readonly maxErrors: number;
  readonly phase: ThresholdPhase;
  readonly batchIndex: number;

  constructor(input: {
    errors: number;
    maxErrors: number;
    phase: ThresholdPhase;
    batchIndex: number;
  }) {
    super(
      `Error threshold exceeded during ${input.phase} batch ${input.batchIndex}: ` +
        `${input.errors} errors (max ${input.maxErrors}).`,
    );
    this.name = "ThresholdExceededError";
    this.errors = input.errors;
    this.maxErrors = input.maxErrors;
    this.phase = input.phase;
    this.batchIndex = input.batchIndex;
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  precondition: "PRECONDITION_ERROR",
  threshold: "THRESHOLD_EXCEEDED",
  directory: "DIRECTORY_ERROR",
  status: "STATUS_SERVICE_ERROR",
  unknown: "UNKNOWN_ERROR",
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
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode ?? 1;
  }
}

export function isUserFacingError(error: unknown): error is UserFacingError {
  return error instanceof UserFacingError;
}
