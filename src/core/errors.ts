export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class DockerError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}

export class ChangeDetectionError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ChangeDetectionError";
  }
}

export class ProvisioningError extends OrchestratorError {
  constructor(
    message: string,
    public readonly profile: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ProvisioningError";
  }
}

export class StageExecutionError extends OrchestratorError {
  constructor(
    message: string,
    public readonly stage: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "StageExecutionError";
  }
}

export class TeardownError extends OrchestratorError {
  constructor(
    message: string,
    public readonly handle: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "TeardownError";
  }
}

export class NotificationError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotificationError";
  }
}

export class RunCancelledError extends OrchestratorError {
  constructor(
    message: string,
    public readonly reason?: string,
  ) {
    super(message);
    this.name = "RunCancelledError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "STAGEGATE_CONFIG",
  git: "STAGEGATE_GIT",
  docker: "STAGEGATE_DOCKER",
  run: "STAGEGATE_RUN",
  report: "STAGEGATE_REPORT",
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
  readonly exitCode?: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode;
  }
}
