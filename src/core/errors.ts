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

export class TaskError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class WorkspaceError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "WorkspaceError";
  }
}

export class StateTransitionError extends OrchestratorError {
  constructor(
    message: string,
    public readonly transition: string,
    public readonly taskId?: string,
  ) {
    super(message);
    this.name = "StateTransitionError";
  }
}

/** Another process already saved a snapshot with this sequence (or a later one). */
export class SnapshotConflictError extends OrchestratorError {
  constructor(
    public readonly sequence: number,
    cause?: unknown,
  ) {
    super(`Snapshot ${sequence} was already saved by another stratum process.`, cause);
    this.name = "SnapshotConflictError";
  }
}

// =============================================================================
// DESIGN DOCUMENT ERRORS
// =============================================================================

export type DependencyOwnerKind = "task" | "layer";

export class UnknownDependencyError extends ConfigError {
  constructor(
    public readonly ownerKind: DependencyOwnerKind,
    public readonly ownerId: string,
    public readonly missingId: string,
    public readonly field: string,
  ) {
    super(`${ownerKind} "${ownerId}" references unknown id "${missingId}" in ${field}`);
    this.name = "UnknownDependencyError";
  }
}

export class CyclicDependencyError extends ConfigError {
  constructor(
    public readonly scope: DependencyOwnerKind,
    public readonly cycle: string[],
  ) {
    super(`Dependency cycle among ${scope}s: ${cycle.join(" -> ")}`);
    this.name = "CyclicDependencyError";
  }
}

export class LayerOrderError extends ConfigError {
  constructor(
    public readonly taskId: string,
    public readonly dependencyId: string,
    public readonly taskLayer: string,
    public readonly dependencyLayer: string,
  ) {
    super(
      `Task "${taskId}" (layer "${taskLayer}") depends on "${dependencyId}" ` +
        `(layer "${dependencyLayer}"), but layer "${taskLayer}" does not depend on "${dependencyLayer}"`,
    );
    this.name = "LayerOrderError";
  }
}

// =============================================================================
// INTEGRATION ERRORS
// =============================================================================

export type IntegrationFailureReason =
  | "incomplete"
  | "not_linear"
  | "rebase_conflict"
  | "fast_forward_failed"
  | "missing_branch";

export class IntegrationError extends OrchestratorError {
  constructor(
    message: string,
    public readonly reason: IntegrationFailureReason,
    public readonly taskId?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "IntegrationError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  task: "TASK_ERROR",
  git: "GIT_ERROR",
  state: "STATE_ERROR",
  integration: "INTEGRATION_ERROR",
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
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

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
