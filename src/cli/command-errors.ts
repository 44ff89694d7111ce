/*
Purpose: translate orchestrator errors into UserFacingError for CLI output.
Assumptions: errors that are already user-facing pass through unchanged; unknown values are left to renderCliError.
Usage: throw normalizeCommandError(err);
*/

import {
  ConfigError,
  GitError,
  IntegrationError,
  OrchestratorError,
  SnapshotConflictError,
  StateTransitionError,
  TaskError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  WorkspaceError,
  type IntegrationFailureReason,
} from "../core/errors.js";

// =============================================================================
// HINTS
// =============================================================================

const INTEGRATION_HINTS: Record<IntegrationFailureReason, string | undefined> = {
  incomplete: "Run `stratum status` to see which tasks are still open.",
  not_linear:
    "Set `worktree.rebase: true` in the design document, or rebase the branch yourself and rerun `stratum integrate`.",
  rebase_conflict: "Resolve the conflict in the task worktree, then rerun `stratum integrate`.",
  fast_forward_failed: "Check the primary checkout with `git status`, then rerun `stratum integrate`.",
  missing_branch: undefined,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function normalizeCommandError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof IntegrationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.integration,
      title: "Integration blocked.",
      message: error.message,
      hint: INTEGRATION_HINTS[error.reason],
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Design document error.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof TaskError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: "Task error.",
      message: error.message,
      hint: "Run `stratum status` to see task states.",
      cause: error,
    });
  }

  if (error instanceof GitError || error instanceof WorkspaceError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git operation failed.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof SnapshotConflictError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.state,
      title: "Run state changed underneath this command.",
      message: error.message,
      hint: "Other stratum commands kept saving the run; rerun this one.",
      cause: error,
    });
  }

  if (error instanceof StateTransitionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.state,
      title: "Run state rejected the change.",
      message: error.message,
      hint: "Run `stratum status`; `stratum reset` discards the saved run.",
      cause: error,
    });
  }

  if (error instanceof OrchestratorError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.unknown,
      title: "Orchestrator error.",
      message: error.message,
      cause: error,
    });
  }

  return error;
}
