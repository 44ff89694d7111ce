import { TaskError } from "../../../core/errors.js";
import { logOrchestratorEvent } from "../../../core/logger.js";
import { blockedByFailure, deriveRunOutcome, type RunOutcome } from "../../../core/scheduler.js";
import type { OrchestratorSnapshot } from "../../../core/state.js";
import { validationErrors, type ValidationResult } from "../../../validators/validator-runner.js";
import { layerValidators, requireSnapshot, requireTaskState, type RunContext } from "../run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type CompletionStatus = "passed" | "retry" | "failed";

export type CompletionResult = {
  taskId: string;
  status: CompletionStatus;
  iteration: number;
  errors: string[];
  validation: ValidationResult;
  outcome: RunOutcome;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Handles a completion signal: validates the task's workspace with its layer's
 * validators and records pass, retry or final failure. A task found in
 * `validating` (interrupted mid-validation) is validated again.
 */
export async function completeTask(ctx: RunContext, taskId: string): Promise<CompletionResult> {
  const { ports, store, definition } = ctx;
  const state = requireTaskState(requireSnapshot(ctx), taskId);

  if (state.status !== "running" && state.status !== "validating") {
    throw new TaskError(`Task ${taskId} is not in flight (status: ${state.status})`);
  }

  const validating = await store.commit({ type: "begin_validation", at: ports.clock.isoNow(), taskId });
  const workspace = requireTaskState(validating, taskId).workspace;
  if (!workspace) {
    throw new TaskError(`Task ${taskId} has no workspace to validate`);
  }

  const validators = layerValidators(ctx, taskId);
  logOrchestratorEvent(ports.events, "task.validate.start", {
    taskId,
    iteration: state.iteration,
    validators: validators.map((validator) => validator.id),
    revalidate: state.status === "validating",
  });

  const validation = await ctx.validatorRunner.run(validators, workspace);
  for (const outcome of validation.results) {
    logOrchestratorEvent(ports.events, "validator.complete", {
      taskId,
      validator: outcome.validator,
      passed: outcome.passed,
      exit_code: outcome.exitCode,
      duration_ms: outcome.durationMs,
      ...(outcome.failure ? { failure: outcome.failure.kind } : {}),
    });
  }

  if (validation.passed) {
    const next = await store.commit({
      type: "record_result",
      at: ports.clock.isoNow(),
      taskId,
      passed: true,
      errors: [],
    });
    logOrchestratorEvent(ports.events, "task.passed", { taskId, branch: requireTaskState(next, taskId).branch });
    return buildResult(ctx, next, taskId, "passed", validation);
  }

  const errors = validationErrors(validation);
  const at = ports.clock.isoNow();
  const recorded = { type: "record_result", at, taskId, passed: false, errors } as const;
  const maxIterations = validating.project.max_iterations;
  const attempt = state.iteration + 1;

  if (attempt < maxIterations) {
    const next = await store.commit(recorded, { type: "retry", at, taskId });
    logOrchestratorEvent(ports.events, "task.retry", {
      taskId,
      iteration: attempt,
      max_iterations: maxIterations,
      errors,
    });
    return buildResult(ctx, next, taskId, "retry", validation);
  }

  const message = errors.join("\n") || "validation failed";
  const next = await store.commit(recorded, {
    type: "fail",
    at,
    taskId,
    kind: "validation",
    message,
  });
  logOrchestratorEvent(ports.events, "task.failed", {
    taskId,
    iteration: attempt,
    errors,
    blocked: blockedByFailure(definition, next, [taskId]),
  });
  return buildResult(ctx, next, taskId, "failed", validation);
}

function buildResult(
  ctx: RunContext,
  snapshot: OrchestratorSnapshot,
  taskId: string,
  status: CompletionStatus,
  validation: ValidationResult,
): CompletionResult {
  const state = requireTaskState(snapshot, taskId);
  return {
    taskId,
    status,
    iteration: state.iteration,
    errors: [...state.errors],
    validation,
    outcome: deriveRunOutcome(ctx.definition, snapshot),
  };
}
