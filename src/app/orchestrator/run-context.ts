/**
 * RunContext for orchestrator runs.
 * Purpose: hold the run-scoped definition, store and ports so run steps stay free of globals.
 * Assumptions: one context per orchestrator; the store is its only writer.
 * Usage: createRunContext(...) from the Orchestrator constructor, then pass to run steps.
 */

import type { ProjectDefinition, ResolvedValidator } from "../../core/config.js";
import { OrchestratorError, TaskError } from "../../core/errors.js";
import type { StateStore } from "../../core/state-store.js";
import type { OrchestratorSnapshot, TaskState } from "../../core/state.js";
import { ownValue } from "../../core/utils.js";
import { ValidatorRunner } from "../../validators/validator-runner.js";

import type { DispatchedTask, OrchestratorPorts } from "./ports.js";
import type { StartResult } from "./run/start-run.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunControl = {
  stopRequested: boolean;
  cancelledReason: string | null;
};

export type RunContext = {
  definition: ProjectDefinition;
  store: StateStore;
  ports: OrchestratorPorts;
  validatorRunner: ValidatorRunner;
  runId?: string;
  control: RunControl;
  /** Set by the first onStart(); later calls return it unchanged. */
  startResult: StartResult | null;
};

export type RunContextInput = {
  definition: ProjectDefinition;
  store: StateStore;
  ports: OrchestratorPorts;
  runId?: string;
  validatorEnv?: Record<string, string>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createRunContext(input: RunContextInput): RunContext {
  return {
    definition: input.definition,
    store: input.store,
    ports: input.ports,
    validatorRunner: new ValidatorRunner(input.ports.executor, { env: input.validatorEnv }),
    runId: input.runId,
    control: { stopRequested: false, cancelledReason: null },
    startResult: null,
  };
}

export function requireSnapshot(ctx: RunContext): OrchestratorSnapshot {
  const snapshot = ctx.store.current;
  if (!snapshot) {
    throw new OrchestratorError("Run has not started; call onStart() first.");
  }
  return snapshot;
}

export function requireTaskState(snapshot: OrchestratorSnapshot, taskId: string): TaskState {
  const state = ownValue(snapshot.tasks, taskId);
  if (!state) {
    throw new TaskError(`Unknown task ${taskId}`);
  }
  return state;
}

/** Validators of the task's layer, in declaration order. */
export function layerValidators(ctx: RunContext, taskId: string): ResolvedValidator[] {
  const task = ownValue(ctx.definition.tasks, taskId);
  if (!task) {
    throw new TaskError(`Unknown task ${taskId}`);
  }

  const layer = ownValue(ctx.definition.layers, task.layer);
  const validatorIds = layer?.validators ?? [];
  return validatorIds.flatMap((id) => {
    const validator = ownValue(ctx.definition.validators, id);
    return validator ? [validator] : [];
  });
}

export function toDispatchedTask(
  ctx: RunContext,
  snapshot: OrchestratorSnapshot,
  taskId: string,
): DispatchedTask {
  const task = ownValue(ctx.definition.tasks, taskId);
  const state = requireTaskState(snapshot, taskId);
  if (!task || !state.workspace) {
    throw new TaskError(`Task ${taskId} has no workspace`);
  }

  const dispatched: DispatchedTask = {
    taskId,
    description: task.description,
    layer: task.layer,
    agent: task.agent,
    branch: state.branch,
    workspace: state.workspace,
    validators: layerValidators(ctx, taskId),
    iteration: state.iteration,
    previousErrors: [...state.errors],
  };
  if (task.command !== undefined) {
    dispatched.command = task.command;
  }
  return dispatched;
}
