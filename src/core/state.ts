import { z } from "zod";

import type { ProjectDefinition } from "./config.js";
import { StateTransitionError } from "./errors.js";
import { compareIds, ownValue, sortIds } from "./utils.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const SNAPSHOT_SCHEMA_VERSION = 1;

export const TaskStatusSchema = z.enum(["pending", "running", "validating", "passed", "failed"]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const FailureKindSchema = z.enum(["validation", "dispatch"]);
export type FailureKind = z.infer<typeof FailureKindSchema>;

export const TaskFailureSchema = z
  .object({
    kind: FailureKindSchema,
    message: z.string(),
  })
  .strict();

export const TaskStateSchema = z
  .object({
    status: TaskStatusSchema,
    iteration: z.number().int().nonnegative(),
    errors: z.array(z.string()),
    history: z.array(z.string()),
    branch: z.string().min(1),
    workspace: z.string().optional(),
    failure: TaskFailureSchema.optional(),
    started_at: z.string().optional(),
    completed_at: z.string().optional(),
  })
  .strict();

export type TaskState = z.infer<typeof TaskStateSchema>;

export const SnapshotProjectSchema = z
  .object({
    name: z.string(),
    version: z.string(),
    design_path: z.string(),
    fingerprint: z.string(),
    max_iterations: z.number().int().positive(),
  })
  .strict();

export const OrchestratorSnapshotSchema = z
  .object({
    schema_version: z.literal(SNAPSHOT_SCHEMA_VERSION),
    sequence: z.number().int().nonnegative(),
    run_id: z.string().min(1),
    project: SnapshotProjectSchema,
    started_at: z.string(),
    updated_at: z.string(),
    tasks: z.record(TaskStateSchema),
    current_batch: z.array(z.string()),
    completed_branches: z.array(z.string()),
    integrated_branches: z.array(z.string()),
  })
  .strict();

export type OrchestratorSnapshot = z.infer<typeof OrchestratorSnapshotSchema>;

// =============================================================================
// TRANSITIONS
// =============================================================================

/** `at` is the commit timestamp; apply() never reads the clock. */
export type StateTransition =
  | { type: "begin_batch"; at: string; taskIds: string[]; workspaces: Record<string, string> }
  | { type: "begin_validation"; at: string; taskId: string }
  | { type: "record_result"; at: string; taskId: string; passed: boolean; errors: string[] }
  | { type: "retry"; at: string; taskId: string }
  | { type: "fail"; at: string; taskId: string; kind: FailureKind; message: string }
  | { type: "mark_integrated"; at: string; branch: string };

export type StateTransitionType = StateTransition["type"];

const GENERIC_VALIDATION_ERROR = "validation failed";

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function createSnapshot(
  definition: ProjectDefinition,
  args: { runId: string; at: string },
): OrchestratorSnapshot {
  const tasks: Record<string, TaskState> = {};
  for (const id of sortIds(Object.keys(definition.tasks))) {
    const task = ownValue(definition.tasks, id);
    if (!task) continue;
    tasks[id] = { status: "pending", iteration: 0, errors: [], history: [], branch: task.branch };
  }

  return {
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    sequence: 0,
    run_id: args.runId,
    project: {
      name: definition.config.project.name,
      version: definition.config.project.version,
      design_path: definition.source.path,
      fingerprint: definition.source.fingerprint,
      max_iterations: definition.config.project.max_iterations,
    },
    started_at: args.at,
    updated_at: args.at,
    tasks,
    current_batch: [],
    completed_branches: [],
    integrated_branches: [],
  };
}

// =============================================================================
// APPLY
// =============================================================================

/**
 * Returns the snapshot that follows `snapshot` under `transition`.
 * The input is never modified; equal inputs give equal outputs.
 */
export function apply(
  snapshot: OrchestratorSnapshot,
  transition: StateTransition,
): OrchestratorSnapshot {
  const next = structuredClone(snapshot);

  switch (transition.type) {
    case "begin_batch":
      applyBeginBatch(next, transition);
      break;
    case "begin_validation":
      applyBeginValidation(next, transition);
      break;
    case "record_result":
      applyRecordResult(next, transition);
      break;
    case "retry":
      applyRetry(next, transition);
      break;
    case "fail":
      applyFail(next, transition);
      break;
    case "mark_integrated":
      applyMarkIntegrated(next, transition);
      break;
  }

  next.sequence = snapshot.sequence + 1;
  next.updated_at = transition.at;
  return next;
}

export function applyAll(
  snapshot: OrchestratorSnapshot,
  transitions: readonly StateTransition[],
): OrchestratorSnapshot {
  return transitions.reduce(apply, snapshot);
}

function applyBeginBatch(
  snapshot: OrchestratorSnapshot,
  transition: Extract<StateTransition, { type: "begin_batch" }>,
): void {
  if (transition.taskIds.length === 0) {
    throw new StateTransitionError("Cannot begin an empty batch", transition.type);
  }

  for (const taskId of transition.taskIds) {
    const task = requireTask(snapshot, taskId, transition.type);
    expectStatus(task, taskId, transition.type, ["pending"]);

    const workspace = transition.workspaces[taskId] ?? task.workspace;
    if (!workspace) {
      throw new StateTransitionError(
        `Cannot dispatch task ${taskId} without a workspace`,
        transition.type,
        taskId,
      );
    }

    task.status = "running";
    task.workspace = workspace;
    task.started_at = transition.at;
    task.completed_at = undefined;
  }

  snapshot.current_batch = sortIds(new Set([...snapshot.current_batch, ...transition.taskIds]));
}

function applyBeginValidation(
  snapshot: OrchestratorSnapshot,
  transition: Extract<StateTransition, { type: "begin_validation" }>,
): void {
  const task = requireTask(snapshot, transition.taskId, transition.type);
  // validating -> validating re-runs an interrupted validation.
  expectStatus(task, transition.taskId, transition.type, ["running", "validating"]);

  task.status = "validating";
  task.errors = [];
}

function applyRecordResult(
  snapshot: OrchestratorSnapshot,
  transition: Extract<StateTransition, { type: "record_result" }>,
): void {
  const task = requireTask(snapshot, transition.taskId, transition.type);
  expectStatus(task, transition.taskId, transition.type, ["validating"]);
  if (task.errors.length > 0) {
    throw new StateTransitionError(
      `Result for task ${transition.taskId} is already recorded`,
      transition.type,
      transition.taskId,
    );
  }

  if (transition.passed) {
    task.status = "passed";
    task.errors = [];
    task.failure = undefined;
    task.completed_at = transition.at;
    removeFromBatch(snapshot, transition.taskId);
    if (!snapshot.completed_branches.includes(task.branch)) {
      snapshot.completed_branches.push(task.branch);
    }
    return;
  }

  const errors = transition.errors.length > 0 ? [...transition.errors] : [GENERIC_VALIDATION_ERROR];
  task.iteration += 1;
  task.errors = errors;
  task.history = [...task.history, ...errors];
}

function applyRetry(
  snapshot: OrchestratorSnapshot,
  transition: Extract<StateTransition, { type: "retry" }>,
): void {
  const task = requireTask(snapshot, transition.taskId, transition.type);
  expectRecordedFailure(task, transition.taskId, transition.type);

  if (task.iteration >= snapshot.project.max_iterations) {
    throw new StateTransitionError(
      `Task ${transition.taskId} reached max_iterations (${snapshot.project.max_iterations})`,
      transition.type,
      transition.taskId,
    );
  }

  task.status = "pending";
  removeFromBatch(snapshot, transition.taskId);
}

function applyFail(
  snapshot: OrchestratorSnapshot,
  transition: Extract<StateTransition, { type: "fail" }>,
): void {
  const task = requireTask(snapshot, transition.taskId, transition.type);

  if (transition.kind === "validation") {
    expectRecordedFailure(task, transition.taskId, transition.type);
    if (task.iteration < snapshot.project.max_iterations) {
      throw new StateTransitionError(
        `Task ${transition.taskId} still has retries left (${task.iteration}/${snapshot.project.max_iterations})`,
        transition.type,
        transition.taskId,
      );
    }
  } else {
    expectStatus(task, transition.taskId, transition.type, ["pending", "running"]);
  }

  task.status = "failed";
  task.failure = { kind: transition.kind, message: transition.message };
  task.completed_at = transition.at;
  removeFromBatch(snapshot, transition.taskId);
}

function applyMarkIntegrated(
  snapshot: OrchestratorSnapshot,
  transition: Extract<StateTransition, { type: "mark_integrated" }>,
): void {
  if (!snapshot.completed_branches.includes(transition.branch)) {
    throw new StateTransitionError(
      `Branch ${transition.branch} has not passed validation`,
      transition.type,
    );
  }
  if (snapshot.integrated_branches.includes(transition.branch)) {
    throw new StateTransitionError(
      `Branch ${transition.branch} is already integrated`,
      transition.type,
    );
  }

  snapshot.integrated_branches.push(transition.branch);
}

// =============================================================================
// HELPERS
// =============================================================================

function requireTask(
  snapshot: OrchestratorSnapshot,
  taskId: string,
  transition: StateTransitionType,
): TaskState {
  const task = ownValue(snapshot.tasks, taskId);
  if (!task) {
    throw new StateTransitionError(`Unknown task ${taskId}`, transition, taskId);
  }
  return task;
}

function expectStatus(
  task: TaskState,
  taskId: string,
  transition: StateTransitionType,
  allowed: TaskStatus[],
): void {
  if (!allowed.includes(task.status)) {
    throw new StateTransitionError(
      `Cannot ${transition} task ${taskId} from status ${task.status}`,
      transition,
      taskId,
    );
  }
}

// retry and fail(validation) need a failed result recorded by the current validation.
function expectRecordedFailure(
  task: TaskState,
  taskId: string,
  transition: StateTransitionType,
): void {
  expectStatus(task, taskId, transition, ["validating"]);
  if (task.errors.length === 0) {
    throw new StateTransitionError(
      `Cannot ${transition} task ${taskId} before a failed result is recorded`,
      transition,
      taskId,
    );
  }
}

function removeFromBatch(snapshot: OrchestratorSnapshot, taskId: string): void {
  snapshot.current_batch = snapshot.current_batch.filter((id) => id !== taskId);
}

export function tasksWithStatus(snapshot: OrchestratorSnapshot, status: TaskStatus): string[] {
  return Object.entries(snapshot.tasks)
    .filter(([, task]) => task.status === status)
    .map(([id]) => id)
    .sort(compareIds);
}
