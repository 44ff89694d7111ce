import type { ProjectDefinition } from "./config.js";
import { TaskError } from "./errors.js";
import type { OrchestratorSnapshot } from "./state.js";
import { dependentsOf, readyTasks } from "./task-graph.js";
import { compareIds, ownValue } from "./utils.js";

export type RunOutcome = "complete" | "failed" | "blocked" | "running";

// =============================================================================
// BATCH SELECTION
// =============================================================================

/** Takes the first `maxParallel - inFlight` ids of an already sorted ready list. */
export function selectBatch(ready: readonly string[], maxParallel: number, inFlight: number): string[] {
  assertMaxParallel(maxParallel);

  const slots = Math.max(0, maxParallel - inFlight);
  return ready.slice(0, slots);
}

export type BatchPlan = {
  ready: string[];
  selected: string[];
  inFlight: number;
};

export function planNextBatch(
  definition: ProjectDefinition,
  snapshot: OrchestratorSnapshot,
): BatchPlan {
  const ready = readyTasks(definition, snapshot);
  const inFlight = snapshot.current_batch.length;
  const selected = selectBatch(ready, definition.config.project.max_parallel, inFlight);
  return { ready, selected, inFlight };
}

// =============================================================================
// OUTCOME
// =============================================================================

export function deriveRunOutcome(
  definition: ProjectDefinition,
  snapshot: OrchestratorSnapshot,
): RunOutcome {
  const states = Object.values(snapshot.tasks);
  if (states.every((task) => task.status === "passed")) {
    return "complete";
  }

  const failed = Object.keys(snapshot.tasks)
    .filter((id) => ownValue(snapshot.tasks, id)?.status === "failed")
    .sort(compareIds);
  if (failed.length === 0) {
    return "running";
  }

  const inFlight = states.some((task) => task.status === "running" || task.status === "validating");
  const ready = readyTasks(definition, snapshot);
  if (!inFlight && ready.length === 0) {
    return "failed";
  }

  return blockedByFailure(definition, snapshot, failed).length > 0 ? "blocked" : "running";
}

/** Non-terminal tasks that can never run because a dependency failed. */
export function blockedByFailure(
  definition: ProjectDefinition,
  snapshot: OrchestratorSnapshot,
  failed: readonly string[],
): string[] {
  const blocked = new Set<string>();
  for (const id of failed) {
    for (const dependent of dependentsOf(definition, id)) {
      const status = ownValue(snapshot.tasks, dependent)?.status;
      if (status === "pending") blocked.add(dependent);
    }
  }
  return [...blocked].sort(compareIds);
}

function assertMaxParallel(maxParallel: number): void {
  if (!Number.isInteger(maxParallel) || maxParallel < 1) {
    throw new TaskError(`max_parallel must be a positive integer, received ${maxParallel}`);
  }
}
