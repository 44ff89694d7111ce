import type { ProjectDefinition } from "../../../core/config.js";
import {
  OrchestratorError,
  SnapshotConflictError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../../../core/errors.js";
import { logOrchestratorEvent, logRunResume } from "../../../core/logger.js";
import { createSnapshot, tasksWithStatus, type OrchestratorSnapshot } from "../../../core/state.js";
import { defaultRunId, sortIds } from "../../../core/utils.js";
import type { RunContext } from "../run-context.js";

export type StartResult = {
  mode: "start" | "resume";
  snapshot: OrchestratorSnapshot;
  designChanged: boolean;
};

const RESET_HINT =
  "Run `stratum reset` to discard the saved run, or restore the design document it was started from.";

/** Loads the latest snapshot or creates and persists a fresh one. */
export async function startRun(ctx: RunContext): Promise<StartResult> {
  if (ctx.startResult) return ctx.startResult;
  ctx.startResult = await loadOrCreate(ctx);
  return ctx.startResult;
}

async function loadOrCreate(ctx: RunContext): Promise<StartResult> {
  const { store, definition, ports } = ctx;
  const loaded = store.current ?? (await store.load());
  if (loaded) return resume(ctx, loaded);

  const runId = ctx.runId ?? defaultRunId(ports.clock.now());
  try {
    const snapshot = await store.initialize(
      createSnapshot(definition, { runId, at: ports.clock.isoNow() }),
    );
    logOrchestratorEvent(ports.events, "run.start", {
      runId,
      project: definition.config.project.name,
      tasks: definition.taskOrder.length,
      max_parallel: definition.config.project.max_parallel,
      max_iterations: definition.config.project.max_iterations,
    });
    return { mode: "start", snapshot, designChanged: false };
  } catch (err) {
    if (!(err instanceof SnapshotConflictError)) throw err;
  }

  // Another process created the run first; join it.
  const created = await store.load();
  if (!created) {
    throw new OrchestratorError("The saved run disappeared while starting; retry the command.");
  }
  return resume(ctx, created);
}

function resume(ctx: RunContext, existing: OrchestratorSnapshot): StartResult {
  const { definition, ports } = ctx;
  assertSnapshotMatches(definition, existing);
  const designChanged = existing.project.fingerprint !== definition.source.fingerprint;

  logRunResume(ports.events, {
    runId: existing.run_id,
    sequence: existing.sequence,
    inFlight: existing.current_batch.length,
    pending: tasksWithStatus(existing, "pending").length,
  });
  if (designChanged) {
    logOrchestratorEvent(ports.events, "run.design_changed", {
      runId: existing.run_id,
      previous: existing.project.fingerprint,
      current: definition.source.fingerprint,
    });
  }

  return { mode: "resume", snapshot: existing, designChanged };
}

function assertSnapshotMatches(definition: ProjectDefinition, snapshot: OrchestratorSnapshot): void {
  const expected = sortIds(Object.keys(definition.tasks));
  const saved = sortIds(Object.keys(snapshot.tasks));
  const added = expected.filter((id) => !saved.includes(id));
  const removed = saved.filter((id) => !expected.includes(id));

  if (added.length === 0 && removed.length === 0) return;

  const details = [
    added.length > 0 ? `new tasks: ${added.join(", ")}` : null,
    removed.length > 0 ? `missing tasks: ${removed.join(", ")}` : null,
  ]
    .filter((part): part is string => part !== null)
    .join("; ");

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.state,
    title: "Saved run does not match the design document.",
    message: `Run ${snapshot.run_id} was started with a different task set (${details}).`,
    hint: RESET_HINT,
  });
}
