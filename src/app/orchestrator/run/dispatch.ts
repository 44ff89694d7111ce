import { OrchestratorError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent } from "../../../core/logger.js";
import { deriveRunOutcome, planNextBatch, type RunOutcome } from "../../../core/scheduler.js";
import { ownValue } from "../../../core/utils.js";
import type { DispatchedTask } from "../ports.js";
import { requireSnapshot, requireTaskState, toDispatchedTask, type RunContext } from "../run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type DispatchStatus = "dispatched" | "idle" | "cancelled" | "stopped";

export type DispatchFailure = {
  taskId: string;
  message: string;
};

export type DispatchResult = {
  status: DispatchStatus;
  tasks: DispatchedTask[];
  failures: DispatchFailure[];
  outcome: RunOutcome;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Starts every task that is ready and fits under max_parallel. Workspaces are
 * created first; a task whose workspace cannot be created fails without
 * consuming an iteration. The rest are committed as one batch.
 */
export async function dispatchReadyTasks(ctx: RunContext): Promise<DispatchResult> {
  const { ports, definition, store } = ctx;
  const snapshot = requireSnapshot(ctx);

  if (ctx.control.stopRequested) {
    return { status: "stopped", tasks: [], failures: [], outcome: deriveRunOutcome(definition, snapshot) };
  }

  if (await probeCancellation(ctx)) {
    return { status: "cancelled", tasks: [], failures: [], outcome: deriveRunOutcome(definition, snapshot) };
  }

  const plan = planNextBatch(definition, snapshot);
  if (plan.selected.length === 0) {
    return { status: "idle", tasks: [], failures: [], outcome: deriveRunOutcome(definition, snapshot) };
  }

  const workspaces: Record<string, string> = {};
  const failures: DispatchFailure[] = [];

  for (const taskId of plan.selected) {
    const recorded = requireTaskState(snapshot, taskId).workspace;
    if (recorded) {
      workspaces[taskId] = recorded;
      continue;
    }

    const task = ownValue(definition.tasks, taskId);
    if (!task) continue;

    try {
      const handle = await ports.workspaces.createWorkspace(task);
      workspaces[taskId] = handle.path;
    } catch (err) {
      if (!(err instanceof OrchestratorError)) throw err;

      const message = formatErrorMessage(err);
      failures.push({ taskId, message });
      await store.commit({ type: "fail", at: ports.clock.isoNow(), taskId, kind: "dispatch", message });
      logOrchestratorEvent(ports.events, "task.dispatch.fail", { taskId, message });
    }
  }

  const taskIds = plan.selected.filter((id) => workspaces[id] !== undefined);
  if (taskIds.length === 0) {
    const current = requireSnapshot(ctx);
    return { status: "idle", tasks: [], failures, outcome: deriveRunOutcome(definition, current) };
  }

  const next = await store.commit({
    type: "begin_batch",
    at: ports.clock.isoNow(),
    taskIds,
    workspaces,
  });

  logOrchestratorEvent(ports.events, "batch.start", { tasks: taskIds, in_flight: next.current_batch });
  const tasks = taskIds.map((taskId) => toDispatchedTask(ctx, next, taskId));
  for (const task of tasks) {
    logOrchestratorEvent(ports.events, "task.dispatch", {
      taskId: task.taskId,
      branch: task.branch,
      workspace: task.workspace,
      iteration: task.iteration,
    });
  }

  return { status: "dispatched", tasks, failures, outcome: deriveRunOutcome(definition, next) };
}

/** Tasks the snapshot says are running, e.g. after a resume. */
export function inFlightTasks(ctx: RunContext): DispatchedTask[] {
  const snapshot = requireSnapshot(ctx);
  return snapshot.current_batch
    .filter((taskId) => ownValue(snapshot.tasks, taskId)?.status === "running")
    .map((taskId) => toDispatchedTask(ctx, snapshot, taskId));
}

/** Probes the design document once; a failed probe cancels the run for good. */
export async function probeCancellation(ctx: RunContext): Promise<boolean> {
  if (ctx.control.cancelledReason !== null) return true;

  const probe = await ctx.ports.designSource.probe();
  if (probe.ok) return false;

  ctx.control.cancelledReason = probe.reason;
  logOrchestratorEvent(ctx.ports.events, "run.cancelled", { reason: probe.reason });
  return true;
}
