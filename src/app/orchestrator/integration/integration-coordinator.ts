/**
 * Integration coordinator.
 * Purpose: fast-forward the integration target through every passed task branch in
 * dependency order, after verifying the whole chain is linear.
 * Assumptions: every task has passed; the primary checkout is clean.
 * Usage: orchestrator.integrate()
 */

import { IntegrationError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent } from "../../../core/logger.js";
import type { OrchestratorSnapshot } from "../../../core/state.js";
import { requireSnapshot, requireTaskState, type RunContext } from "../run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type SkipReason = "integrated" | "contained";

export type PlannedStep =
  | { kind: "advance"; taskId: string; branch: string; rebased: boolean }
  | { kind: "skip"; taskId: string; branch: string; reason: SkipReason };

export type IntegrationStep = {
  taskId: string;
  branch: string;
  previousHead: string;
  head: string;
  rebased: boolean;
};

export type IntegrationResult = {
  target: string;
  steps: IntegrationStep[];
  skipped: { taskId: string; branch: string; reason: SkipReason }[];
  cleanupWarnings: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function integrateBranches(ctx: RunContext): Promise<IntegrationResult> {
  const { ports } = ctx;

  try {
    const snapshot = requireSnapshot(ctx);
    assertAllPassed(ctx, snapshot);

    const target = await ports.workspaces.integrationTarget();
    await ports.vcs.ensureCleanWorkingTree();
    logOrchestratorEvent(ports.events, "integration.start", {
      target,
      branches: snapshot.completed_branches,
    });

    const plan = await planIntegration(ctx, snapshot, target);
    const steps = await executePlan(ctx, plan, target);
    const cleanupWarnings = await cleanupWorkspaces(ctx);

    const skipped = plan.flatMap((step) =>
      step.kind === "skip" ? [{ taskId: step.taskId, branch: step.branch, reason: step.reason }] : [],
    );
    logOrchestratorEvent(ports.events, "integration.complete", {
      target,
      integrated: steps.map((step) => step.branch),
      skipped: skipped.map((step) => step.branch),
    });

    return { target, steps, skipped, cleanupWarnings };
  } catch (err) {
    if (err instanceof IntegrationError) {
      logOrchestratorEvent(ports.events, "integration.blocked", {
        reason: err.reason,
        message: err.message,
        ...(err.taskId ? { taskId: err.taskId } : {}),
      });
    }
    throw err;
  }
}

// =============================================================================
// PLANNING
// =============================================================================

function assertAllPassed(ctx: RunContext, snapshot: OrchestratorSnapshot): void {
  const unfinished = ctx.definition.taskOrder.filter(
    (taskId) => requireTaskState(snapshot, taskId).status !== "passed",
  );
  if (unfinished.length === 0) return;

  throw new IntegrationError(
    `Cannot integrate: ${unfinished.length} task(s) have not passed (${unfinished.join(", ")}).`,
    "incomplete",
  );
}

type RewrittenBranch = { taskId: string; branch: string; workspace: string; previousHead: string };

/**
 * Walks the tasks in dependency order and checks that each branch descends from
 * the previous tip. Nothing on the target moves here; with `worktree.rebase`
 * task branches are rebased onto the planned tip first, and put back where they
 * were if a later branch blocks the plan.
 */
async function planIntegration(
  ctx: RunContext,
  snapshot: OrchestratorSnapshot,
  target: string,
): Promise<PlannedStep[]> {
  const rewritten: RewrittenBranch[] = [];
  try {
    return await walkBranches(ctx, snapshot, target, rewritten);
  } catch (err) {
    throw await restoreRewritten(ctx, rewritten, err);
  }
}

async function walkBranches(
  ctx: RunContext,
  snapshot: OrchestratorSnapshot,
  target: string,
  rewritten: RewrittenBranch[],
): Promise<PlannedStep[]> {
  const { ports, definition } = ctx;
  const rebase = definition.config.worktree.rebase;
  const plan: PlannedStep[] = [];
  let tip = await ports.vcs.resolveRef(target);

  for (const taskId of definition.taskOrder) {
    const state = requireTaskState(snapshot, taskId);
    const branch = state.branch;

    if (snapshot.integrated_branches.includes(branch)) {
      plan.push({ kind: "skip", taskId, branch, reason: "integrated" });
      continue;
    }

    if (!(await ports.vcs.branchExists(branch))) {
      throw new IntegrationError(
        `Branch ${branch} of task ${taskId} no longer exists.`,
        "missing_branch",
        taskId,
      );
    }

    if (await ports.workspaces.isAncestorOf(branch, tip)) {
      plan.push({ kind: "skip", taskId, branch, reason: "contained" });
      continue;
    }

    let rebased = false;
    if (rebase && !(await ports.workspaces.isAncestorOf(tip, branch))) {
      const previousHead = await ports.vcs.resolveRef(branch);
      const workspace = await rebaseTaskBranch(ctx, taskId, state.workspace, tip);
      rewritten.push({ taskId, branch, workspace, previousHead });
      rebased = true;
    }

    if (!(await ports.workspaces.isAncestorOf(tip, branch))) {
      throw new IntegrationError(
        `Branch ${branch} of task ${taskId} does not descend from the integrated history; ` +
          `rebase it onto ${target} or set worktree.rebase.`,
        "not_linear",
        taskId,
      );
    }

    plan.push({ kind: "advance", taskId, branch, rebased });
    tip = await ports.vcs.resolveRef(branch);
  }

  return plan;
}

async function rebaseTaskBranch(
  ctx: RunContext,
  taskId: string,
  workspace: string | undefined,
  upstream: string,
): Promise<string> {
  if (!workspace) {
    throw new IntegrationError(
      `Cannot rebase task ${taskId}: its workspace is gone.`,
      "rebase_conflict",
      taskId,
    );
  }

  const result = await ctx.ports.vcs.rebaseOnto(workspace, upstream);
  if (result.status === "conflict") {
    throw new IntegrationError(
      `Rebase of task ${taskId} onto ${upstream} failed: ${result.message}`,
      "rebase_conflict",
      taskId,
    );
  }
  return workspace;
}

/** Undoes planning rebases, newest first, and returns the error to raise. */
async function restoreRewritten(
  ctx: RunContext,
  rewritten: RewrittenBranch[],
  cause: unknown,
): Promise<unknown> {
  const failures: string[] = [];

  for (const entry of [...rewritten].reverse()) {
    try {
      await ctx.ports.vcs.restoreBranch(entry.workspace, entry.previousHead);
      logOrchestratorEvent(ctx.ports.events, "integration.restore", {
        taskId: entry.taskId,
        branch: entry.branch,
        head: entry.previousHead,
      });
    } catch (err) {
      const message = formatErrorMessage(err);
      failures.push(`${entry.branch} (was ${entry.previousHead}): ${message}`);
      logOrchestratorEvent(ctx.ports.events, "integration.restore_failed", {
        taskId: entry.taskId,
        branch: entry.branch,
        head: entry.previousHead,
        message,
      });
    }
  }

  if (failures.length === 0 || !(cause instanceof IntegrationError)) return cause;
  return new IntegrationError(
    `${cause.message} Restoring rebased branches failed: ${failures.join("; ")}`,
    cause.reason,
    cause.taskId,
    cause,
  );
}

// =============================================================================
// EXECUTION
// =============================================================================

async function executePlan(
  ctx: RunContext,
  plan: PlannedStep[],
  target: string,
): Promise<IntegrationStep[]> {
  const { ports, store } = ctx;
  const steps: IntegrationStep[] = [];

  for (const planned of plan) {
    if (planned.kind === "skip") {
      if (planned.reason === "contained") {
        await store.commit({ type: "mark_integrated", at: ports.clock.isoNow(), branch: planned.branch });
      }
      continue;
    }

    const result = await ports.vcs.fastForward(target, planned.branch).catch((err: unknown) => {
      throw new IntegrationError(
        `Fast-forward of ${target} to ${planned.branch} failed: ${formatErrorMessage(err)}`,
        "fast_forward_failed",
        planned.taskId,
        err,
      );
    });
    if (result.status === "blocked") {
      throw new IntegrationError(result.message, "fast_forward_failed", planned.taskId);
    }

    await store.commit({ type: "mark_integrated", at: ports.clock.isoNow(), branch: planned.branch });
    const step: IntegrationStep = {
      taskId: planned.taskId,
      branch: planned.branch,
      previousHead: result.previousHead,
      head: result.head,
      rebased: planned.rebased,
    };
    steps.push(step);
    logOrchestratorEvent(ports.events, "integration.step", {
      taskId: step.taskId,
      branch: step.branch,
      previous_head: step.previousHead,
      head: step.head,
      rebased: step.rebased,
    });
  }

  return steps;
}

async function cleanupWorkspaces(ctx: RunContext): Promise<string[]> {
  const { ports, definition } = ctx;
  if (!definition.config.worktree.cleanup_on_success) return [];

  const snapshot = requireSnapshot(ctx);
  const warnings: string[] = [];

  for (const taskId of definition.taskOrder) {
    const state = requireTaskState(snapshot, taskId);
    if (!state.workspace) continue;

    const taskWarnings = await ports.workspaces.destroyWorkspace({
      taskId,
      path: state.workspace,
      branch: state.branch,
    });
    warnings.push(...taskWarnings);
    logOrchestratorEvent(ports.events, "workspace.cleanup", {
      taskId,
      workspace: state.workspace,
      warnings: taskWarnings,
    });
  }

  return warnings;
}
