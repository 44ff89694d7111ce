import path from "node:path";

import type { AppContext } from "../app/context.js";
import type { CompletionResult } from "../app/orchestrator/run/complete-task.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { OrchestratorSnapshot } from "../core/state.js";

import { withOrchestrator, type SessionOptions } from "./session.js";

export type CompleteCommandOptions = SessionOptions & {
  taskId?: string;
  json?: boolean;
  cwd?: string;
};

/**
 * Signals that a task's agent is done. Without an explicit id the task is
 * taken from the worktree the command runs in.
 */
export async function completeCommand(
  ctx: AppContext,
  opts: CompleteCommandOptions = {},
): Promise<CompletionResult> {
  const cwd = opts.cwd ?? process.cwd();

  const result = await withOrchestrator(
    ctx,
    async ({ orchestrator, ports }) => {
      const taskId =
        opts.taskId ??
        (await inferTaskId(orchestrator.snapshot(), cwd, (dir) =>
          ports.workspaces.isIsolatedContext(dir),
        ));
      return orchestrator.onTaskComplete(taskId);
    },
    opts,
  );

  if (opts.json) {
    const { validation, ...rest } = result;
    console.log(JSON.stringify({ ...rest, validators: validation.results }, null, 2));
  } else {
    printCompletion(result, ctx.definition.config.project.max_iterations);
  }

  if (result.status !== "passed") {
    process.exitCode = 1;
  }
  return result;
}

export async function inferTaskId(
  snapshot: OrchestratorSnapshot,
  cwd: string,
  isIsolated: (dir: string) => Promise<boolean>,
): Promise<string> {
  const dir = path.resolve(cwd);
  const match = Object.entries(snapshot.tasks).find(([, state]) => {
    if (!state.workspace) return false;
    const workspace = path.resolve(state.workspace);
    return dir === workspace || dir.startsWith(`${workspace}${path.sep}`);
  });

  if (match) {
    const [taskId, state] = match;
    if (state.workspace && (await isIsolated(state.workspace))) {
      return taskId;
    }
  }

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.task,
    title: "Cannot tell which task to complete.",
    message: `${dir} is not the worktree of a dispatched task.`,
    hint: "Pass the task id (`stratum complete <taskId>`) or run the command inside the task's worktree.",
  });
}

function printCompletion(result: CompletionResult, maxIterations: number): void {
  switch (result.status) {
    case "passed":
      console.log(`Task ${result.taskId} passed validation.`);
      break;
    case "retry":
      console.log(
        `Task ${result.taskId} failed validation (attempt ${result.iteration} of ${maxIterations}); it will be dispatched again.`,
      );
      break;
    case "failed":
      console.log(`Task ${result.taskId} failed validation after ${result.iteration} attempt(s).`);
      break;
  }

  for (const error of result.errors) {
    console.log(`  ${error}`);
  }
  console.log(`Run outcome: ${result.outcome}`);
}
