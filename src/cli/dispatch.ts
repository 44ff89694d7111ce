import type { AppContext } from "../app/context.js";
import type { DispatchResult } from "../app/orchestrator/run/dispatch.js";

import { withOrchestrator, type SessionOptions } from "./session.js";

export type DispatchCommandOptions = SessionOptions & {
  json?: boolean;
};

/** One ready check: starts every ready task and prints where each one runs. */
export async function dispatchCommand(
  ctx: AppContext,
  opts: DispatchCommandOptions = {},
): Promise<DispatchResult> {
  const result = await withOrchestrator(ctx, ({ orchestrator }) => orchestrator.onReadyCheck(), opts);

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printDispatch(result);
  }

  if (result.status === "cancelled" || result.failures.length > 0) {
    process.exitCode = 1;
  }
  return result;
}

function printDispatch(result: DispatchResult): void {
  for (const task of result.tasks) {
    console.log(
      `Dispatched ${task.taskId} (attempt ${task.iteration + 1}) on ${task.branch} at ${task.workspace}`,
    );
  }
  for (const failure of result.failures) {
    console.log(`Could not dispatch ${failure.taskId}: ${failure.message}`);
  }

  switch (result.status) {
    case "idle":
      console.log(`Nothing ready to dispatch (outcome: ${result.outcome}).`);
      break;
    case "cancelled":
      console.log("Run cancelled: the design document can no longer be loaded.");
      break;
    case "stopped":
      console.log("Run is stopping; nothing dispatched.");
      break;
    case "dispatched":
      break;
  }
}
