import type { AppContext } from "../app/context.js";
import { createStateStore } from "../app/orchestrator/run-context-builder.js";
import { JsonlLogger, logOrchestratorEvent } from "../core/logger.js";
import { orchestratorLogPath } from "../core/paths.js";

import { normalizeCommandError } from "./command-errors.js";

/** Discards the saved run. Task worktrees and branches stay where they are. */
export async function resetCommand(ctx: AppContext): Promise<void> {
  try {
    const store = createStateStore(ctx.definition, ctx.paths);
    const snapshot = await store.load();
    if (!snapshot) {
      console.log("No saved run to discard.");
      return;
    }

    await store.reset();

    const logger = new JsonlLogger(orchestratorLogPath(ctx.paths), { runId: snapshot.run_id });
    try {
      logOrchestratorEvent(logger, "state.reset", { sequence: snapshot.sequence });
    } finally {
      logger.close();
    }

    console.log(`Discarded run ${snapshot.run_id} (sequence ${snapshot.sequence}).`);
    console.log(
      `Task worktrees under ${ctx.definition.config.worktree.base_dir} and their branches were left in place.`,
    );
  } catch (error) {
    throw normalizeCommandError(error);
  }
}
