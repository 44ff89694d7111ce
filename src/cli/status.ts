import type { AppContext } from "../app/context.js";
import { createStateStore } from "../app/orchestrator/run-context-builder.js";
import { summarizeSnapshot, type SnapshotSummary, type TaskStatusRow } from "../core/state-store.js";

import { normalizeCommandError } from "./command-errors.js";

export type StatusCommandOptions = {
  json?: boolean;
};

export async function statusCommand(ctx: AppContext, opts: StatusCommandOptions = {}): Promise<void> {
  try {
    const store = createStateStore(ctx.definition, ctx.paths);
    const snapshot = await store.load();
    if (!snapshot) {
      printRunNotFound(ctx, opts);
      return;
    }

    const summary = summarizeSnapshot(ctx.definition, snapshot);
    if (opts.json) {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }

    printRunSummary(summary);
    printTaskTable(summary.tasks);
  } catch (error) {
    throw normalizeCommandError(error);
  }
}

function printRunNotFound(ctx: AppContext, opts: StatusCommandOptions): void {
  if (opts.json) {
    console.log(JSON.stringify({ run: null }));
  } else {
    console.log(`No saved run for ${ctx.repoPath}.`);
    console.log("Start a run with: stratum run (or stratum dispatch)");
  }
  process.exitCode = 1;
}

function printRunSummary(summary: SnapshotSummary): void {
  console.log(`Run: ${summary.runId} (sequence ${summary.sequence})`);
  console.log(`Outcome: ${summary.outcome}`);
  console.log(`Started: ${summary.startedAt}`);
  console.log(`Updated: ${summary.updatedAt}`);
  console.log("");
  console.log(formatTaskCounts(summary));
  if (summary.currentBatch.length > 0) {
    console.log(`In flight: ${summary.currentBatch.join(", ")}`);
  }
  if (summary.integratedBranches.length > 0) {
    console.log(`Integrated: ${summary.integratedBranches.join(", ")}`);
  }
  console.log("");
}

function formatTaskCounts(summary: SnapshotSummary): string {
  const counts = summary.taskCounts;
  const parts = [
    `total=${counts.total}`,
    `pending=${counts.pending}`,
    `running=${counts.running}`,
    `validating=${counts.validating}`,
    `passed=${counts.passed}`,
    `failed=${counts.failed}`,
  ];
  return `Tasks: ${parts.join("  ")}`;
}

function printTaskTable(rows: TaskStatusRow[]): void {
  if (rows.length === 0) {
    console.log("No tasks.");
    return;
  }

  const idWidth = Math.max("ID".length, ...rows.map((row) => row.id.length));
  const statusWidth = Math.max("STATUS".length, ...rows.map((row) => row.status.length));
  const iterWidth = "ITER".length;

  console.log(`${pad("ID", idWidth)}  ${pad("STATUS", statusWidth)}  ${pad("ITER", iterWidth)}  BRANCH`);
  for (const row of rows) {
    console.log(
      `${pad(row.id, idWidth)}  ${pad(row.status, statusWidth)}  ${pad(String(row.iteration), iterWidth)}  ${row.branch}`,
    );
    if (row.lastError) {
      console.log(`  last error: ${firstLine(row.lastError)}`);
    }
  }
}

function firstLine(text: string): string {
  const [first = ""] = text.split("\n");
  return first;
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
