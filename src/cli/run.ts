import type { AppContext } from "../app/context.js";
import { ShellAgentRunner } from "../app/orchestrator/agents/agent-runner.js";
import type { AgentRunner, OrchestratorPorts } from "../app/orchestrator/ports.js";
import type { RunLoopResult } from "../app/orchestrator/run/run-loop.js";

import { withOrchestrator, type SessionOptions } from "./session.js";

export type RunCommandOptions = SessionOptions & {
  pollIntervalMs?: number;
  signal?: AbortSignal;
  agentRunner?: (ports: OrchestratorPorts) => AgentRunner;
};

// =============================================================================
// COMMAND
// =============================================================================

/**
 * Drives the run in process: each dispatched task's `command` runs in its
 * worktree, then its validators. SIGINT/SIGTERM stop the run and leave state
 * and worktrees for the next `stratum run`.
 */
export async function runCommand(
  ctx: AppContext,
  opts: RunCommandOptions = {},
): Promise<RunLoopResult> {
  const stop = createStopSignal(opts.signal);

  try {
    const result = await withOrchestrator(
      ctx,
      async ({ orchestrator, ports }) => {
        const start = await orchestrator.onStart();
        if (start.mode === "resume") {
          console.log(
            `Resuming run ${start.snapshot.run_id} from snapshot ${start.snapshot.sequence}.`,
          );
          if (start.designChanged) {
            console.log("The design document changed since the run started.");
          }
        }

        const agentRunner =
          opts.agentRunner?.(ports) ?? new ShellAgentRunner(ports.executor, ports.events);
        return orchestrator.runToCompletion(agentRunner, {
          probeIntervalMs: opts.pollIntervalMs,
          signal: stop.signal,
        });
      },
      opts,
    );

    printRunResult(result);
    if (result.outcome !== "complete") {
      process.exitCode = 1;
    }
    return result;
  } finally {
    stop.cleanup();
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

function printRunResult(result: RunLoopResult): void {
  for (const completion of result.completions) {
    const [error] = completion.errors;
    const detail = error ? `: ${firstLine(error)}` : "";
    console.log(`${completion.taskId}: ${completion.status}${detail}`);
  }

  switch (result.outcome) {
    case "complete":
      console.log("All tasks passed. Next: stratum integrate");
      break;
    case "failed":
    case "blocked":
      console.log(`Run ${result.outcome}. See \`stratum status\` for the failing tasks.`);
      break;
    case "cancelled":
      console.log("Run cancelled: the design document can no longer be loaded. State was kept.");
      break;
    case "stopped":
      console.log("Run stopped. Rerun `stratum run` to resume.");
      break;
    case "running":
      console.log("Run is still in progress.");
      break;
  }
}

function firstLine(text: string): string {
  const [first = ""] = text.split("\n");
  return first;
}

// =============================================================================
// SIGNALS
// =============================================================================

type StopSignal = {
  signal: AbortSignal;
  cleanup: () => void;
};

function createStopSignal(external?: AbortSignal): StopSignal {
  const controller = new AbortController();
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  const onSignal = (signal: NodeJS.Signals): void => {
    console.log(`Received ${signal}. Stopping after the current step; rerun \`stratum run\` to resume.`);
    controller.abort(signal);
  };
  const onExternalAbort = (): void => controller.abort(external?.reason);

  for (const signal of signals) {
    process.once(signal, onSignal);
  }
  if (external?.aborted) controller.abort(external.reason);
  else external?.addEventListener("abort", onExternalAbort, { once: true });

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const signal of signals) {
        process.removeListener(signal, onSignal);
      }
      external?.removeEventListener("abort", onExternalAbort);
    },
  };
}
