/**
 * In-process run driver.
 * Purpose: drive dispatch, agent work and completion handling until the run settles.
 * Assumptions: this driver is the only caller of dispatch/complete for the run.
 * Usage: orchestrator.runToCompletion(agentRunner, { probeIntervalMs })
 */

import { OrchestratorError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type EventSink } from "../../../core/logger.js";
import type { RunOutcome } from "../../../core/scheduler.js";
import type { OrchestratorSnapshot } from "../../../core/state.js";
import type { AgentRunner, AgentRunResult, DispatchedTask } from "../ports.js";

import type { CompletionResult } from "./complete-task.js";
import type { DispatchResult } from "./dispatch.js";
import type { StartResult } from "./start-run.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunLoopOutcome = RunOutcome | "cancelled" | "stopped";

export type RunLoopOptions = {
  /** How often the design document is probed while agents are busy. */
  probeIntervalMs?: number;
  signal?: AbortSignal;
};

export type RunLoopResult = {
  outcome: RunLoopOutcome;
  snapshot: OrchestratorSnapshot;
  completions: CompletionResult[];
};

/** The slice of the orchestrator the driver needs. */
export interface RunHost {
  onStart(): Promise<StartResult>;
  dispatch(): Promise<DispatchResult>;
  onTaskComplete(taskId: string): Promise<CompletionResult>;
  onShutdownRequested(): void;
  inFlightTasks(): DispatchedTask[];
  validatingTasks(): string[];
  outcome(): RunOutcome;
  snapshot(): OrchestratorSnapshot;
  readonly events: EventSink;
}

type Wake =
  | { kind: "agent"; taskId: string; result?: AgentRunResult; error?: unknown }
  | { kind: "timer" }
  | { kind: "abort" };

export const DEFAULT_PROBE_INTERVAL_MS = 1000;

// =============================================================================
// DRIVER
// =============================================================================

export async function runLoop(
  host: RunHost,
  agentRunner: AgentRunner,
  opts: RunLoopOptions = {},
): Promise<RunLoopResult> {
  const probeIntervalMs = opts.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS;
  const agents = new AbortController();
  const inFlight = new Map<string, Promise<Wake>>();
  const completions: CompletionResult[] = [];

  let onAbort: (() => void) | undefined;
  const abortWake = new Promise<Wake>((resolve) => {
    onAbort = (): void => {
      host.onShutdownRequested();
      agents.abort();
      resolve({ kind: "abort" });
    };
    if (opts.signal?.aborted) onAbort();
    else opts.signal?.addEventListener("abort", onAbort, { once: true });
  });

  const startAgent = (task: DispatchedTask): void => {
    const work = agentRunner.start(task, agents.signal).then(
      (result): Wake => ({ kind: "agent", taskId: task.taskId, result }),
      (error: unknown): Wake => ({ kind: "agent", taskId: task.taskId, error }),
    );
    inFlight.set(task.taskId, work);
  };

  // Runs on every exit, including a throw from the host.
  const release = async (): Promise<void> => {
    if (onAbort) opts.signal?.removeEventListener("abort", onAbort);
    if (inFlight.size > 0) {
      agents.abort();
      await Promise.allSettled(inFlight.values());
    }
  };

  const drive = async (): Promise<RunLoopOutcome> => {
    await host.onStart();

    // Interrupted validations are redone; interrupted agents are restarted.
    for (const taskId of host.validatingTasks()) {
      completions.push(await host.onTaskComplete(taskId));
    }
    for (const task of host.inFlightTasks()) {
      startAgent(task);
    }

    for (;;) {
      if (opts.signal?.aborted) return "stopped";

      const dispatched = await host.dispatch();
      if (dispatched.status === "stopped") return "stopped";
      if (dispatched.status === "cancelled") return "cancelled";
      for (const task of dispatched.tasks) {
        startAgent(task);
      }

      if (inFlight.size === 0) {
        const outcome = host.outcome();
        if (outcome === "running") {
          throw new OrchestratorError("Run stalled: nothing is in flight and no task is ready.");
        }
        return outcome;
      }

      const wake = await waitForWake([...inFlight.values()], abortWake, probeIntervalMs);
      if (wake.kind === "abort") return "stopped";
      // The next dispatch probes the design document.
      if (wake.kind === "timer") continue;

      inFlight.delete(wake.taskId);
      if (wake.error !== undefined) {
        logOrchestratorEvent(host.events, "agent.error", {
          taskId: wake.taskId,
          message: formatErrorMessage(wake.error),
        });
      }
      if (opts.signal?.aborted) return "stopped";
      completions.push(await host.onTaskComplete(wake.taskId));
    }
  };

  let outcome: RunLoopOutcome;
  try {
    outcome = await drive();
  } finally {
    await release();
  }

  logOrchestratorEvent(host.events, "run.stop", { outcome, completed: completions.length });
  return { outcome, snapshot: host.snapshot(), completions };
}

async function waitForWake(
  work: Promise<Wake>[],
  abortWake: Promise<Wake>,
  probeIntervalMs: number,
): Promise<Wake> {
  let timer: NodeJS.Timeout | undefined;
  const timerWake = new Promise<Wake>((resolve) => {
    timer = setTimeout(() => resolve({ kind: "timer" }), probeIntervalMs);
  });

  try {
    return await Promise.race([...work, abortWake, timerWake]);
  } finally {
    clearTimeout(timer);
  }
}
