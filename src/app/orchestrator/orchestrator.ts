/**
 * Orchestrator facade.
 * Purpose: expose the host callbacks (start, ready check, task complete, shutdown)
 * and the integration step over one run of one design document.
 * Assumptions: one Orchestrator per process owns the StateStore for its run.
 * Usage: const orchestrator = new Orchestrator({ definition, store, ports });
 *        await orchestrator.onStart(); await orchestrator.onReadyCheck(); ...
 */

import type { ProjectDefinition } from "../../core/config.js";
import { logOrchestratorEvent, type EventSink } from "../../core/logger.js";
import { deriveRunOutcome, type RunOutcome } from "../../core/scheduler.js";
import { summarizeSnapshot, type SnapshotSummary, type StateStore } from "../../core/state-store.js";
import { tasksWithStatus, type OrchestratorSnapshot } from "../../core/state.js";

import {
  integrateBranches,
  type IntegrationResult,
} from "./integration/integration-coordinator.js";
import type { AgentRunner, DispatchedTask, OrchestratorPorts } from "./ports.js";
import { completeTask, type CompletionResult } from "./run/complete-task.js";
import { dispatchReadyTasks, inFlightTasks, type DispatchResult } from "./run/dispatch.js";
import { runLoop, type RunHost, type RunLoopOptions, type RunLoopResult } from "./run/run-loop.js";
import { startRun, type StartResult } from "./run/start-run.js";
import { createRunContext, requireSnapshot, type RunContext } from "./run-context.js";

export type OrchestratorOptions = {
  definition: ProjectDefinition;
  store: StateStore;
  ports: OrchestratorPorts;
  runId?: string;
  validatorEnv?: Record<string, string>;
};

export class Orchestrator implements RunHost {
  private readonly ctx: RunContext;

  constructor(options: OrchestratorOptions) {
    this.ctx = createRunContext(options);
  }

  get events(): EventSink {
    return this.ctx.ports.events;
  }

  get definition(): ProjectDefinition {
    return this.ctx.definition;
  }

  // ===========================================================================
  // HOST CALLBACKS
  // ===========================================================================

  onStart(): Promise<StartResult> {
    return startRun(this.ctx);
  }

  onReadyCheck(): Promise<DispatchResult> {
    return this.dispatch();
  }

  dispatch(): Promise<DispatchResult> {
    return dispatchReadyTasks(this.ctx);
  }

  onTaskComplete(taskId: string): Promise<CompletionResult> {
    return completeTask(this.ctx, taskId);
  }

  /** Stops further dispatch. State and workspaces are left as they are. */
  onShutdownRequested(): void {
    if (this.ctx.control.stopRequested) return;
    this.ctx.control.stopRequested = true;
    logOrchestratorEvent(this.ctx.ports.events, "run.shutdown_requested", {});
  }

  // ===========================================================================
  // DRIVER + INTEGRATION
  // ===========================================================================

  runToCompletion(agentRunner: AgentRunner, opts: RunLoopOptions = {}): Promise<RunLoopResult> {
    return runLoop(this, agentRunner, opts);
  }

  integrate(): Promise<IntegrationResult> {
    return integrateBranches(this.ctx);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  snapshot(): OrchestratorSnapshot {
    return requireSnapshot(this.ctx);
  }

  outcome(): RunOutcome {
    return deriveRunOutcome(this.ctx.definition, this.snapshot());
  }

  summary(): SnapshotSummary {
    return summarizeSnapshot(this.ctx.definition, this.snapshot());
  }

  inFlightTasks(): DispatchedTask[] {
    return inFlightTasks(this.ctx);
  }

  validatingTasks(): string[] {
    return tasksWithStatus(this.snapshot(), "validating");
  }

  cancelledReason(): string | null {
    return this.ctx.control.cancelledReason;
  }
}
