/**
 * Orchestrator ports define the boundary between the run engine and adapters.
 * Purpose: make dependencies explicit and replaceable for testing.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: provide implementations via `createDefaultPorts` or fakes in tests.
 */

import type { ResolvedTask, ResolvedValidator } from "../../core/config.js";
import type { EventSink } from "../../core/logger.js";
import type { Executor } from "../../validators/executor.js";

import type { Vcs } from "./vcs/vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkspaceHandle = {
  taskId: string;
  path: string;
  branch: string;
};

/** What a host needs to start work on one task. */
export type DispatchedTask = {
  taskId: string;
  description: string;
  layer: string;
  agent: string;
  branch: string;
  workspace: string;
  validators: ResolvedValidator[];
  iteration: number;
  previousErrors: string[];
  command?: string;
};

export type AgentRunResult = {
  exitCode: number | null;
  output: string;
};

export type DesignProbeResult = { ok: true; fingerprint: string } | { ok: false; reason: string };

// =============================================================================
// PORTS
// =============================================================================

export interface WorkspaceManager {
  createWorkspace(task: ResolvedTask): Promise<WorkspaceHandle>;
  /** Idempotent. Returns cleanup warnings. */
  destroyWorkspace(handle: WorkspaceHandle): Promise<string[]>;
  isIsolatedContext(dir: string): Promise<boolean>;
  integrationTarget(): Promise<string>;
  isAncestorOf(ancestor: string, descendant: string): Promise<boolean>;
}

export interface AgentRunner {
  /** Resolves when the agent stops. The result is informational; validators decide. */
  start(task: DispatchedTask, signal: AbortSignal): Promise<AgentRunResult>;
}

/** Re-reads the design document so a removed or broken document cancels the run. */
export interface DesignSource {
  probe(): Promise<DesignProbeResult>;
}

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export type OrchestratorPorts = {
  workspaces: WorkspaceManager;
  vcs: Vcs;
  executor: Executor;
  designSource: DesignSource;
  events: EventSink;
  clock: Clock;
};
