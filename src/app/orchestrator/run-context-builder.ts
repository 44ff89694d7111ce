/**
 * Orchestrator builder for CLI runs.
 * Purpose: wire the git, shell, file-state and log adapters behind the orchestrator ports.
 * Assumptions: the design document is already loaded and validated by the caller.
 * Usage: const { orchestrator, close } = buildOrchestrator({ repoPath, definition, paths }).
 */

import type { ProjectDefinition } from "../../core/config.js";
import { JsonlLogger } from "../../core/logger.js";
import { orchestratorLogPath, stateDir, type PathsContext } from "../../core/paths.js";
import { FileSnapshotBackend, StateStore } from "../../core/state-store.js";
import { isoNow } from "../../core/utils.js";
import { ShellExecutor } from "../../validators/executor.js";

import { FileDesignSource } from "./design-source.js";
import { Orchestrator } from "./orchestrator.js";
import type { Clock, OrchestratorPorts } from "./ports.js";
import { createGitVcs } from "./vcs/git-vcs.js";
import { GitWorkspaceManager } from "./workspaces/git-workspace-manager.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildOrchestratorInput = {
  repoPath: string;
  definition: ProjectDefinition;
  paths: PathsContext;
  runId?: string;
  ports?: Partial<OrchestratorPorts>;
};

export type BuiltOrchestrator = {
  orchestrator: Orchestrator;
  store: StateStore;
  logger: JsonlLogger;
  ports: OrchestratorPorts;
  close: () => void;
};

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createStateStore(definition: ProjectDefinition, paths: PathsContext): StateStore {
  return new StateStore(
    new FileSnapshotBackend(stateDir(paths), {
      keepSnapshots: definition.config.state.keep_snapshots,
    }),
  );
}

export function createDefaultPorts(input: {
  repoPath: string;
  definition: ProjectDefinition;
  logger: JsonlLogger;
}): OrchestratorPorts {
  const { repoPath, definition, logger } = input;
  return {
    workspaces: new GitWorkspaceManager({ repoPath, worktree: definition.config.worktree }),
    vcs: createGitVcs({ repoPath }),
    executor: new ShellExecutor(),
    designSource: new FileDesignSource(definition.source.path),
    events: logger,
    clock: systemClock,
  };
}

export async function buildOrchestrator(input: BuildOrchestratorInput): Promise<BuiltOrchestrator> {
  const { repoPath, definition, paths } = input;
  const logger = new JsonlLogger(orchestratorLogPath(paths), { runId: input.runId ?? "pending" });
  const store = createStateStore(definition, paths);
  const ports: OrchestratorPorts = {
    ...createDefaultPorts({ repoPath, definition, logger }),
    ...input.ports,
  };

  const orchestrator = new Orchestrator({ definition, store, ports, runId: input.runId });
  try {
    const started = await orchestrator.onStart();
    logger.withRunId(started.snapshot.run_id);
  } catch (err) {
    logger.close();
    throw err;
  }

  return { orchestrator, store, logger, ports, close: () => logger.close() };
}
