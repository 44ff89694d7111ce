/**
 * VCS adapter interface for integration.
 * Purpose: provide the minimal surface the integration coordinator needs to move refs.
 * Assumptions: implementations operate on the primary checkout of a local repository.
 * Usage: inject into OrchestratorPorts and call from the integration coordinator.
 */

import type { FastForwardResult, RebaseResult } from "../../../git/merge.js";

// =============================================================================
// TYPES
// =============================================================================

export interface Vcs {
  ensureCleanWorkingTree(): Promise<void>;
  resolveRef(ref: string): Promise<string>;
  branchExists(branch: string): Promise<boolean>;
  fastForward(targetBranch: string, ref: string): Promise<FastForwardResult>;
  rebaseOnto(worktreePath: string, upstream: string): Promise<RebaseResult>;
  restoreBranch(worktreePath: string, head: string): Promise<void>;
}
