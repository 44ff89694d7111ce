/**
 * Git-backed VCS adapter.
 * Purpose: map Vcs interface calls to the git helpers, bound to one repository.
 * Assumptions: git is available and the repo path is local.
 * Usage: createGitVcs({ repoPath }) and inject into OrchestratorPorts.
 */

import { branchExists, ensureCleanWorkingTree, resolveRef } from "../../../git/git.js";
import { fastForward, rebaseOnto, resetWorktreeBranch } from "../../../git/merge.js";

import type { Vcs } from "./vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitVcsOptions = {
  repoPath: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(options: GitVcsOptions): Vcs {
  const { repoPath } = options;

  return {
    ensureCleanWorkingTree: () => ensureCleanWorkingTree(repoPath),
    resolveRef: (ref) => resolveRef(repoPath, ref),
    branchExists: (branch) => branchExists(repoPath, branch),
    fastForward: (targetBranch, ref) =>
      fastForward({ repoPath, mainBranch: targetBranch, targetRef: ref }),
    rebaseOnto: (worktreePath, upstream) => rebaseOnto({ worktreePath, upstream }),
    restoreBranch: (worktreePath, head) => resetWorktreeBranch({ worktreePath, head }),
  };
}
