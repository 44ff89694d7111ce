/**
 * Git worktree-backed workspace manager.
 * Purpose: isolate each task on its own branch in `<base_dir>/<branch>`.
 * Assumptions: repoPath is the primary checkout; worktrees share its object store.
 */

import type { ResolvedTask, WorktreeConfig } from "../../../core/config.js";
import { GitError, WorkspaceError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { worktreePath } from "../../../core/paths.js";
import { resolveIntegrationTarget } from "../../../git/branches.js";
import { branchExists, isAncestor, isLinkedWorktree } from "../../../git/git.js";
import { addWorktree, removeWorktree } from "../../../git/worktree.js";
import type { WorkspaceHandle, WorkspaceManager } from "../ports.js";

export type GitWorkspaceManagerOptions = {
  repoPath: string;
  worktree: WorktreeConfig;
};

export class GitWorkspaceManager implements WorkspaceManager {
  constructor(private readonly options: GitWorkspaceManagerOptions) {}

  async createWorkspace(task: ResolvedTask): Promise<WorkspaceHandle> {
    const { repoPath, worktree } = this.options;
    const target = worktreePath(repoPath, worktree.base_dir, task.branch);

    if (await branchExists(repoPath, task.branch)) {
      throw new WorkspaceError(
        `Cannot create workspace for task ${task.id}: branch ${task.branch} already exists.`,
      );
    }

    try {
      const startPoint = await this.integrationTarget();
      await addWorktree({ repoPath, worktreePath: target, branch: task.branch, startPoint });
    } catch (err) {
      throw new WorkspaceError(
        `Cannot create workspace for task ${task.id}: ${formatErrorMessage(err)}`,
        err,
      );
    }

    return { taskId: task.id, path: target, branch: task.branch };
  }

  async destroyWorkspace(handle: WorkspaceHandle): Promise<string[]> {
    const result = await removeWorktree({
      repoPath: this.options.repoPath,
      worktreePath: handle.path,
    });
    return result.warnings;
  }

  async isIsolatedContext(dir: string): Promise<boolean> {
    try {
      return await isLinkedWorktree(dir);
    } catch (err) {
      if (err instanceof GitError) return false;
      throw err;
    }
  }

  integrationTarget(): Promise<string> {
    return resolveIntegrationTarget(this.options.repoPath, this.options.worktree.main_branch);
  }

  isAncestorOf(ancestor: string, descendant: string): Promise<boolean> {
    return isAncestor(this.options.repoPath, ancestor, descendant);
  }
}
