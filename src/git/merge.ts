import { GitError } from "../core/errors.js";

import { checkout, currentBranch, ensureCleanWorkingTree, git, headSha, isAncestor } from "./git.js";

export type FastForwardResult =
  | {
      status: "fast_forwarded";
      previousHead: string;
      head: string;
    }
  | {
      status: "blocked";
      reason: "non_fast_forward";
      message: string;
      currentHead: string;
      targetRef: string;
    };

export type RebaseResult =
  | { status: "rebased"; head: string }
  | { status: "conflict"; message: string; aborted: boolean };

export async function fastForward(opts: {
  repoPath: string;
  mainBranch: string;
  targetRef: string;
}): Promise<FastForwardResult> {
  const { repoPath, mainBranch, targetRef } = opts;

  await ensureCleanWorkingTree(repoPath);
  if ((await currentBranch(repoPath)) !== mainBranch) {
    await checkout(repoPath, mainBranch);
  }

  const currentHead = await headSha(repoPath);
  const canFastForward = await isAncestor(repoPath, currentHead, targetRef);
  if (!canFastForward) {
    return {
      status: "blocked",
      reason: "non_fast_forward",
      message: `Cannot fast-forward ${mainBranch} to ${targetRef}.`,
      currentHead,
      targetRef,
    };
  }

  await git(repoPath, ["merge", "--ff-only", targetRef]);
  const nextHead = await headSha(repoPath);

  return { status: "fast_forwarded", previousHead: currentHead, head: nextHead };
}

/**
 * Rebases the branch checked out in `worktreePath` onto `upstream`.
 * A conflicting rebase is aborted so the worktree is left as it was.
 */
export async function rebaseOnto(opts: {
  worktreePath: string;
  upstream: string;
}): Promise<RebaseResult> {
  const { worktreePath, upstream } = opts;

  try {
    await git(worktreePath, ["rebase", upstream]);
  } catch (err) {
    const message = err instanceof GitError ? err.message : String(err);
    let aborted = true;
    try {
      await git(worktreePath, ["rebase", "--abort"]);
    } catch {
      aborted = false;
    }
    return { status: "conflict", message, aborted };
  }

  return { status: "rebased", head: await headSha(worktreePath) };
}

/** Points the branch checked out in `worktreePath` back at `head`, e.g. to undo a rebase. */
export async function resetWorktreeBranch(opts: { worktreePath: string; head: string }): Promise<void> {
  await git(opts.worktreePath, ["reset", "--hard", opts.head]);
}
