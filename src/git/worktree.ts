// Task worktree helpers.
// Purpose: give each task an isolated checkout on its own branch.
// Assumes repoPath is the primary checkout of a git repository.

import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";

import { git } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorktreeEntry = {
  path: string;
  head?: string;
  branch?: string;
};

export type RemoveWorktreeResult = {
  removed: boolean;
  warnings: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function addWorktree(input: {
  repoPath: string;
  worktreePath: string;
  branch: string;
  startPoint: string;
}): Promise<void> {
  await fse.ensureDir(path.dirname(input.worktreePath));
  await git(input.repoPath, [
    "worktree",
    "add",
    "-b",
    input.branch,
    input.worktreePath,
    input.startPoint,
  ]);
}

export async function listWorktrees(repoPath: string): Promise<WorktreeEntry[]> {
  const res = await git(repoPath, ["worktree", "list", "--porcelain"]);
  return parseWorktreeList(res.stdout);
}

export function parseWorktreeList(output: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const line of output.split("\n")) {
    if (line.startsWith("worktree ")) {
      current = { path: line.slice("worktree ".length) };
      entries.push(current);
      continue;
    }
    if (!current) continue;

    if (line.startsWith("HEAD ")) {
      current.head = line.slice("HEAD ".length);
    } else if (line.startsWith("branch ")) {
      current.branch = line.slice("branch ".length).replace(/^refs\/heads\//, "");
    }
  }

  return entries;
}

/**
 * Removes a task worktree. Safe to call repeatedly: a worktree that is already
 * gone is only pruned. Cleanup failures are returned as warnings.
 */
export async function removeWorktree(input: {
  repoPath: string;
  worktreePath: string;
}): Promise<RemoveWorktreeResult> {
  const target = path.resolve(input.worktreePath);
  const warnings: string[] = [];

  const registered = (await listWorktrees(input.repoPath)).some(
    (entry) => path.resolve(entry.path) === target,
  );

  if (registered) {
    await runBestEffort(warnings, async () => {
      await git(input.repoPath, ["worktree", "remove", "--force", target]);
    });
  }
  await runBestEffort(warnings, async () => {
    await git(input.repoPath, ["worktree", "prune"]);
  });
  if (await fse.pathExists(target)) {
    await runBestEffort(warnings, () => fse.remove(target));
  }

  return { removed: registered, warnings };
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

async function runBestEffort(warnings: string[], step: () => Promise<void>): Promise<void> {
  try {
    await step();
  } catch (error) {
    warnings.push(formatErrorMessage(error));
  }
}
