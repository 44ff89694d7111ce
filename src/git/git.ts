import path from "node:path";

import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export type GitErrorOutput = { stdout: string; stderr: string };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return { stdout: toText(res.stdout), stderr: toText(res.stderr), exitCode: res.exitCode ?? -1 };
  } catch (err) {
    throw buildGitError(args, cwd, err);
  }
}

export async function ensureCleanWorkingTree(cwd: string): Promise<void> {
  // Untracked files (.worktrees/, .stratum/) do not count.
  const res = await git(cwd, ["status", "--porcelain", "--untracked-files=no"]);
  if (res.stdout.trim().length > 0) {
    throw new GitError(
      `Repository has uncommitted changes (cwd=${cwd}). Please commit/stash before running.`,
    );
  }
}

export async function currentBranch(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
  return res.stdout.trim();
}

export async function headSha(cwd: string): Promise<string> {
  return resolveRef(cwd, "HEAD");
}

export async function resolveRef(cwd: string, ref: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--verify", `${ref}^{commit}`]);
  return res.stdout.trim();
}

export async function isAncestor(
  repoPath: string,
  ancestorRef: string,
  descendantRef: string,
): Promise<boolean> {
  const args = ["merge-base", "--is-ancestor", ancestorRef, descendantRef];
  const res = await execa("git", args, {
    cwd: repoPath,
    stdio: "pipe",
    reject: false,
  });

  if (res.exitCode === 0) return true;
  if (res.exitCode === 1) return false;

  const stdout = toText(res.stdout);
  const stderr = toText(res.stderr);
  throw new GitError(`git ${args.join(" ")} failed (cwd=${repoPath}): ${stderr}`, {
    stdout,
    stderr,
  });
}

export async function checkout(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["checkout", branch]);
}

export async function branchExists(cwd: string, branch: string): Promise<boolean> {
  const res = await execa("git", ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`], {
    cwd,
    stdio: "pipe",
    reject: false,
  });
  return res.exitCode === 0;
}

/** A linked worktree has its own git dir, separate from the shared common dir. */
export async function isLinkedWorktree(cwd: string): Promise<boolean> {
  const res = await git(cwd, ["rev-parse", "--git-dir", "--git-common-dir"]);
  const [gitDir, commonDir] = res.stdout.trim().split("\n");
  if (!gitDir || !commonDir) {
    throw new GitError(`Unexpected rev-parse output (cwd=${cwd}): ${res.stdout}`);
  }
  return path.resolve(cwd, gitDir) !== path.resolve(cwd, commonDir);
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

export function buildGitError(args: string[], cwd: string | undefined, err: unknown): GitError {
  const { stdout, stderr, message } = resolveExecaErrorOutput(err);
  const detail = stderr || message || "Unknown git error.";
  const location = cwd ? ` (cwd=${cwd})` : "";
  return new GitError(`git ${args.join(" ")} failed${location}: ${detail}`, { stdout, stderr });
}

export function gitErrorOutput(err: GitError): GitErrorOutput {
  const { stdout, stderr } = resolveExecaErrorOutput(err.cause);
  return { stdout, stderr };
}

function resolveExecaErrorOutput(err: unknown): GitErrorOutput & { message: string } {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "", message: String(err) };
  }

  const stdout = "stdout" in err ? toText(err.stdout) : "";
  const stderr = "stderr" in err ? toText(err.stderr) : "";
  const message = "message" in err && typeof err.message === "string" ? err.message : "";

  return { stdout, stderr, message };
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}
