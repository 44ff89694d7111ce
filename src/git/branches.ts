import { GitError } from "../core/errors.js";

import { branchExists } from "./git.js";

const FALLBACK_TARGETS = ["main", "master"];

export function buildTaskBranchName(prefix: string, taskId: string): string {
  const trimmed = prefix.replace(/\/+$/, "");
  return trimmed.length > 0 ? `${trimmed}/${taskId}` : taskId;
}

/** The preferred branch if it exists, else main, else master. */
export async function resolveIntegrationTarget(repoPath: string, preferred: string): Promise<string> {
  const candidates = [preferred, ...FALLBACK_TARGETS.filter((name) => name !== preferred)];

  for (const candidate of candidates) {
    if (await branchExists(repoPath, candidate)) {
      return candidate;
    }
  }

  throw new GitError(
    `No integration branch found in ${repoPath} (tried ${candidates.join(", ")}).`,
  );
}
