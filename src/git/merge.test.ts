import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempGitRepo, type TempGitRepo } from "../__tests__/helpers/temp-git-repo.js";

import { headSha, resolveRef } from "./git.js";
import { fastForward, rebaseOnto, resetWorktreeBranch } from "./merge.js";

let repo: TempGitRepo;

beforeEach(async () => {
  repo = await createTempGitRepo();
});

afterEach(async () => {
  await repo.cleanup();
});

async function branchWithCommit(branch: string, file: string, contents: string): Promise<string> {
  const worktree = path.join(repo.tempRoot, branch);
  await repo.git(["worktree", "add", "-b", branch, worktree, "main"]);
  await repo.writeFile(file, contents, worktree);
  await repo.commit(`${branch} work`, worktree);
  return worktree;
}

describe("fastForward", () => {
  it("moves the target branch to a descendant", async () => {
    const before = await headSha(repo.repoDir);
    await branchWithCommit("feature", "feature.txt", "feature\n");
    const featureHead = await resolveRef(repo.repoDir, "feature");

    const result = await fastForward({ repoPath: repo.repoDir, mainBranch: "main", targetRef: "feature" });

    expect(result).toEqual({ status: "fast_forwarded", previousHead: before, head: featureHead });
    expect(await resolveRef(repo.repoDir, "main")).toBe(featureHead);
  });

  it("refuses a branch that does not descend from the target", async () => {
    await branchWithCommit("feature", "feature.txt", "feature\n");
    await repo.writeFile("main.txt", "main moved\n");
    const mainHead = await repo.commit("main moves on");

    const result = await fastForward({ repoPath: repo.repoDir, mainBranch: "main", targetRef: "feature" });

    expect(result).toEqual({
      status: "blocked",
      reason: "non_fast_forward",
      message: "Cannot fast-forward main to feature.",
      currentHead: mainHead,
      targetRef: "feature",
    });
    expect(await headSha(repo.repoDir)).toBe(mainHead);
  });
});

describe("rebaseOnto", () => {
  it("replays a branch onto a moved upstream", async () => {
    const worktree = await branchWithCommit("feature", "feature.txt", "feature\n");
    await repo.writeFile("main.txt", "main moved\n");
    const mainHead = await repo.commit("main moves on");

    const result = await rebaseOnto({ worktreePath: worktree, upstream: "main" });

    expect(result.status).toBe("rebased");
    expect(await repo.git(["merge-base", "main", "feature"])).toBe(mainHead);
  });

  it("aborts a conflicting rebase and leaves the branch untouched", async () => {
    const worktree = await branchWithCommit("feature", "README.md", "feature edit\n");
    const featureHead = await resolveRef(repo.repoDir, "feature");
    await repo.writeFile("README.md", "main edit\n");
    await repo.commit("main edits readme");

    const result = await rebaseOnto({ worktreePath: worktree, upstream: "main" });

    expect(result.status).toBe("conflict");
    expect(result).toMatchObject({ aborted: true });
    expect(await resolveRef(repo.repoDir, "feature")).toBe(featureHead);
  });
});

describe("resetWorktreeBranch", () => {
  it("puts a rebased branch back where it was", async () => {
    const worktree = await branchWithCommit("feature", "feature.txt", "feature\n");
    const featureHead = await resolveRef(repo.repoDir, "feature");
    await repo.writeFile("main.txt", "main moved\n");
    await repo.commit("main moves on");
    await rebaseOnto({ worktreePath: worktree, upstream: "main" });
    expect(await resolveRef(repo.repoDir, "feature")).not.toBe(featureHead);

    await resetWorktreeBranch({ worktreePath: worktree, head: featureHead });

    expect(await resolveRef(repo.repoDir, "feature")).toBe(featureHead);
    expect(await headSha(worktree)).toBe(featureHead);
  });
});
