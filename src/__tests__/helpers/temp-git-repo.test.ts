import { afterEach, describe, expect, it } from "vitest";

import { createTempGitRepo } from "./temp-git-repo.js";

type TempRepoHandle = Awaited<ReturnType<typeof createTempGitRepo>>;

let repoHandle: TempRepoHandle | null = null;

afterEach(async () => {
  if (!repoHandle) return;
  await repoHandle.cleanup();
  repoHandle = null;
});

// =============================================================================
// TESTS
// =============================================================================

describe("temp git repo helper", () => {
  it("starts on main with an initial commit and records new commits", async () => {
    repoHandle = await createTempGitRepo();

    await repoHandle.writeFile("notes/first.txt", "first\n");
    const firstSha = await repoHandle.commit("first commit");

    expect(await repoHandle.git(["rev-parse", "--abbrev-ref", "HEAD"])).toBe("main");
    expect(await repoHandle.git(["rev-parse", "HEAD"])).toBe(firstSha);
    expect((await repoHandle.git(["log", "--format=%s"])).split("\n")).toEqual([
      "first commit",
      "initial commit",
    ]);
  });
});
