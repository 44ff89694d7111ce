import { describe, expect, it } from "vitest";

import { abcDefinition, buildDefinition, type DesignFixtureOptions } from "../../../core/__tests__/design-fixtures.js";
import type { ProjectDefinition } from "../../../core/config.js";
import { GitError, IntegrationError } from "../../../core/errors.js";
import { FakeAgentRunner, createHarness, type Harness } from "../__tests__/fakes.js";
import type { DispatchedTask } from "../ports.js";

// =============================================================================
// HELPERS
// =============================================================================

type CommitHook = (h: Harness, task: DispatchedTask) => void;

// Every agent leaves one commit on its task branch.
const commitOnTaskBranch: CommitHook = (h, task) => {
  h.graph.commitOn(task.branch);
};

async function completedRun(
  definition: ProjectDefinition,
  hook: CommitHook = commitOnTaskBranch,
): Promise<Harness> {
  const h = createHarness(definition);
  const agent = new FakeAgentRunner({ onStart: (task) => hook(h, task) });
  const result = await h.orchestrator.runToCompletion(agent, { probeIntervalMs: 5 });
  expect(result.outcome).toBe("complete");
  return h;
}

function abc(worktree?: DesignFixtureOptions["worktree"]): ProjectDefinition {
  return abcDefinition(worktree ? { worktree } : {});
}

// =============================================================================
// TESTS
// =============================================================================

describe("integrateBranches", () => {
  it("refuses to integrate before every task has passed", async () => {
    const h = createHarness(abc());
    await h.orchestrator.onStart();

    const error = await h.orchestrator.integrate().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(IntegrationError);
    expect(error).toMatchObject({
      reason: "incomplete",
      message: "Cannot integrate: 3 task(s) have not passed (A, B, C).",
    });
    expect(h.events.types()).toContain("integration.blocked");
  });

  it("stops at the first sibling branch that does not descend from the integrated tip", async () => {
    const h = await completedRun(abc({ rebase: false }));

    const error = await h.orchestrator.integrate().catch((err: unknown) => err);

    expect(error).toMatchObject({
      reason: "not_linear",
      taskId: "B",
      message:
        "Branch stratum/B of task B does not descend from the integrated history; " +
        "rebase it onto main or set worktree.rebase.",
    });
    expect(h.graph.resolve("main")).toBe("c1");
    expect(h.vcs.fastForwards).toEqual([]);
    expect(h.orchestrator.snapshot().integrated_branches).toEqual([]);
  });

  it("rebases sibling branches onto the planned tip by default", async () => {
    const h = await completedRun(abc());

    const result = await h.orchestrator.integrate();

    expect(result.target).toBe("main");
    expect(result.steps).toEqual([
      { taskId: "A", branch: "stratum/A", previousHead: "c1", head: "c2", rebased: false },
      { taskId: "B", branch: "stratum/B", previousHead: "c2", head: "c5", rebased: true },
      { taskId: "C", branch: "stratum/C", previousHead: "c5", head: "c6", rebased: true },
    ]);
    expect(h.vcs.rebases).toEqual([
      { branch: "stratum/B", upstream: "c2" },
      { branch: "stratum/C", upstream: "c5" },
    ]);
    expect(h.graph.resolve("main")).toBe("c6");
    expect(h.workspaces.destroyed.map((handle) => handle.taskId)).toEqual(["A", "B", "C"]);
    expect(h.orchestrator.snapshot().integrated_branches).toEqual([
      "stratum/A",
      "stratum/B",
      "stratum/C",
    ]);
  });

  it("fast-forwards a linear chain and skips it on a second integration", async () => {
    const definition = buildDefinition(
      { X: {}, Y: { depends_on: ["X"] } },
      { worktree: { cleanup_on_success: false } },
    );
    const h = await completedRun(definition, (harness, task) => {
      harness.graph.commitOn(task.branch, task.taskId === "Y" ? "stratum/X" : undefined);
    });

    const first = await h.orchestrator.integrate();
    expect(first.steps.map((step) => [step.branch, step.previousHead, step.head])).toEqual([
      ["stratum/X", "c1", "c2"],
      ["stratum/Y", "c2", "c3"],
    ]);
    expect(h.workspaces.destroyed).toEqual([]);

    const second = await h.orchestrator.integrate();
    expect(second.steps).toEqual([]);
    expect(second.skipped).toEqual([
      { taskId: "X", branch: "stratum/X", reason: "integrated" },
      { taskId: "Y", branch: "stratum/Y", reason: "integrated" },
    ]);
    expect(h.vcs.fastForwards).toHaveLength(2);
  });

  it("marks a branch already contained in the target as integrated", async () => {
    const h = await completedRun(buildDefinition({ X: {} }), () => undefined);

    const result = await h.orchestrator.integrate();

    expect(result.steps).toEqual([]);
    expect(result.skipped).toEqual([{ taskId: "X", branch: "stratum/X", reason: "contained" }]);
    expect(h.orchestrator.snapshot().integrated_branches).toEqual(["stratum/X"]);
  });

  it("reports a rebase conflict without moving the target", async () => {
    const h = await completedRun(abc({ rebase: true }));
    h.vcs.conflicts.add("stratum/B");

    const error = await h.orchestrator.integrate().catch((err: unknown) => err);

    expect(error).toMatchObject({
      reason: "rebase_conflict",
      taskId: "B",
      message: "Rebase of task B onto c2 failed: CONFLICT while rebasing stratum/B",
    });
    expect(h.graph.resolve("main")).toBe("c1");
    expect(h.workspaces.destroyed).toEqual([]);
  });

  it("puts earlier rebased branches back when a later rebase conflicts", async () => {
    const h = await completedRun(abc());
    h.vcs.conflicts.add("stratum/C");

    const error = await h.orchestrator.integrate().catch((err: unknown) => err);

    expect(error).toMatchObject({
      reason: "rebase_conflict",
      taskId: "C",
      message: "Rebase of task C onto c5 failed: CONFLICT while rebasing stratum/C",
    });
    expect(h.vcs.restores).toEqual([{ branch: "stratum/B", head: "c3" }]);
    expect(h.graph.resolve("stratum/B")).toBe("c3");
    expect(h.graph.resolve("main")).toBe("c1");
    expect(h.events.types()).toContain("integration.restore");
    expect(h.orchestrator.snapshot().integrated_branches).toEqual([]);
  });

  it("refuses to integrate into a dirty checkout", async () => {
    const h = await completedRun(abc({ rebase: true }));
    h.vcs.dirty = true;

    await expect(h.orchestrator.integrate()).rejects.toBeInstanceOf(GitError);
    expect(h.vcs.rebases).toEqual([]);
  });
});
