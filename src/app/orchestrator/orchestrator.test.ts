import { describe, expect, it } from "vitest";

import { exitWith } from "../../__tests__/helpers/fake-executor.js";
import { RUN_ID, abcDefinition, at, buildDefinition } from "../../core/__tests__/design-fixtures.js";
import { TaskError, UserFacingError } from "../../core/errors.js";

import { FakeAgentRunner, createHarness } from "./__tests__/fakes.js";

const BOOM = "[check] exited with code 1: boom";

// =============================================================================
// HOST CALLBACKS
// =============================================================================

describe("Orchestrator host callbacks", () => {
  it("runs A and B together and C only after both pass", async () => {
    const h = createHarness(abcDefinition());

    const start = await h.orchestrator.onStart();
    expect(start.mode).toBe("start");
    expect(start.snapshot.run_id).toBe(RUN_ID);

    const first = await h.orchestrator.onReadyCheck();
    expect(first.status).toBe("dispatched");
    expect(first.tasks.map((task) => task.taskId)).toEqual(["A", "B"]);
    expect(first.tasks[0]).toMatchObject({
      branch: "stratum/A",
      workspace: "/repo/.worktrees/stratum-A",
      agent: "implementation-agent",
      layer: "core",
      iteration: 0,
      previousErrors: [],
      validators: [{ id: "check", command: "true", timeout_seconds: 300 }],
    });

    const a = await h.orchestrator.onTaskComplete("A");
    expect(a).toMatchObject({ taskId: "A", status: "passed", outcome: "running" });

    const whileBRuns = await h.orchestrator.onReadyCheck();
    expect(whileBRuns.status).toBe("idle");

    await h.orchestrator.onTaskComplete("B");
    const third = await h.orchestrator.onReadyCheck();
    expect(third.tasks.map((task) => task.taskId)).toEqual(["C"]);

    const c = await h.orchestrator.onTaskComplete("C");
    expect(c.outcome).toBe("complete");
    expect(h.orchestrator.snapshot().completed_branches).toEqual([
      "stratum/A",
      "stratum/B",
      "stratum/C",
    ]);
    expect(h.executor.calls.map((call) => [call.command, call.cwd, call.timeoutMs])).toEqual([
      ["true", "/repo/.worktrees/stratum-A", 300_000],
      ["true", "/repo/.worktrees/stratum-B", 300_000],
      ["true", "/repo/.worktrees/stratum-C", 300_000],
    ]);
    expect(h.events.types()).toEqual([
      "run.start",
      "batch.start",
      "task.dispatch",
      "task.dispatch",
      "task.validate.start",
      "validator.complete",
      "task.passed",
      "task.validate.start",
      "validator.complete",
      "task.passed",
      "batch.start",
      "task.dispatch",
      "task.validate.start",
      "validator.complete",
      "task.passed",
    ]);
  });

  it("retries a failed validation and fails the task at max_iterations", async () => {
    const h = createHarness(buildDefinition({ X: {} }, { maxIterations: 2 }));
    h.executor.queue("true", exitWith(1, "boom"), exitWith(1, "boom again"));
    await h.orchestrator.onStart();

    await h.orchestrator.dispatch();
    const firstAttempt = await h.orchestrator.onTaskComplete("X");
    expect(firstAttempt).toMatchObject({
      status: "retry",
      iteration: 1,
      errors: [BOOM],
      outcome: "running",
    });
    expect(h.orchestrator.snapshot().tasks.X?.status).toBe("pending");

    const again = await h.orchestrator.dispatch();
    expect(again.tasks[0]).toMatchObject({ iteration: 1, previousErrors: [BOOM] });
    expect(h.workspaces.created).toHaveLength(1);

    const secondAttempt = await h.orchestrator.onTaskComplete("X");
    expect(secondAttempt).toMatchObject({
      status: "failed",
      iteration: 2,
      errors: ["[check] exited with code 1: boom again"],
      outcome: "failed",
    });
    expect(h.orchestrator.snapshot().tasks.X).toMatchObject({
      status: "failed",
      history: [BOOM, "[check] exited with code 1: boom again"],
      failure: { kind: "validation", message: "[check] exited with code 1: boom again" },
    });

    const after = await h.orchestrator.dispatch();
    expect(after).toEqual({ status: "idle", tasks: [], failures: [], outcome: "failed" });
  });

  it("fails a task whose workspace cannot be created without using an iteration", async () => {
    const h = createHarness(abcDefinition());
    h.workspaces.failFor.add("A");
    await h.orchestrator.onStart();

    const dispatched = await h.orchestrator.dispatch();

    expect(dispatched.tasks.map((task) => task.taskId)).toEqual(["B"]);
    expect(dispatched.failures).toEqual([
      {
        taskId: "A",
        message: "Cannot create workspace for task A: branch stratum/A already exists.",
      },
    ]);
    expect(dispatched.outcome).toBe("blocked");
    expect(h.orchestrator.snapshot().tasks.A).toMatchObject({
      status: "failed",
      iteration: 0,
      failure: { kind: "dispatch" },
    });

    const b = await h.orchestrator.onTaskComplete("B");
    expect(b.outcome).toBe("failed");
  });

  it("rejects completion signals for tasks that are not in flight", async () => {
    const h = createHarness(abcDefinition());
    await h.orchestrator.onStart();

    await expect(h.orchestrator.onTaskComplete("C")).rejects.toThrow(
      new TaskError("Task C is not in flight (status: pending)"),
    );
    await expect(h.orchestrator.onTaskComplete("Z")).rejects.toThrow("Unknown task Z");
    await expect(h.orchestrator.onTaskComplete("constructor")).rejects.toThrow("Unknown task constructor");
  });

  it("cancels once the design document can no longer be loaded", async () => {
    const h = createHarness(abcDefinition());
    await h.orchestrator.onStart();
    h.design.break("Design document removed");

    const first = await h.orchestrator.dispatch();
    const second = await h.orchestrator.dispatch();

    expect(first.status).toBe("cancelled");
    expect(second.status).toBe("cancelled");
    expect(h.design.probes).toBe(1);
    expect(h.orchestrator.cancelledReason()).toBe("Design document removed");
    expect(h.orchestrator.snapshot().sequence).toBe(0);
    expect(h.events.types()).toEqual(["run.start", "run.cancelled"]);
  });

  it("stops dispatching after shutdown is requested", async () => {
    const h = createHarness(abcDefinition());
    await h.orchestrator.onStart();

    h.orchestrator.onShutdownRequested();
    const result = await h.orchestrator.dispatch();

    expect(result.status).toBe("stopped");
    expect(h.design.probes).toBe(0);
    expect(h.workspaces.created).toHaveLength(0);
  });
});

// =============================================================================
// RESUME
// =============================================================================

describe("Orchestrator resume", () => {
  it("resumes from the latest snapshot with in-flight tasks intact", async () => {
    const first = createHarness(abcDefinition());
    await first.orchestrator.onStart();
    await first.orchestrator.dispatch();

    const second = createHarness(abcDefinition(), { backend: first.backend });
    const start = await second.orchestrator.onStart();

    expect(start.mode).toBe("resume");
    expect(start.snapshot.sequence).toBe(1);
    expect(second.orchestrator.inFlightTasks().map((task) => task.taskId)).toEqual(["A", "B"]);
    expect(second.events.events[0]).toMatchObject({ type: "run.resume", in_flight: 2, pending: 1 });
  });

  it("refuses a saved run whose tasks differ from the design document", async () => {
    const first = createHarness(abcDefinition());
    await first.orchestrator.onStart();

    const second = createHarness(buildDefinition({ A: {}, B: {} }), { backend: first.backend });
    const error = await second.orchestrator.onStart().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({
      title: "Saved run does not match the design document.",
      message: `Run ${RUN_ID} was started with a different task set (missing tasks: C).`,
    });
  });
});

// =============================================================================
// DRIVER
// =============================================================================

describe("Orchestrator.runToCompletion", () => {
  it("drives the whole graph and reaches the same state on every run", async () => {
    const runOnce = async () => {
      const h = createHarness(abcDefinition());
      const agent = new FakeAgentRunner();
      const result = await h.orchestrator.runToCompletion(agent, { probeIntervalMs: 5 });
      return { result, agent };
    };

    const first = await runOnce();
    const second = await runOnce();

    expect(first.result.outcome).toBe("complete");
    expect(first.agent.started.map((task) => task.taskId)).toEqual(["A", "B", "C"]);
    expect(first.result.completions.map((completion) => completion.taskId)).toEqual(["A", "B", "C"]);
    expect(second.result.snapshot).toEqual(first.result.snapshot);
  });

  it("restarts a task after a failed validation with the previous errors", async () => {
    const h = createHarness(buildDefinition({ X: {} }, { maxIterations: 3 }));
    h.executor.queue("true", exitWith(1, "boom"));
    const agent = new FakeAgentRunner();

    const result = await h.orchestrator.runToCompletion(agent, { probeIntervalMs: 5 });

    expect(result.outcome).toBe("complete");
    expect(agent.started.map((task) => [task.taskId, task.iteration, task.previousErrors])).toEqual([
      ["X", 0, []],
      ["X", 1, [BOOM]],
    ]);
  });

  it("ends with failed when a failure leaves nothing runnable", async () => {
    const h = createHarness(buildDefinition({ X: {}, Y: { depends_on: ["X"] } }, { maxIterations: 1 }));
    h.executor.queue("true", exitWith(1, "boom"));

    const result = await h.orchestrator.runToCompletion(new FakeAgentRunner(), { probeIntervalMs: 5 });

    expect(result.outcome).toBe("failed");
    expect(result.snapshot.tasks.Y?.status).toBe("pending");
  });

  it("cancels while agents are busy and leaves workspaces in place", async () => {
    const h = createHarness(abcDefinition());
    const agent = new FakeAgentRunner({
      mode: "manual",
      onStart: () => h.design.break("Design document removed"),
    });

    const result = await h.orchestrator.runToCompletion(agent, { probeIntervalMs: 5 });

    expect(result.outcome).toBe("cancelled");
    expect(result.snapshot.tasks.A?.status).toBe("running");
    expect(result.snapshot.tasks.B?.status).toBe("running");
    expect(h.workspaces.destroyed).toEqual([]);
    expect(h.events.types()).toContain("run.cancelled");
  });

  it("stops on abort without completing in-flight tasks", async () => {
    const h = createHarness(abcDefinition());
    const controller = new AbortController();
    const agent = new FakeAgentRunner({ mode: "manual", onStart: () => controller.abort() });

    const result = await h.orchestrator.runToCompletion(agent, {
      probeIntervalMs: 5,
      signal: controller.signal,
    });

    expect(result.outcome).toBe("stopped");
    expect(result.completions).toEqual([]);
    expect(result.snapshot.current_batch).toEqual(["A", "B"]);
    expect(h.events.types()).toContain("run.shutdown_requested");
  });

  it("aborts busy agents and detaches from the signal when a completion throws", async () => {
    const h = createHarness(abcDefinition());
    const controller = new AbortController();
    const agent: FakeAgentRunner = new FakeAgentRunner({
      mode: "manual",
      onStart: (task) => {
        if (task.taskId !== "B") return;
        h.backend.failNextPersist(new Error("disk full"));
        agent.finish("A");
      },
    });

    await expect(
      h.orchestrator.runToCompletion(agent, { probeIntervalMs: 5, signal: controller.signal }),
    ).rejects.toThrow("disk full");

    expect(agent.aborted).toEqual(["B"]);
    controller.abort();
    expect(h.events.types()).not.toContain("run.shutdown_requested");
  });

  it("revalidates a task interrupted during validation before anything else", async () => {
    const first = createHarness(abcDefinition());
    await first.orchestrator.onStart();
    await first.orchestrator.dispatch();
    await first.store.commit({ type: "begin_validation", at: at(30), taskId: "A" });

    const second = createHarness(abcDefinition(), { backend: first.backend });
    const agent = new FakeAgentRunner();
    const result = await second.orchestrator.runToCompletion(agent, { probeIntervalMs: 5 });

    expect(result.outcome).toBe("complete");
    expect(result.completions[0]?.taskId).toBe("A");
    expect(agent.started.map((task) => task.taskId)).toEqual(["B", "C"]);
    const revalidation = second.events.events.find((event) => event.type === "task.validate.start");
    expect(revalidation).toMatchObject({ task_id: "A", revalidate: true });
  });
});
