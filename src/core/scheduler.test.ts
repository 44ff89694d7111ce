import { describe, expect, it } from "vitest";

import { abcDefinition, buildDefinition, snapshotWithStatuses } from "./__tests__/design-fixtures.js";
import { TaskError } from "./errors.js";
import { blockedByFailure, deriveRunOutcome, planNextBatch, selectBatch } from "./scheduler.js";

describe("selectBatch", () => {
  it("fills only the free slots", () => {
    expect(selectBatch(["a", "b", "c"], 2, 0)).toEqual(["a", "b"]);
    expect(selectBatch(["a", "b", "c"], 2, 1)).toEqual(["a"]);
    expect(selectBatch(["a", "b", "c"], 2, 2)).toEqual([]);
    expect(selectBatch(["a"], 4, 0)).toEqual(["a"]);
  });

  it("rejects a non-positive concurrency bound", () => {
    expect(() => selectBatch(["a"], 0, 0)).toThrow(TaskError);
  });
});

describe("planNextBatch", () => {
  it("respects in-flight work from the snapshot", () => {
    const definition = buildDefinition({ a: {}, b: {}, c: {} }, { maxParallel: 2 });
    const snapshot = snapshotWithStatuses(definition, { a: "running" });

    expect(planNextBatch(definition, snapshot)).toEqual({ ready: ["b", "c"], selected: ["b"], inFlight: 1 });
  });
});

describe("deriveRunOutcome", () => {
  const chain = () =>
    buildDefinition({ X: {}, Y: { depends_on: ["X"] }, W: {} }, { maxIterations: 2 });

  it("is complete when every task passed", () => {
    const definition = abcDefinition();
    const snapshot = snapshotWithStatuses(definition, { A: "passed", B: "passed", C: "passed" });

    expect(deriveRunOutcome(definition, snapshot)).toBe("complete");
  });

  it("is running while nothing failed", () => {
    const definition = abcDefinition();

    expect(deriveRunOutcome(definition, snapshotWithStatuses(definition, { A: "running" }))).toBe("running");
  });

  it("is blocked when a failure strands dependents but other work continues", () => {
    const definition = chain();
    const snapshot = snapshotWithStatuses(definition, { X: "failed", W: "running" });

    expect(deriveRunOutcome(definition, snapshot)).toBe("blocked");
    expect(blockedByFailure(definition, snapshot, ["X"])).toEqual(["Y"]);
  });

  it("is failed when a failure leaves nothing runnable", () => {
    const definition = chain();
    const snapshot = snapshotWithStatuses(definition, { X: "failed", W: "passed" });

    expect(deriveRunOutcome(definition, snapshot)).toBe("failed");
  });

  it("keeps running when the failed task has no dependents", () => {
    const definition = chain();
    const snapshot = snapshotWithStatuses(definition, { W: "failed", X: "running" });

    expect(deriveRunOutcome(definition, snapshot)).toBe("running");
  });
});
