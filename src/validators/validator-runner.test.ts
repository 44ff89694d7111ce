import { describe, expect, it } from "vitest";

import { FakeExecutor, exitWith, ok } from "../__tests__/helpers/fake-executor.js";
import type { ResolvedValidator } from "../core/config.js";

import { VALIDATION_OUTPUT_LIMIT, ValidatorRunner, formatValidatorError, validationErrors } from "./validator-runner.js";

function validator(id: string, command: string, timeoutSeconds = 60): ResolvedValidator {
  return { id, command, timeout_seconds: timeoutSeconds };
}

describe("ValidatorRunner", () => {
  it("passes an empty validator list without running anything", async () => {
    const executor = new FakeExecutor();
    const runner = new ValidatorRunner(executor);

    const result = await runner.run([], "/work");

    expect(result).toEqual({ passed: true, output: "", exitCode: 0, results: [] });
    expect(executor.calls).toEqual([]);
  });

  it("runs every validator in order even after a failure", async () => {
    const executor = new FakeExecutor();
    executor.queue("npm run lint", exitWith(2, "lint broke"));
    executor.queue("npm test", ok("12 passed"));
    const runner = new ValidatorRunner(executor, { env: { CI: "1" } });

    const result = await runner.run(
      [validator("lint", "npm run lint", 30), validator("test", "npm test")],
      "/work/A",
    );

    expect(executor.calls).toEqual([
      { command: "npm run lint", cwd: "/work/A", timeoutMs: 30_000, env: { CI: "1" } },
      { command: "npm test", cwd: "/work/A", timeoutMs: 60_000, env: { CI: "1" } },
    ]);
    expect(result.passed).toBe(false);
    expect(result.exitCode).toBe(2);
    expect(result.output).toBe(
      "$ npm run lint (exited with code 2)\nlint broke\n$ npm test (ok)\n12 passed",
    );
    expect(validationErrors(result)).toEqual(["[lint] exited with code 2: lint broke"]);
  });

  it("lets an explicit timeout override the validator's own", async () => {
    const executor = new FakeExecutor();
    const runner = new ValidatorRunner(executor);

    await runner.run([validator("check", "true", 300)], "/work", 500);

    expect(executor.calls[0]?.timeoutMs).toBe(500);
  });

  it("treats a non-zero exit without a failure record as an exit failure", async () => {
    const executor = new FakeExecutor(() => ({ exitCode: 4, stdout: "", stderr: "", durationMs: 1 }));
    const runner = new ValidatorRunner(executor);

    const result = await runner.run([validator("check", "./check.sh")], "/work");

    expect(result.results[0]?.failure).toEqual({ kind: "exit", message: "exited with code 4" });
    expect(validationErrors(result)).toEqual(["[check] exited with code 4"]);
  });
});

describe("formatValidatorError", () => {
  it("keeps only the tail of long output", () => {
    const output = `${"x".repeat(10)}${"y".repeat(VALIDATION_OUTPUT_LIMIT)}`;

    const message = formatValidatorError({
      validator: "test",
      command: "npm test",
      passed: false,
      exitCode: 1,
      output,
      durationMs: 5,
      failure: { kind: "exit", message: "exited with code 1" },
    });

    expect(message).toBe(
      `[test] exited with code 1: …(10 chars truncated)\n${"y".repeat(VALIDATION_OUTPUT_LIMIT)}`,
    );
  });

  it("names timeouts with the validator id", () => {
    const message = formatValidatorError({
      validator: "slow",
      command: "sleep 10",
      passed: false,
      exitCode: null,
      output: "",
      durationMs: 1000,
      failure: { kind: "timeout", message: "timed out after 1s" },
    });

    expect(message).toBe("[slow] timed out after 1s");
  });
});
