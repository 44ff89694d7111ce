import type { ResolvedValidator } from "../core/config.js";
import { limitText } from "../core/utils.js";

import type { CommandFailureKind, CommandResult, Executor } from "./executor.js";

// =============================================================================
// TYPES
// =============================================================================

export type ValidatorOutcome = {
  validator: string;
  command: string;
  passed: boolean;
  exitCode: number | null;
  output: string;
  durationMs: number;
  failure?: { kind: CommandFailureKind; message: string };
};

export type ValidationResult = {
  passed: boolean;
  output: string;
  exitCode: number | null;
  results: ValidatorOutcome[];
};

export type ValidatorRunnerOptions = {
  env?: Record<string, string>;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const VALIDATION_OUTPUT_LIMIT = 4000;

// =============================================================================
// RUNNER
// =============================================================================

export class ValidatorRunner {
  constructor(
    private readonly executor: Executor,
    private readonly options: ValidatorRunnerOptions = {},
  ) {}

  /**
   * Runs every validator in order, even after a failure, so one attempt
   * reports all broken checks. An empty list passes.
   */
  async run(
    commands: ResolvedValidator[],
    workingDir: string,
    timeoutMs?: number,
  ): Promise<ValidationResult> {
    const results: ValidatorOutcome[] = [];

    for (const validator of commands) {
      const result = await this.executor.run(validator.command, {
        cwd: workingDir,
        timeoutMs: timeoutMs ?? validator.timeout_seconds * 1000,
        env: this.options.env,
      });
      results.push(toOutcome(validator, result));
    }

    const firstFailure = results.find((outcome) => !outcome.passed);

    return {
      passed: firstFailure === undefined,
      output: results.map(formatSection).join("\n"),
      exitCode: firstFailure ? firstFailure.exitCode : 0,
      results,
    };
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

/** One message per failed validator: `[id] reason: output tail`. */
export function validationErrors(result: ValidationResult): string[] {
  return result.results
    .filter((outcome) => !outcome.passed)
    .map((outcome) => formatValidatorError(outcome));
}

export function formatValidatorError(outcome: ValidatorOutcome): string {
  const reason = outcome.failure?.message ?? "failed";
  const output = outcome.output.trim();
  const head = `[${outcome.validator}] ${reason}`;
  return output.length > 0 ? `${head}: ${limitText(output, VALIDATION_OUTPUT_LIMIT)}` : head;
}

function toOutcome(validator: ResolvedValidator, result: CommandResult): ValidatorOutcome {
  const passed = result.failure === undefined && result.exitCode === 0;
  const output = [result.stdout, result.stderr].filter((part) => part.length > 0).join("\n");
  const outcome: ValidatorOutcome = {
    validator: validator.id,
    command: validator.command,
    passed,
    exitCode: result.exitCode,
    output,
    durationMs: result.durationMs,
  };

  if (!passed) {
    outcome.failure = result.failure ?? {
      kind: "exit",
      message: `exited with code ${result.exitCode ?? "unknown"}`,
    };
  }

  return outcome;
}

function formatSection(outcome: ValidatorOutcome): string {
  const status = outcome.passed ? "ok" : (outcome.failure?.message ?? "failed");
  const body = outcome.output.length > 0 ? `\n${outcome.output}` : "";
  return `$ ${outcome.command} (${status})${body}`;
}
