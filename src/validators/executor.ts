import { execaCommand } from "execa";
import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandFailureKind = "exit" | "not_found" | "spawn_error" | "timeout";

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  failure?: { kind: CommandFailureKind; message: string };
};

export type ExecuteOptions = {
  cwd: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
};

/** Runs one shell command. Implementations never throw for command failures. */
export interface Executor {
  run(command: string, options: ExecuteOptions): Promise<CommandResult>;
}

// =============================================================================
// SHELL EXECUTOR
// =============================================================================

const SHELL_NOT_FOUND_EXIT_CODE = 127;
const NOT_FOUND_PATTERN = /command not found|: not found/i;

export class ShellExecutor implements Executor {
  async run(command: string, options: ExecuteOptions): Promise<CommandResult> {
    const startedAt = Date.now();

    if (!(await isDirectory(options.cwd))) {
      return {
        exitCode: null,
        stdout: "",
        stderr: "",
        durationMs: Date.now() - startedAt,
        failure: {
          kind: "spawn_error",
          message: `working directory ${options.cwd} does not exist`,
        },
      };
    }

    const res = await execaCommand(command, {
      cwd: options.cwd,
      shell: true,
      reject: false,
      timeout: options.timeoutMs,
      env: options.env,
      signal: options.signal,
    });
    const durationMs = Date.now() - startedAt;
    const stdout = res.stdout ?? "";
    const stderr = res.stderr ?? "";
    const exitCode = typeof res.exitCode === "number" ? res.exitCode : null;

    if (res.timedOut) {
      return {
        exitCode,
        stdout,
        stderr,
        durationMs,
        failure: { kind: "timeout", message: `timed out after ${formatSeconds(options.timeoutMs)}` },
      };
    }

    if (exitCode === null && res.signal) {
      return {
        exitCode,
        stdout,
        stderr,
        durationMs,
        failure: { kind: "exit", message: `terminated by ${res.signal}` },
      };
    }

    if (exitCode === null) {
      const detail = res instanceof Error ? formatErrorMessage(res) : "no exit code";
      return {
        exitCode,
        stdout,
        stderr,
        durationMs,
        failure: { kind: "spawn_error", message: `failed to start (${detail})` },
      };
    }

    if (exitCode === 0) {
      return { exitCode, stdout, stderr, durationMs };
    }

    if (exitCode === SHELL_NOT_FOUND_EXIT_CODE || NOT_FOUND_PATTERN.test(stderr)) {
      return {
        exitCode,
        stdout,
        stderr,
        durationMs,
        failure: { kind: "not_found", message: "command not found" },
      };
    }

    return {
      exitCode,
      stdout,
      stderr,
      durationMs,
      failure: { kind: "exit", message: `exited with code ${exitCode}` },
    };
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fse.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

function formatSeconds(timeoutMs: number | undefined): string {
  if (timeoutMs === undefined) return "the time limit";
  return `${timeoutMs / 1000}s`;
}
