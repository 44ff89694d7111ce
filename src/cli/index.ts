import { Command, InvalidArgumentError } from "commander";

import { completeCommand } from "./complete.js";
import { loadContextForCli, type GlobalCliOptions } from "./config.js";
import { dispatchCommand } from "./dispatch.js";
import { initCommand } from "./init.js";
import { integrateCommand } from "./integrate.js";
import { resetCommand } from "./reset.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = () => loadContextForCli(program.opts<GlobalCliOptions>());

  program
    .name("stratum")
    .description("Run a layered task graph in isolated git worktrees, validate and integrate it")
    .version("0.1.0")
    .option("--repo <dir>", "Repository root (default: the git repo containing cwd)")
    .option(
      "--config <path>",
      "Design document path (default: stratum.yaml, stratum.toml, design.yaml, ... in the repo)",
    )
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("init")
    .description("Write a starter design document")
    .argument("[path]", "Design document path relative to the repo (default: stratum.yaml)")
    .option("--force", "Overwrite an existing design document", false)
    .action(async (designPath: string | undefined, opts: { force: boolean }) => {
      const globals = program.opts<GlobalCliOptions>();
      await initCommand({ path: designPath, repo: globals.repo, force: opts.force });
    });

  program
    .command("status")
    .description("Show the saved run: outcome, task states and last errors")
    .option("--json", "Print the summary as JSON", false)
    .action(async (opts: { json: boolean }) => {
      await statusCommand(resolveContext(), { json: opts.json });
    });

  program
    .command("dispatch")
    .description("Start every ready task in its own worktree (one ready check)")
    .option("--json", "Print the dispatched tasks as JSON", false)
    .action(async (opts: { json: boolean }) => {
      await dispatchCommand(resolveContext(), { json: opts.json });
    });

  program
    .command("complete")
    .description("Validate a dispatched task and record pass, retry or failure")
    .argument("[taskId]", "Task id (default: the task whose worktree contains cwd)")
    .option("--json", "Print the validation result as JSON", false)
    .action(async (taskId: string | undefined, opts: { json: boolean }) => {
      await completeCommand(resolveContext(), { taskId, json: opts.json });
    });

  program
    .command("run")
    .description("Dispatch, run each task's command and validate until the run settles")
    .option(
      "--poll-interval <ms>",
      "How often the design document is checked while tasks run",
      parsePositiveInt,
    )
    .action(async (opts: { pollInterval?: number }) => {
      await runCommand(resolveContext(), { pollIntervalMs: opts.pollInterval });
    });

  program
    .command("integrate")
    .description("Fast-forward the main branch through every passed task branch")
    .option("--json", "Print the integration steps as JSON", false)
    .action(async (opts: { json: boolean }) => {
      await integrateCommand(resolveContext(), { json: opts.json });
    });

  program
    .command("reset")
    .description("Discard the saved run (worktrees and branches are kept)")
    .action(async () => {
      await resetCommand(resolveContext());
    });

  return program;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
