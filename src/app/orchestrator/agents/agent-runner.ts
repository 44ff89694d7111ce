/**
 * ShellAgentRunner runs a task's `command` in its workspace.
 * Purpose: give `stratum run` something to execute when no external agent drives the tasks.
 * Assumptions: the command is trusted shell text from the design document.
 * Usage: new ShellAgentRunner(executor, events).start(task, signal)
 */

import { logOrchestratorEvent, type EventSink } from "../../../core/logger.js";
import { limitText } from "../../../core/utils.js";
import type { Executor } from "../../../validators/executor.js";
import type { AgentRunner, AgentRunResult, DispatchedTask } from "../ports.js";

const AGENT_OUTPUT_LIMIT = 4000;

export class ShellAgentRunner implements AgentRunner {
  constructor(
    private readonly executor: Executor,
    private readonly events: EventSink,
  ) {}

  async start(task: DispatchedTask, signal: AbortSignal): Promise<AgentRunResult> {
    // Without a command the work happened elsewhere; go straight to validation.
    if (!task.command) {
      return { exitCode: 0, output: "" };
    }

    logOrchestratorEvent(this.events, "agent.start", {
      taskId: task.taskId,
      agent: task.agent,
      iteration: task.iteration,
    });

    const result = await this.executor.run(task.command, {
      cwd: task.workspace,
      signal,
      env: {
        STRATUM_TASK_ID: task.taskId,
        STRATUM_TASK_BRANCH: task.branch,
        STRATUM_ITERATION: String(task.iteration),
        STRATUM_PREVIOUS_ERRORS: task.previousErrors.join("\n"),
      },
    });
    const output = limitText(`${result.stdout}\n${result.stderr}`.trim(), AGENT_OUTPUT_LIMIT);

    logOrchestratorEvent(this.events, "agent.complete", {
      taskId: task.taskId,
      exit_code: result.exitCode,
      ...(result.failure ? { failure: result.failure.message } : {}),
    });

    return { exitCode: result.exitCode, output };
  }
}
