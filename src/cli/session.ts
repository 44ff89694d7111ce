import type { AppContext } from "../app/context.js";
import {
  buildOrchestrator,
  type BuiltOrchestrator,
} from "../app/orchestrator/run-context-builder.js";
import type { OrchestratorPorts } from "../app/orchestrator/ports.js";

import { normalizeCommandError } from "./command-errors.js";

export type SessionOptions = {
  ports?: Partial<OrchestratorPorts>;
};

/**
 * Starts (or resumes) the run for the context, hands it to `work`, and closes
 * the event log afterwards. Errors come back normalized for the CLI.
 */
export async function withOrchestrator<T>(
  ctx: AppContext,
  work: (session: BuiltOrchestrator) => Promise<T>,
  opts: SessionOptions = {},
): Promise<T> {
  let session: BuiltOrchestrator | undefined;
  try {
    session = await buildOrchestrator({
      repoPath: ctx.repoPath,
      definition: ctx.definition,
      paths: ctx.paths,
      ports: opts.ports,
    });
    return await work(session);
  } catch (error) {
    throw normalizeCommandError(error);
  } finally {
    session?.close();
  }
}
