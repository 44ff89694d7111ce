import type { AppContext } from "../app/context.js";
import type { IntegrationResult } from "../app/orchestrator/integration/integration-coordinator.js";

import { withOrchestrator, type SessionOptions } from "./session.js";

export type IntegrateCommandOptions = SessionOptions & {
  json?: boolean;
};

export async function integrateCommand(
  ctx: AppContext,
  opts: IntegrateCommandOptions = {},
): Promise<IntegrationResult> {
  const result = await withOrchestrator(ctx, ({ orchestrator }) => orchestrator.integrate(), opts);

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  for (const step of result.steps) {
    const rebased = step.rebased ? " (rebased)" : "";
    console.log(
      `${result.target}: ${shortSha(step.previousHead)}..${shortSha(step.head)} ${step.branch}${rebased}`,
    );
  }
  for (const skipped of result.skipped) {
    console.log(`Skipped ${skipped.branch}: already ${skipped.reason}`);
  }
  for (const warning of result.cleanupWarnings) {
    console.warn(`Warning: ${warning}`);
  }
  console.log(
    result.steps.length > 0
      ? `Integrated ${result.steps.length} branch(es) into ${result.target}.`
      : `Nothing new to integrate into ${result.target}.`,
  );

  return result;
}

function shortSha(sha: string): string {
  return sha.slice(0, 7);
}
