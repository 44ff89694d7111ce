import path from "node:path";

import { initDesignDocument, resolveRepoRoot } from "../core/config-discovery.js";

export type InitCommandOptions = {
  path?: string;
  repo?: string;
  force?: boolean;
  cwd?: string;
};

export async function initCommand(opts: InitCommandOptions): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const repoRoot = resolveRepoRoot(opts.repo, cwd);
  const fileName = opts.path ? path.relative(repoRoot, path.resolve(cwd, opts.path)) : undefined;

  const result = initDesignDocument({ repoRoot, fileName, force: opts.force });

  if (result.status === "exists") {
    console.log(`Design document already exists at ${result.designPath}.`);
    console.log("Use --force to overwrite it.");
    return;
  }

  const verb = result.status === "created" ? "Created" : "Overwrote";
  console.log(`${verb} design document at ${result.designPath}`);
  console.log("Next: edit the tasks and validators, then run `stratum run` or `stratum dispatch`.");
}
