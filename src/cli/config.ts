import { createAppContext, type AppContext } from "../app/context.js";
import { loadDesignDocumentForCli } from "../core/config-loader.js";
import { resolveDesignDocumentPath } from "../core/config-discovery.js";

// =============================================================================
// CONTEXT RESOLUTION (CLI)
//
// --repo picks the repository (default: the git root above cwd);
// --config picks the design document (default: the first known file name in the repo).
// =============================================================================

export type GlobalCliOptions = {
  repo?: string;
  config?: string;
  debug?: boolean;
};

export function loadContextForCli(globals: GlobalCliOptions, cwd = process.cwd()): AppContext {
  const resolved = resolveDesignDocumentPath({
    explicitPath: globals.config,
    repo: globals.repo,
    cwd,
  });
  const definition = loadDesignDocumentForCli(resolved.designPath);

  return createAppContext({
    repoPath: resolved.repoRoot,
    designPath: resolved.designPath,
    definition,
  });
}
