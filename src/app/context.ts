/**
 * AppContext resolves the repository, design document and state home for one CLI call.
 * Purpose: make repo + STRATUM_HOME explicit for CLI commands without mutating globals.
 * Assumptions: the design document has already been validated by the loader.
 * Usage: const ctx = createAppContext({ repoPath, designPath, definition }).
 */

import path from "node:path";

import type { ProjectDefinition } from "../core/config.js";
import { createPathsContext, type PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  repoPath: string;
  designPath: string;
  definition: ProjectDefinition;
  stratumHome: string;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  repoPath: string;
  designPath: string;
  definition: ProjectDefinition;
  stratumHome?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const repoPath = path.resolve(input.repoPath);
  const paths = createPathsContext({ repoPath, stratumHome: input.stratumHome });

  return {
    repoPath,
    designPath: path.resolve(input.designPath),
    definition: input.definition,
    stratumHome: paths.stratumHome,
    paths,
  };
}
