import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  stratumHome: string;
};

export type ResolveStratumHomeOptions = {
  stratumHome?: string;
  repoPath: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveStratumHome(opts: ResolveStratumHomeOptions): string {
  if (opts.stratumHome) {
    return path.resolve(opts.stratumHome);
  }

  if (process.env.STRATUM_HOME) {
    return path.resolve(process.env.STRATUM_HOME);
  }

  return path.join(path.resolve(opts.repoPath), ".stratum");
}

export function createPathsContext(opts: ResolveStratumHomeOptions): PathsContext {
  return { stratumHome: resolveStratumHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

const SNAPSHOT_SEQUENCE_WIDTH = 12;

export function stateDir(paths: PathsContext): string {
  return path.join(paths.stratumHome, "state");
}

export function snapshotFileName(sequence: number): string {
  return `snapshot-${String(sequence).padStart(SNAPSHOT_SEQUENCE_WIDTH, "0")}.json`;
}

export function parseSnapshotFileName(fileName: string): number | null {
  const match = /^snapshot-(\d+)\.json$/.exec(fileName);
  if (!match) return null;
  const sequence = Number(match[1]);
  return Number.isSafeInteger(sequence) ? sequence : null;
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.stratumHome, "logs");
}

export function orchestratorLogPath(paths: PathsContext): string {
  return path.join(logsDir(paths), "orchestrator.jsonl");
}

export function worktreePath(repoPath: string, baseDir: string, branch: string): string {
  return path.resolve(repoPath, baseDir, branch.replace(/\//g, "-"));
}
