import fs from "node:fs";
import path from "node:path";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const DESIGN_DOCUMENT_CANDIDATES = [
  "stratum.yaml",
  "stratum.toml",
  "design.yaml",
  "design.toml",
  "requirements.toml",
  ".stratum/design.yaml",
  "docs/design.toml",
] as const;

const DEFAULT_DESIGN_FILE = "stratum.yaml";

// =============================================================================
// TYPES
// =============================================================================

export type DesignSource = "explicit" | "repo";

export type DesignResolution = {
  designPath: string;
  repoRoot: string;
  source: DesignSource;
};

export type InitResult = {
  designPath: string;
  status: "created" | "exists" | "overwritten";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/** First candidate present in `repoDir`, or null. */
export function findDesignDocument(repoDir: string): string | null {
  for (const candidate of DESIGN_DOCUMENT_CANDIDATES) {
    const fullPath = path.join(repoDir, candidate);
    if (fs.existsSync(fullPath) && fs.statSync(fullPath).isFile()) {
      return fullPath;
    }
  }
  return null;
}

export function resolveDesignDocumentPath(args: {
  explicitPath?: string;
  repo?: string;
  cwd?: string;
}): DesignResolution {
  const cwd = args.cwd ?? process.cwd();
  const repoRoot = resolveRepoRoot(args.repo, cwd);

  if (args.explicitPath) {
    return {
      designPath: path.resolve(cwd, args.explicitPath),
      repoRoot,
      source: "explicit",
    };
  }

  const found = findDesignDocument(repoRoot);
  if (!found) {
    throw createMissingDesignDocumentError(repoRoot);
  }

  return { designPath: found, repoRoot, source: "repo" };
}

export function resolveRepoRoot(repo: string | undefined, cwd: string): string {
  if (repo) return path.resolve(cwd, repo);

  const found = findRepoRoot(cwd);
  if (!found) {
    throw createMissingRepoError(cwd);
  }
  return found;
}

export function initDesignDocument(args: {
  repoRoot: string;
  fileName?: string;
  projectName?: string;
  force?: boolean;
}): InitResult {
  const designPath = path.resolve(args.repoRoot, args.fileName ?? DEFAULT_DESIGN_FILE);
  const exists = fs.existsSync(designPath);

  if (exists && !args.force) {
    return { designPath, status: "exists" };
  }

  const projectName = args.projectName ?? path.basename(path.resolve(args.repoRoot));
  fs.mkdirSync(path.dirname(designPath), { recursive: true });
  fs.writeFileSync(designPath, starterDesignYaml(projectName), "utf8");

  return { designPath, status: exists ? "overwritten" : "created" };
}

// =============================================================================
// INTERNALS
// =============================================================================

function createMissingRepoError(cwd: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Repository not found.",
    message: `No git repository found in ${path.resolve(cwd)} or its parent directories.`,
    hint: "Run this command inside a git repo or pass --repo <dir>.",
  });
}

function createMissingDesignDocumentError(repoRoot: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Design document missing.",
    message: `No design document found in ${repoRoot}. Looked for: ${DESIGN_DOCUMENT_CANDIDATES.join(", ")}.`,
    hint: "Run `stratum init` or pass --config <path>.",
  });
}

function starterDesignYaml(projectName: string): string {
  return [
    "# stratum design document",
    "#",
    "# Tasks run in isolated git worktrees. A task passes when every validator of",
    "# its layer exits 0. Branches are integrated into main_branch in dependency order.",
    "",
    "project:",
    `  name: ${JSON.stringify(projectName)}`,
    '  version: "0.1.0"',
    "  max_iterations: 5",
    "  max_parallel: 4",
    "  # Make every task wait for all tasks of the layers its layer depends on.",
    "  layer_gating: false",
    "",
    "layers:",
    "  implementation:",
    "    description: Write the code",
    "    validators: [build]",
    "  verification:",
    "    description: Prove it works",
    "    depends_on: [implementation]",
    "    validators: [test]",
    "",
    "tasks:",
    "  core:",
    "    layer: implementation",
    "    description: Implement the core module",
    "  core-tests:",
    "    layer: verification",
    "    description: Cover the core module with tests",
    "    depends_on: [core]",
    "",
    "validators:",
    '  build: "true"',
    "  test:",
    '    command: "true"',
    "    timeout_seconds: 300",
    "",
    "worktree:",
    "  branch_prefix: stratum",
    "  base_dir: .worktrees",
    "  main_branch: main",
    "  cleanup_on_success: true",
    "  rebase: true",
    "",
    "state:",
    "  keep_snapshots: 20",
    "",
  ].join("\n");
}
