import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import type { ProjectDefinition } from "./config.js";
import { formatErrorMessage } from "./error-format.js";
import { OrchestratorError, SnapshotConflictError } from "./errors.js";
import { parseSnapshotFileName, snapshotFileName } from "./paths.js";
import { deriveRunOutcome, type RunOutcome } from "./scheduler.js";
import {
  OrchestratorSnapshotSchema,
  applyAll,
  type OrchestratorSnapshot,
  type StateTransition,
  type TaskStatus,
} from "./state.js";
import { compareIds } from "./utils.js";

// =============================================================================
// BACKENDS
// =============================================================================

export interface SnapshotBackend {
  /** Latest snapshot that parses and validates, or null. */
  loadLatest(): Promise<OrchestratorSnapshot | null>;
  /** Rejects with SnapshotConflictError when the sequence is already taken. */
  persist(snapshot: OrchestratorSnapshot): Promise<void>;
  clear(): Promise<void>;
}

export class MemorySnapshotBackend implements SnapshotBackend {
  readonly persisted: OrchestratorSnapshot[] = [];
  private pendingFailure: Error | null = null;

  /** Makes the next persist() reject with `error`. */
  failNextPersist(error: Error): void {
    this.pendingFailure = error;
  }

  async loadLatest(): Promise<OrchestratorSnapshot | null> {
    const latest = this.persisted[this.persisted.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  async persist(snapshot: OrchestratorSnapshot): Promise<void> {
    if (this.pendingFailure) {
      const error = this.pendingFailure;
      this.pendingFailure = null;
      throw error;
    }
    const latest = this.persisted[this.persisted.length - 1];
    if (latest && latest.sequence >= snapshot.sequence) {
      throw new SnapshotConflictError(snapshot.sequence);
    }
    this.persisted.push(structuredClone(snapshot));
  }

  async clear(): Promise<void> {
    this.persisted.length = 0;
  }
}

export type FileSnapshotBackendOptions = {
  keepSnapshots: number;
};

export class FileSnapshotBackend implements SnapshotBackend {
  constructor(
    public readonly dir: string,
    private readonly options: FileSnapshotBackendOptions,
  ) {}

  async loadLatest(): Promise<OrchestratorSnapshot | null> {
    for (const { file } of await this.listSnapshots()) {
      const snapshot = await readSnapshotFile(path.join(this.dir, file));
      if (snapshot) return snapshot;
    }
    return null;
  }

  async persist(snapshot: OrchestratorSnapshot): Promise<void> {
    const [newest] = await this.listSnapshots();
    if (newest && newest.sequence >= snapshot.sequence) {
      throw new SnapshotConflictError(snapshot.sequence);
    }

    await writeSnapshotFile(path.join(this.dir, snapshotFileName(snapshot.sequence)), snapshot);
    await this.prune();
  }

  async clear(): Promise<void> {
    await fse.remove(this.dir);
  }

  async listSnapshots(): Promise<Array<{ file: string; sequence: number }>> {
    if (!(await fse.pathExists(this.dir))) return [];

    const files = await fse.readdir(this.dir);
    return files
      .map((file) => ({ file, sequence: parseSnapshotFileName(file) }))
      .filter((entry): entry is { file: string; sequence: number } => entry.sequence !== null)
      .sort((a, b) => b.sequence - a.sequence);
  }

  private async prune(): Promise<void> {
    const keep = Math.max(1, this.options.keepSnapshots);
    const stale = (await this.listSnapshots()).slice(keep);
    await Promise.all(stale.map(({ file }) => fse.remove(path.join(this.dir, file))));
  }
}

// =============================================================================
// STORE
// =============================================================================

const MAX_COMMIT_ATTEMPTS = 5;

/**
 * Writer for orchestrator snapshots. Commits are queued on a promise chain,
 * persisted through the backend, and only then published as `current`.
 * Several processes may share one backend: when another process took the next
 * sequence first, the store reloads the latest snapshot and re-applies the commit.
 */
export class StateStore {
  private currentSnapshot: OrchestratorSnapshot | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly backend: SnapshotBackend) {}

  get current(): OrchestratorSnapshot | null {
    return this.currentSnapshot;
  }

  async load(): Promise<OrchestratorSnapshot | null> {
    const snapshot = await this.backend.loadLatest();
    this.currentSnapshot = snapshot;
    return snapshot;
  }

  /** Persists a freshly created snapshot as the starting point of a run. */
  initialize(snapshot: OrchestratorSnapshot): Promise<OrchestratorSnapshot> {
    return this.enqueue(async () => this.publish(snapshot));
  }

  /** Applies the transitions in order and persists the result once. */
  commit(...transitions: StateTransition[]): Promise<OrchestratorSnapshot> {
    return this.enqueue(async () => {
      for (let attempt = 1; ; attempt += 1) {
        const base = this.currentSnapshot;
        if (!base) {
          throw new OrchestratorError("No snapshot loaded; initialize the run before committing.");
        }

        try {
          return await this.publish(applyAll(base, transitions));
        } catch (err) {
          if (!(err instanceof SnapshotConflictError) || attempt >= MAX_COMMIT_ATTEMPTS) throw err;
          await this.reloadRun(base.run_id, err);
        }
      }
    });
  }

  reset(): Promise<void> {
    return this.enqueue(async () => {
      await this.backend.clear();
      this.currentSnapshot = null;
    });
  }

  private async reloadRun(runId: string, conflict: SnapshotConflictError): Promise<void> {
    const latest = await this.backend.loadLatest();
    if (!latest || latest.run_id !== runId) {
      throw new OrchestratorError(
        `Run ${runId} was reset or replaced by another stratum process.`,
        conflict,
      );
    }
    this.currentSnapshot = latest;
  }

  private async publish(snapshot: OrchestratorSnapshot): Promise<OrchestratorSnapshot> {
    const parsed = OrchestratorSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new OrchestratorError(`Cannot save snapshot: ${parsed.error.toString()}`, parsed.error);
    }

    await this.backend.persist(parsed.data);
    this.currentSnapshot = parsed.data;
    return parsed.data;
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export type TaskStatusCounts = Record<TaskStatus, number> & { total: number };

export type TaskStatusRow = {
  id: string;
  status: TaskStatus;
  iteration: number;
  branch: string;
  workspace: string | null;
  lastError: string | null;
};

export type SnapshotSummary = {
  runId: string;
  sequence: number;
  outcome: RunOutcome;
  startedAt: string;
  updatedAt: string;
  taskCounts: TaskStatusCounts;
  tasks: TaskStatusRow[];
  currentBatch: string[];
  completedBranches: string[];
  integratedBranches: string[];
};

export function summarizeSnapshot(
  definition: ProjectDefinition,
  snapshot: OrchestratorSnapshot,
): SnapshotSummary {
  const counts: TaskStatusCounts = {
    total: 0,
    pending: 0,
    running: 0,
    validating: 0,
    passed: 0,
    failed: 0,
  };

  for (const task of Object.values(snapshot.tasks)) {
    counts.total += 1;
    counts[task.status] += 1;
  }

  const tasks = Object.entries(snapshot.tasks)
    .map(([id, task]) => ({
      id,
      status: task.status,
      iteration: task.iteration,
      branch: task.branch,
      workspace: task.workspace ?? null,
      lastError: task.failure?.message ?? task.errors[task.errors.length - 1] ?? null,
    }))
    .sort((a, b) => compareIds(a.id, b.id));

  return {
    runId: snapshot.run_id,
    sequence: snapshot.sequence,
    outcome: deriveRunOutcome(definition, snapshot),
    startedAt: snapshot.started_at,
    updatedAt: snapshot.updated_at,
    taskCounts: counts,
    tasks,
    currentBatch: [...snapshot.current_batch],
    completedBranches: [...snapshot.completed_branches],
    integratedBranches: [...snapshot.integrated_branches],
  };
}

// =============================================================================
// FILE IO
// =============================================================================

async function readSnapshotFile(filePath: string): Promise<OrchestratorSnapshot | null> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(await fse.readFile(filePath, "utf8"));
  } catch (err) {
    // A torn or unreadable file; older snapshots are still usable.
    console.warn(`Warning: skipping unreadable snapshot ${filePath}: ${formatErrorMessage(err)}`);
    return null;
  }

  const parsed = OrchestratorSnapshotSchema.safeParse(decoded);
  if (!parsed.success) {
    console.warn(`Warning: skipping invalid snapshot ${filePath}: ${parsed.error.message}`);
    return null;
  }
  return parsed.data;
}

async function writeSnapshotFile(filePath: string, snapshot: OrchestratorSnapshot): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(snapshot, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    // link() fails with EEXIST instead of replacing a file another process saved.
    await fs.link(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    if (isAlreadyExists(err)) throw new SnapshotConflictError(snapshot.sequence, err);
    throw err;
  } finally {
    await fse.remove(tmpPath);
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}
