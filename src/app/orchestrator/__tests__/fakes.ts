/**
 * Orchestrator test fakes.
 * Purpose: provide deterministic adapters for orchestrator and integration tests.
 * Assumptions: fakes are in-memory; the git graph only tracks parents and refs.
 * Usage: const harness = createHarness(definition); await harness.orchestrator.onStart();
 */

import { FakeExecutor } from "../../../__tests__/helpers/fake-executor.js";
import { RUN_ID } from "../../../core/__tests__/design-fixtures.js";
import type { ProjectDefinition, ResolvedTask } from "../../../core/config.js";
import { GitError, WorkspaceError } from "../../../core/errors.js";
import { MemoryEventSink } from "../../../core/logger.js";
import { MemorySnapshotBackend, StateStore } from "../../../core/state-store.js";
import type { FastForwardResult, RebaseResult } from "../../../git/merge.js";
import { Orchestrator } from "../orchestrator.js";
import type {
  AgentRunResult,
  AgentRunner,
  Clock,
  DesignProbeResult,
  DesignSource,
  DispatchedTask,
  WorkspaceHandle,
  WorkspaceManager,
} from "../ports.js";
import type { Vcs } from "../vcs/vcs.js";

// =============================================================================
// GIT GRAPH
// =============================================================================

export class FakeGitGraph {
  readonly parents = new Map<string, string | null>();
  readonly refs = new Map<string, string>();
  private nextId = 0;

  constructor(readonly mainBranch = "main") {
    this.refs.set(mainBranch, this.newCommit(null));
  }

  newCommit(parent: string | null): string {
    this.nextId += 1;
    const id = `c${this.nextId}`;
    this.parents.set(id, parent);
    return id;
  }

  /** Adds a commit on top of `branch` (optionally re-parented onto `base` first). */
  commitOn(branch: string, base?: string): string {
    const parent = this.resolve(base ?? branch);
    const id = this.newCommit(parent);
    this.refs.set(branch, id);
    return id;
  }

  resolve(ref: string): string {
    const fromRef = this.refs.get(ref);
    if (fromRef) return fromRef;
    if (this.parents.has(ref)) return ref;
    throw new GitError(`unknown ref ${ref}`);
  }

  isAncestor(ancestorRef: string, descendantRef: string): boolean {
    const ancestor = this.resolve(ancestorRef);
    let cursor: string | null = this.resolve(descendantRef);
    while (cursor) {
      if (cursor === ancestor) return true;
      cursor = this.parents.get(cursor) ?? null;
    }
    return false;
  }
}

// =============================================================================
// WORKSPACES + VCS
// =============================================================================

export class FakeWorkspaceManager implements WorkspaceManager {
  readonly created: WorkspaceHandle[] = [];
  readonly destroyed: WorkspaceHandle[] = [];
  readonly failFor = new Set<string>();

  constructor(
    private readonly graph: FakeGitGraph,
    private readonly root = "/repo/.worktrees",
  ) {}

  async createWorkspace(task: ResolvedTask): Promise<WorkspaceHandle> {
    if (this.failFor.has(task.id) || this.graph.refs.has(task.branch)) {
      throw new WorkspaceError(
        `Cannot create workspace for task ${task.id}: branch ${task.branch} already exists.`,
      );
    }

    this.graph.refs.set(task.branch, this.graph.resolve(this.graph.mainBranch));
    const handle = {
      taskId: task.id,
      path: `${this.root}/${task.branch.replace(/\//g, "-")}`,
      branch: task.branch,
    };
    this.created.push(handle);
    return handle;
  }

  async destroyWorkspace(handle: WorkspaceHandle): Promise<string[]> {
    this.destroyed.push(handle);
    return [];
  }

  async isIsolatedContext(dir: string): Promise<boolean> {
    return this.created.some((handle) => handle.path === dir);
  }

  async integrationTarget(): Promise<string> {
    return this.graph.mainBranch;
  }

  async isAncestorOf(ancestor: string, descendant: string): Promise<boolean> {
    return this.graph.isAncestor(ancestor, descendant);
  }

  branchForPath(dir: string): string {
    const handle = this.created.find((entry) => entry.path === dir);
    if (!handle) throw new GitError(`not a worktree: ${dir}`);
    return handle.branch;
  }
}

export class FakeVcs implements Vcs {
  readonly fastForwards: { target: string; ref: string }[] = [];
  readonly rebases: { branch: string; upstream: string }[] = [];
  readonly restores: { branch: string; head: string }[] = [];
  readonly conflicts = new Set<string>();
  dirty = false;

  constructor(
    private readonly graph: FakeGitGraph,
    private readonly workspaces: FakeWorkspaceManager,
  ) {}

  async ensureCleanWorkingTree(): Promise<void> {
    if (this.dirty) {
      throw new GitError("Repository has uncommitted changes (cwd=/repo).");
    }
  }

  async resolveRef(ref: string): Promise<string> {
    return this.graph.resolve(ref);
  }

  async branchExists(branch: string): Promise<boolean> {
    return this.graph.refs.has(branch);
  }

  async fastForward(targetBranch: string, ref: string): Promise<FastForwardResult> {
    const currentHead = this.graph.resolve(targetBranch);
    if (!this.graph.isAncestor(currentHead, ref)) {
      return {
        status: "blocked",
        reason: "non_fast_forward",
        message: `Cannot fast-forward ${targetBranch} to ${ref}.`,
        currentHead,
        targetRef: ref,
      };
    }

    const head = this.graph.resolve(ref);
    this.graph.refs.set(targetBranch, head);
    this.fastForwards.push({ target: targetBranch, ref });
    return { status: "fast_forwarded", previousHead: currentHead, head };
  }

  async rebaseOnto(worktreePath: string, upstream: string): Promise<RebaseResult> {
    const branch = this.workspaces.branchForPath(worktreePath);
    this.rebases.push({ branch, upstream });
    if (this.conflicts.has(branch)) {
      return { status: "conflict", message: `CONFLICT while rebasing ${branch}`, aborted: true };
    }
    return { status: "rebased", head: this.graph.commitOn(branch, upstream) };
  }

  async restoreBranch(worktreePath: string, head: string): Promise<void> {
    const branch = this.workspaces.branchForPath(worktreePath);
    this.restores.push({ branch, head });
    this.graph.refs.set(branch, head);
  }
}

// =============================================================================
// AGENTS, DESIGN SOURCE, CLOCK
// =============================================================================

export type FakeAgentMode = "immediate" | "manual";

export class FakeAgentRunner implements AgentRunner {
  readonly started: DispatchedTask[] = [];
  readonly aborted: string[] = [];
  private readonly waiting = new Map<string, (result: AgentRunResult) => void>();

  constructor(
    private readonly opts: { mode?: FakeAgentMode; onStart?: (task: DispatchedTask) => void } = {},
  ) {}

  start(task: DispatchedTask, signal: AbortSignal): Promise<AgentRunResult> {
    this.started.push(task);
    this.opts.onStart?.(task);

    if ((this.opts.mode ?? "immediate") === "immediate") {
      return Promise.resolve({ exitCode: 0, output: "" });
    }

    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve({ exitCode: null, output: "aborted" });
        return;
      }
      this.waiting.set(task.taskId, resolve);
      signal.addEventListener(
        "abort",
        () => {
          this.aborted.push(task.taskId);
          resolve({ exitCode: null, output: "aborted" });
        },
        { once: true },
      );
    });
  }

  finish(taskId: string): void {
    const resolve = this.waiting.get(taskId);
    if (!resolve) throw new Error(`agent for ${taskId} is not waiting`);
    this.waiting.delete(taskId);
    resolve({ exitCode: 0, output: "" });
  }

  waitingFor(): string[] {
    return [...this.waiting.keys()].sort();
  }
}

export class FakeDesignSource implements DesignSource {
  probes = 0;
  private failure: string | null = null;

  break(reason: string): void {
    this.failure = reason;
  }

  async probe(): Promise<DesignProbeResult> {
    this.probes += 1;
    if (this.failure !== null) return { ok: false, reason: this.failure };
    return { ok: true, fingerprint: "test-fingerprint" };
  }
}

/** Starts at 2026-01-01T00:00:00Z; every isoNow() advances one second. */
export class FakeClock implements Clock {
  private current = Date.UTC(2026, 0, 1, 0, 0, 0);

  now(): Date {
    return new Date(this.current);
  }

  isoNow(): string {
    const value = new Date(this.current).toISOString();
    this.current += 1000;
    return value;
  }
}

// =============================================================================
// HARNESS
// =============================================================================

export type Harness = {
  orchestrator: Orchestrator;
  store: StateStore;
  backend: MemorySnapshotBackend;
  events: MemoryEventSink;
  executor: FakeExecutor;
  graph: FakeGitGraph;
  workspaces: FakeWorkspaceManager;
  vcs: FakeVcs;
  design: FakeDesignSource;
  clock: FakeClock;
};

export function createHarness(
  definition: ProjectDefinition,
  opts: { backend?: MemorySnapshotBackend } = {},
): Harness {
  const backend = opts.backend ?? new MemorySnapshotBackend();
  const store = new StateStore(backend);
  const events = new MemoryEventSink({ runId: RUN_ID });
  const executor = new FakeExecutor();
  const graph = new FakeGitGraph();
  const workspaces = new FakeWorkspaceManager(graph);
  const vcs = new FakeVcs(graph, workspaces);
  const design = new FakeDesignSource();
  const clock = new FakeClock();

  const orchestrator = new Orchestrator({
    definition,
    store,
    runId: RUN_ID,
    ports: { workspaces, vcs, executor, designSource: design, events, clock },
  });

  return { orchestrator, store, backend, events, executor, graph, workspaces, vcs, design, clock };
}
