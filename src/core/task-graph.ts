import type { ProjectDefinition } from "./config.js";
import type { OrchestratorSnapshot } from "./state.js";
import { compareIds, ownValue, sortIds } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

/** Node id -> ids it depends on. Every referenced id must be a key. */
export type DependencyNodes = Readonly<Record<string, readonly string[]>>;

export type TopologicalResult =
  | { ok: true; order: string[]; batches: string[][] }
  | { ok: false; cycle: string[] };

// =============================================================================
// ORDERING
// =============================================================================

/**
 * Kahn layering. Each batch holds the nodes whose dependencies were all removed
 * by earlier batches, sorted by id.
 */
export function topologicalOrder(nodes: DependencyNodes): TopologicalResult {
  const remainingDeps = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const [id, deps] of Object.entries(nodes)) {
    const unique = new Set(deps);
    remainingDeps.set(id, unique.size);
    for (const dep of unique) {
      const list = dependents.get(dep) ?? [];
      list.push(id);
      dependents.set(dep, list);
    }
  }

  const order: string[] = [];
  const batches: string[][] = [];
  let frontier = sortIds([...remainingDeps].filter(([, n]) => n === 0).map(([id]) => id));

  while (frontier.length > 0) {
    batches.push(frontier);
    order.push(...frontier);

    const next: string[] = [];
    for (const id of frontier) {
      for (const dependent of dependents.get(id) ?? []) {
        const left = (remainingDeps.get(dependent) ?? 0) - 1;
        remainingDeps.set(dependent, left);
        if (left === 0) next.push(dependent);
      }
    }
    frontier = sortIds(next);
  }

  if (order.length === remainingDeps.size) {
    return { ok: true, order, batches };
  }

  const placed = new Set(order);
  const remainder = sortIds(Object.keys(nodes).filter((id) => !placed.has(id)));
  return { ok: false, cycle: findCycle(nodes, remainder) };
}

/**
 * Extracts one concrete cycle from the nodes Kahn could not place.
 * Consecutive entries are real edges (a depends on b) and the first equals the last.
 */
export function findCycle(nodes: DependencyNodes, remainder: readonly string[]): string[] {
  const stuck = new Set(remainder);
  const start = sortIds(stuck)[0];
  if (start === undefined) return [];

  const path: string[] = [];
  const seenAt = new Map<string, number>();
  let current = start;

  while (!seenAt.has(current)) {
    seenAt.set(current, path.length);
    path.push(current);

    const next = sortIds((ownValue(nodes, current) ?? []).filter((dep) => stuck.has(dep)))[0];
    if (next === undefined) {
      // Only reachable when `remainder` is not a Kahn remainder.
      return [];
    }
    current = next;
  }

  const cycleStart = seenAt.get(current) ?? 0;
  return [...path.slice(cycleStart), current];
}

// =============================================================================
// QUERIES
// =============================================================================

/** Pending tasks whose dependencies have all passed, sorted by id. */
export function readyTasks(
  definition: ProjectDefinition,
  snapshot: OrchestratorSnapshot,
): string[] {
  const ready: string[] = [];

  for (const task of Object.values(definition.tasks)) {
    const state = ownValue(snapshot.tasks, task.id);
    if (!state || state.status !== "pending") continue;

    const unblocked = task.dependencies.every(
      (dep) => ownValue(snapshot.tasks, dep)?.status === "passed",
    );
    if (unblocked) ready.push(task.id);
  }

  return ready.sort(compareIds);
}

/** Every task that transitively depends on `taskId`, sorted by id. */
export function dependentsOf(definition: ProjectDefinition, taskId: string): string[] {
  const reverse = new Map<string, string[]>();
  for (const task of Object.values(definition.tasks)) {
    for (const dep of task.dependencies) {
      const list = reverse.get(dep) ?? [];
      list.push(task.id);
      reverse.set(dep, list);
    }
  }

  const found = new Set<string>();
  const queue = [...(reverse.get(taskId) ?? [])];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || found.has(id)) continue;
    found.add(id);
    queue.push(...(reverse.get(id) ?? []));
  }

  return sortIds(found);
}

/** True when `ancestor` is reachable from `layerId` through layer `depends_on` edges. */
export function layerDependsOn(
  layers: Readonly<Record<string, { depends_on: readonly string[] }>>,
  layerId: string,
  ancestor: string,
): boolean {
  const seen = new Set<string>();
  const stack = [...(ownValue(layers, layerId)?.depends_on ?? [])];

  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    if (next === ancestor) return true;
    seen.add(next);
    stack.push(...(ownValue(layers, next)?.depends_on ?? []));
  }

  return false;
}
