import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import { parse as parseToml } from "smol-toml";
import type { ZodIssue } from "zod";

import {
  DesignConfigSchema,
  type DesignConfig,
  type DesignFormat,
  type DesignSourceInfo,
  type ProjectDefinition,
  type ResolvedLayer,
  type ResolvedTask,
  type ResolvedValidator,
} from "./config.js";
import {
  ConfigError,
  CyclicDependencyError,
  LayerOrderError,
  UnknownDependencyError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "./errors.js";
import { layerDependsOn, topologicalOrder } from "./task-graph.js";
import { ownValue, sortIds } from "./utils.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ALIASES
// =============================================================================

// Older design documents use `max_parallel_agents`, `validation` and `cmd`.
function normalizeAliases(doc: unknown): unknown {
  if (!isPlainObject(doc)) return doc;

  const config: Record<string, unknown> = { ...doc };

  config.project = renameKey(config.project, "max_parallel_agents", "max_parallel");

  if (isPlainObject(config.layers)) {
    config.layers = mapValues(config.layers, (layer) =>
      renameKey(layer, "validation", "validators"),
    );
  }

  if (isPlainObject(config.validators)) {
    config.validators = mapValues(config.validators, (validator) =>
      renameKey(validator, "cmd", "command"),
    );
  }

  return config;
}

function renameKey(value: unknown, from: string, to: string): unknown {
  if (!isPlainObject(value) || !(from in value) || to in value) return value;

  const { [from]: moved, ...rest } = value;
  return { ...rest, [to]: moved };
}

function mapValues(
  record: Record<string, unknown>,
  fn: (value: unknown) => unknown,
): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([k, v]) => [k, fn(v)]));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_DESIGN_HINT =
  "Run `stratum init` to create a starter design document or pass --config <path>.";
const INVALID_DESIGN_HINT = "Fix the design document and rerun.";

type ParseErrorLocation = {
  line: number;
  column: number;
};

function resolveParseErrorLocation(error: unknown, format: DesignFormat): ParseErrorLocation | null {
  if (!isPlainObject(error)) return null;

  // js-yaml marks are zero-based; smol-toml reports one-based positions.
  if (format === "yaml") {
    const mark = error.mark;
    if (!isPlainObject(mark)) return null;
    const { line, column } = mark;
    if (typeof line !== "number" || typeof column !== "number") return null;
    return { line: line + 1, column: column + 1 };
  }

  const { line, column } = error;
  if (typeof line !== "number" || typeof column !== "number") return null;
  return { line, column };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

export function createMissingDesignError(designPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Design document missing.",
    message: `Design document not found at ${designPath}.`,
    hint: MISSING_DESIGN_HINT,
  });
}

export function createInvalidDesignError(designPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Design document invalid.",
    message: `Design document at ${designPath} is invalid: ${cause.message}`,
    hint: INVALID_DESIGN_HINT,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function designFormatForPath(filePath: string): DesignFormat {
  return path.extname(filePath).toLowerCase() === ".toml" ? "toml" : "yaml";
}

export function fingerprintDesignText(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

/** Parses document text and validates it. Pure apart from reading the environment. */
export function parseDesignText(
  text: string,
  source: { path: string; format?: DesignFormat },
): ProjectDefinition {
  const format = source.format ?? designFormatForPath(source.path);

  let doc: unknown;
  try {
    doc = format === "toml" ? parseToml(text) : yaml.load(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveParseErrorLocation(err, format);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(
      `Failed to parse ${format.toUpperCase()} design document at ${source.path}${locationDetail}: ${detail}`,
      err,
    );
  }

  return parseDesignDocument(doc, {
    path: source.path,
    format,
    fingerprint: fingerprintDesignText(text),
  });
}

/**
 * Validates an already-decoded document: structure first, then references,
 * then task cycles, layer cycles and finally layer/task consistency.
 */
export function parseDesignDocument(doc: unknown, source: DesignSourceInfo): ProjectDefinition {
  const expanded = expandEnv(doc, { file: source.path, trail: [] });
  const normalized = normalizeAliases(expanded);

  const parsed = DesignConfigSchema.safeParse(normalized);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid design document at ${source.path}:\n${details}`, parsed.error);
  }

  const config = parsed.data;
  const validators = resolveValidators(config);

  assertReferencesResolve(config, validators);
  assertAcyclic("task", dependsOnEdges(config.tasks));
  assertAcyclic("layer", dependsOnEdges(config.layers));
  assertLayerConsistency(config);

  const layers = resolveLayers(config);
  const tasks = resolveTasks(config);
  const ordering = topologicalOrder(
    Object.fromEntries(Object.values(tasks).map((task) => [task.id, task.dependencies])),
  );
  if (!ordering.ok) {
    throw new CyclicDependencyError("task", ordering.cycle);
  }

  return { config, layers, tasks, validators, taskOrder: ordering.order, source };
}

export function loadDesignDocument(designPath: string): ProjectDefinition {
  const absolutePath = path.resolve(designPath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read design document at ${absolutePath}`, err);
  }

  return parseDesignText(raw, { path: absolutePath });
}

/** Same as loadDesignDocument, with failures rewritten for the CLI. */
export function loadDesignDocumentForCli(designPath: string): ProjectDefinition {
  const absolutePath = path.resolve(designPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingDesignError(absolutePath);
  }

  try {
    return loadDesignDocument(absolutePath);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidDesignError(absolutePath, err);
    }
    throw err;
  }
}

// =============================================================================
// VALIDATION
// =============================================================================

function assertReferencesResolve(
  config: DesignConfig,
  validators: Record<string, ResolvedValidator>,
): void {
  for (const taskId of sortIds(Object.keys(config.tasks))) {
    const task = config.tasks[taskId];
    if (!task) continue;

    if (!Object.hasOwn(config.layers, task.layer)) {
      throw new UnknownDependencyError("task", taskId, task.layer, "layer");
    }
    for (const dep of task.depends_on) {
      if (!Object.hasOwn(config.tasks, dep)) {
        throw new UnknownDependencyError("task", taskId, dep, "depends_on");
      }
    }
  }

  for (const layerId of sortIds(Object.keys(config.layers))) {
    const layer = config.layers[layerId];
    if (!layer) continue;

    for (const dep of layer.depends_on) {
      if (!Object.hasOwn(config.layers, dep)) {
        throw new UnknownDependencyError("layer", layerId, dep, "depends_on");
      }
    }
    for (const validatorId of layer.validators) {
      if (!Object.hasOwn(validators, validatorId)) {
        throw new UnknownDependencyError("layer", layerId, validatorId, "validators");
      }
    }
  }
}

function dependsOnEdges(
  entries: Record<string, { depends_on: string[] }>,
): Record<string, string[]> {
  return Object.fromEntries(Object.entries(entries).map(([id, entry]) => [id, entry.depends_on]));
}

function assertAcyclic(scope: "task" | "layer", edges: Record<string, string[]>): void {
  const result = topologicalOrder(edges);
  if (!result.ok) {
    throw new CyclicDependencyError(scope, result.cycle);
  }
}

function assertLayerConsistency(config: DesignConfig): void {
  for (const taskId of sortIds(Object.keys(config.tasks))) {
    const task = config.tasks[taskId];
    if (!task) continue;

    for (const depId of sortIds(task.depends_on)) {
      const dep = ownValue(config.tasks, depId);
      if (!dep || dep.layer === task.layer) continue;

      if (!layerDependsOn(config.layers, task.layer, dep.layer)) {
        throw new LayerOrderError(taskId, depId, task.layer, dep.layer);
      }
    }
  }
}

// =============================================================================
// RESOLUTION
// =============================================================================

// Gate commands are read after `validators` and win on a name clash.
function resolveValidators(config: DesignConfig): Record<string, ResolvedValidator> {
  const resolved: Record<string, ResolvedValidator> = {};

  for (const [id, validator] of Object.entries(config.validators)) {
    resolved[id] = { id, ...validator };
  }

  for (const gateId of sortIds(Object.keys(config.gates))) {
    const gate = config.gates[gateId];
    if (!gate) continue;

    for (const entry of gate.commands) {
      const id = entry.name ?? gateId;
      resolved[id] = { id, command: entry.cmd, timeout_seconds: entry.timeout_seconds };
    }
  }

  return resolved;
}

function resolveLayers(config: DesignConfig): Record<string, ResolvedLayer> {
  return Object.fromEntries(
    Object.entries(config.layers).map(([id, layer]) => [id, { ...layer, id }]),
  );
}

function resolveTasks(config: DesignConfig): Record<string, ResolvedTask> {
  const prefix = config.worktree.branch_prefix;
  const tasksByLayer = new Map<string, string[]>();
  for (const [id, task] of Object.entries(config.tasks)) {
    const list = tasksByLayer.get(task.layer) ?? [];
    list.push(id);
    tasksByLayer.set(task.layer, list);
  }

  const tasks: Record<string, ResolvedTask> = {};
  const branchOwners = new Map<string, string>();

  for (const id of sortIds(Object.keys(config.tasks))) {
    const task = config.tasks[id];
    if (!task) continue;

    const dependencies = new Set(task.depends_on);
    if (config.project.layer_gating) {
      for (const upstreamLayer of ownValue(config.layers, task.layer)?.depends_on ?? []) {
        for (const upstreamTask of tasksByLayer.get(upstreamLayer) ?? []) {
          dependencies.add(upstreamTask);
        }
      }
    }

    const branch = task.branch ?? `${prefix}/${id}`;
    const owner = branchOwners.get(branch);
    if (owner) {
      throw new ConfigError(`Tasks "${owner}" and "${id}" both use branch "${branch}"`);
    }
    branchOwners.set(branch, id);

    tasks[id] = { ...task, id, branch, dependencies: sortIds(dependencies) };
  }

  return tasks;
}
