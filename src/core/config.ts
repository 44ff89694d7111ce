import { z } from "zod";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_MAX_PARALLEL = 4;
export const DEFAULT_AGENT = "implementation-agent";
export const DEFAULT_VALIDATOR_TIMEOUT_SECONDS = 300;
export const DEFAULT_BRANCH_PREFIX = "stratum";
export const DEFAULT_KEEP_SNAPSHOTS = 20;

// =============================================================================
// SCHEMAS
// =============================================================================

const IdListSchema = z.array(z.string().min(1)).default([]);

const VersionSchema = z
  .union([z.string().min(1), z.number()])
  .transform((value) => String(value));

export const ProjectSectionSchema = z
  .object({
    name: z.string().min(1),
    version: VersionSchema,
    description: z.string().optional(),
    max_iterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
    max_parallel: z.number().int().positive().default(DEFAULT_MAX_PARALLEL),
    layer_gating: z.boolean().default(false),
  })
  .strict();

export const LayerConfigSchema = z
  .object({
    description: z.string().default(""),
    depends_on: IdListSchema,
    validators: IdListSchema,
  })
  .strict();

export const TaskConfigSchema = z
  .object({
    layer: z.string().min(1),
    description: z.string().default(""),
    depends_on: IdListSchema,
    agent: z.string().min(1).default(DEFAULT_AGENT),
    branch: z.string().min(1).optional(),
    command: z.string().min(1).optional(),
  })
  .strict();

const ValidatorObjectSchema = z
  .object({
    command: z.string().min(1),
    timeout_seconds: z.number().positive().default(DEFAULT_VALIDATOR_TIMEOUT_SECONDS),
  })
  .strict();

export const ValidatorConfigSchema = z.union([
  z
    .string()
    .min(1)
    .transform((command) => ({ command, timeout_seconds: DEFAULT_VALIDATOR_TIMEOUT_SECONDS })),
  ValidatorObjectSchema,
]);

const GateCommandSchema = z
  .object({
    name: z.string().min(1).optional(),
    cmd: z.string().min(1),
    timeout_seconds: z.number().positive().default(DEFAULT_VALIDATOR_TIMEOUT_SECONDS),
  })
  .strict();

export const GateConfigSchema = z
  .object({
    description: z.string().optional(),
    commands: z.array(GateCommandSchema).default([]),
  })
  .strict();

export const WorktreeConfigSchema = z
  .object({
    branch_prefix: z.string().min(1).default(DEFAULT_BRANCH_PREFIX),
    cleanup_on_success: z.boolean().default(true),
    base_dir: z.string().min(1).default(".worktrees"),
    main_branch: z.string().min(1).default("main"),
    rebase: z.boolean().default(true),
  })
  .strict();

export const StateConfigSchema = z
  .object({
    keep_snapshots: z.number().int().min(1).default(DEFAULT_KEEP_SNAPSHOTS),
  })
  .strict();

export const DesignConfigSchema = z
  .object({
    project: ProjectSectionSchema,
    layers: z.record(z.string().min(1), LayerConfigSchema),
    tasks: z
      .record(z.string().min(1), TaskConfigSchema)
      .refine((tasks) => Object.keys(tasks).length > 0, {
        message: "At least one task is required",
      }),
    validators: z.record(z.string().min(1), ValidatorConfigSchema).default({}),
    gates: z.record(z.string().min(1), GateConfigSchema).default({}),
    worktree: WorktreeConfigSchema.default({}),
    state: StateConfigSchema.default({}),
  })
  .strict();

// =============================================================================
// TYPES
// =============================================================================

export type DesignConfig = z.infer<typeof DesignConfigSchema>;
export type ProjectSection = z.infer<typeof ProjectSectionSchema>;
export type LayerConfig = z.infer<typeof LayerConfigSchema>;
export type TaskConfig = z.infer<typeof TaskConfigSchema>;
export type WorktreeConfig = z.infer<typeof WorktreeConfigSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;

export type DesignFormat = "yaml" | "toml";

export type DesignSourceInfo = {
  path: string;
  format: DesignFormat;
  /** sha256 of the document text, for diagnostics only. */
  fingerprint: string;
};

export type ResolvedValidator = {
  id: string;
  command: string;
  timeout_seconds: number;
};

export type ResolvedLayer = LayerConfig & { id: string };

export type ResolvedTask = TaskConfig & {
  id: string;
  branch: string;
  /** Declared dependencies plus implicit layer-gate edges, sorted. */
  dependencies: string[];
};

/**
 * A validated design document. Everything the scheduler needs is resolved up front:
 * branch names, effective dependencies, validator commands and the topological order.
 */
export type ProjectDefinition = {
  config: DesignConfig;
  layers: Record<string, ResolvedLayer>;
  tasks: Record<string, ResolvedTask>;
  validators: Record<string, ResolvedValidator>;
  taskOrder: string[];
  source: DesignSourceInfo;
};
