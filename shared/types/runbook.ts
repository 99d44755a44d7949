/**
 * Runbook Definition Types
 *
 * Declarative runbooks name the artifacts of a compliance scan and how each is
 * produced: from a connector (`source`), from upstream artifacts (`inputs`,
 * optionally through an analyser `transform`), from a nested runbook
 * (`child_runbook`) or from a prior run (`reuse`).
 *
 * Keys are snake_case because runbooks are authored by hand in YAML or JSON.
 */

import { z } from "zod";

/**
 * Connector or analyser reference.
 */
export const ComponentRefSchema = z.object({
  /** Type name the component factory is registered under */
  type: z.string().min(1),
  /** Properties passed to the factory's create() */
  properties: z.record(z.string(), z.unknown()).default({}),
});
export type ComponentRef = z.infer<typeof ComponentRefSchema>;

/**
 * Copy an artifact from a previous run instead of producing it.
 */
export const ReuseConfigSchema = z.object({
  /** Run ID to copy from */
  from_run: z.string().min(1),
  /** Artifact ID within that run */
  artifact: z.string().min(1),
});
export type ReuseConfig = z.infer<typeof ReuseConfigSchema>;

/**
 * Child runbook directive. The artifact carrying it is replaced at plan time by
 * the child's (namespaced) artifacts.
 */
export const ChildRunbookConfigSchema = z.object({
  /** Path to the child runbook, relative to the parent runbook file */
  path: z.string().min(1),
  /** Child input name -> parent artifact ID */
  input_mapping: z.record(z.string(), z.string().min(1)).default({}),
  /** Single child output exposed under the parent artifact's ID */
  output: z.string().min(1).optional(),
  /** Child output name -> alias in the parent */
  output_mapping: z.record(z.string(), z.string().min(1)).optional(),
});
export type ChildRunbookConfig = z.infer<typeof ChildRunbookConfigSchema>;

export const MergeStrategySchema = z.enum(["concatenate"]);
export type MergeStrategy = z.infer<typeof MergeStrategySchema>;

/**
 * A single artifact in a runbook.
 */
export const ArtifactDefinitionSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  contact: z.string().optional(),

  /** Produce from a connector */
  source: ComponentRefSchema.optional(),
  /** Upstream artifact IDs (fan-in when more than one) */
  inputs: z
    .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
    .transform((value) => (typeof value === "string" ? [value] : value))
    .optional(),
  /** Analyser applied to the merged inputs */
  transform: ComponentRefSchema.optional(),
  /** How fan-in inputs are merged before the transform */
  merge: MergeStrategySchema.default("concatenate"),

  /** Schema override: "name" or "name/version" */
  output_schema: z.string().min(1).optional(),

  child_runbook: ChildRunbookConfigSchema.optional(),
  reuse: ReuseConfigSchema.optional(),

  /** Failure is expected and only logged as a warning */
  optional: z.boolean().default(false),
});
export type ArtifactDefinition = z.infer<typeof ArtifactDefinitionSchema>;
export type ArtifactDefinitionDocument = z.input<typeof ArtifactDefinitionSchema>;

/**
 * Execution configuration for a runbook.
 */
export const RunbookConfigSchema = z.object({
  /** Whole-run timeout in seconds */
  timeout: z.number().positive().default(300),
  /** Maximum artifacts produced concurrently */
  max_concurrency: z.number().int().positive().default(10),
  /** Per-artifact timeout in seconds */
  step_timeout: z.number().positive().optional(),
  /** Maximum nesting depth of child runbooks */
  max_child_depth: z.number().int().nonnegative().default(3),
  /** Directories searched for child runbooks */
  template_paths: z.array(z.string()).default([]),
});
export type RunbookConfig = z.infer<typeof RunbookConfigSchema>;

/**
 * Input a child runbook expects from its parent.
 */
export const RunbookInputDeclarationSchema = z.object({
  /** Schema string the mapped parent artifact must produce */
  input_schema: z.string().min(1),
  /** An unmapped optional input is dropped from the artifacts that use it */
  optional: z.boolean().default(false),
  description: z.string().optional(),
});
export type RunbookInputDeclaration = z.infer<typeof RunbookInputDeclarationSchema>;

/**
 * Output a child runbook exposes to its parent.
 */
export const RunbookOutputDeclarationSchema = z.object({
  /** Artifact in this runbook */
  artifact: z.string().min(1),
  description: z.string().optional(),
});
export type RunbookOutputDeclaration = z.infer<typeof RunbookOutputDeclarationSchema>;

/**
 * Complete runbook document.
 */
export const RunbookSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  contact: z.string().optional(),
  config: RunbookConfigSchema.default({}),
  /** Declared inputs (only meaningful when used as a child runbook) */
  inputs: z.record(z.string(), RunbookInputDeclarationSchema).optional(),
  /** Declared outputs (only meaningful when used as a child runbook) */
  outputs: z.record(z.string(), RunbookOutputDeclarationSchema).optional(),
  artifacts: z.record(z.string().min(1), ArtifactDefinitionSchema),
});
export type Runbook = z.infer<typeof RunbookSchema>;
export type RunbookDocument = z.input<typeof RunbookSchema>;

/**
 * Result of runbook validation.
 */
export interface RunbookValidationResult {
  valid: boolean;
  errors?: RunbookValidationError[];
}

export type RunbookValidationErrorType =
  | "schema"
  | "duplicate"
  | "identifier"
  | "production"
  | "reference"
  | "schema-string"
  | "output";

/**
 * A single validation error.
 */
export interface RunbookValidationError {
  type: RunbookValidationErrorType;
  message: string;
  /** Path to the error (e.g., "artifacts.findings.inputs") */
  path?: string;
  details?: unknown;
}

/**
 * Runbook with source information.
 */
export interface LoadedRunbook {
  runbook: Runbook;
  /** Resolved file path, or a logical key for runbooks not loaded from disk */
  filePath?: string;
  loadedAt: number;
}
