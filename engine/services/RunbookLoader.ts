/**
 * RunbookLoader - Load and validate runbook definitions
 *
 * Parses runbooks from YAML or JSON text, substitutes ${VAR} references from
 * the environment, validates the document with Zod and then checks the
 * structural rules Zod cannot express (production method, references, schema
 * strings, declared outputs). Never consults the component registry.
 */

import fs from "fs/promises";
import path from "path";
import * as yaml from "js-yaml";
import {
  RunbookSchema,
  type LoadedRunbook,
  type Runbook,
  type RunbookValidationError,
  type RunbookValidationResult,
} from "../../shared/types/runbook.js";
import { tryParseSchemaString } from "../../shared/utils/schemaString.js";
import { isValidKey } from "./artifact-store/ArtifactStore.js";
import {
  DuplicateArtifactError,
  InvalidArtifactIdError,
  InvalidOutputMappingError,
  InvalidSchemaStringError,
  MissingArtifactError,
  RunbookParseError,
  getUserMessage,
  type PlanningError,
} from "../utils/errorTypes.js";
import { logDebug } from "../utils/logger.js";

const ENV_REFERENCE_RE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

interface ValidationIssue {
  error: RunbookValidationError;
  toError: () => PlanningError;
}

export interface ParseTextOptions {
  /** Used in error messages */
  filePath?: string;
  /** Variables available to ${VAR} substitution */
  env?: NodeJS.ProcessEnv;
}

export class RunbookLoader {
  /**
   * Load a runbook from a YAML or JSON file.
   */
  async loadFromFile(file: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedRunbook> {
    const filePath = path.resolve(file);
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new RunbookParseError(
        `Cannot read runbook ${filePath}: ${getUserMessage(error)}`,
        { filePath },
        error instanceof Error ? error : undefined
      );
    }

    const runbook = this.parseText(text, { filePath, env });
    logDebug("Loaded runbook", { filePath, name: runbook.name });

    return {
      runbook,
      filePath,
      loadedAt: Date.now(),
    };
  }

  /**
   * Parse YAML or JSON text into a validated runbook.
   */
  parseText(text: string, options: ParseTextOptions = {}): Runbook {
    const { filePath, env = process.env } = options;

    let raw: unknown;
    try {
      raw = yaml.load(text, { filename: filePath });
    } catch (error) {
      if (error instanceof yaml.YAMLException && error.reason === "duplicated mapping key") {
        const key = duplicateKeyAt(text, error.mark.line, error.mark.column);
        throw new DuplicateArtifactError(key, { filePath, line: error.mark.line + 1 });
      }
      throw new RunbookParseError(
        `Invalid YAML${filePath ? ` in ${filePath}` : ""}: ${getUserMessage(error)}`,
        { filePath },
        error instanceof Error ? error : undefined
      );
    }

    return this.parse(substituteEnv(raw, env, filePath));
  }

  /**
   * Validate and return the runbook, throwing the typed error for the first
   * problem found.
   */
  parse(data: unknown): Runbook {
    const { issues, runbook } = this.check(data);
    const first = issues[0];
    if (first) {
      throw first.toError();
    }
    if (!runbook) {
      throw new RunbookParseError("Runbook failed validation");
    }
    return runbook;
  }

  /**
   * Validate a runbook document without throwing.
   */
  validate(data: unknown): RunbookValidationResult {
    const { issues } = this.check(data);
    if (issues.length === 0) {
      return { valid: true };
    }
    return { valid: false, errors: issues.map((issue) => issue.error) };
  }

  private check(data: unknown): { issues: ValidationIssue[]; runbook?: Runbook } {
    const issues: ValidationIssue[] = [];

    // Step 1: Schema validation with Zod
    const parseResult = RunbookSchema.safeParse(data);
    if (!parseResult.success) {
      for (const issue of parseResult.error.issues) {
        const path = issue.path.join(".");
        const message = path ? `${path}: ${issue.message}` : issue.message;
        issues.push({
          error: { type: "schema", message, path: path || undefined },
          toError: () => new RunbookParseError(message, { path }),
        });
      }
      return { issues };
    }

    const runbook = parseResult.data;
    const artifactIds = new Set(Object.keys(runbook.artifacts));
    const declaredInputs = new Set(Object.keys(runbook.inputs ?? {}));

    // Step 2: Declared inputs share the artifact namespace
    for (const name of declaredInputs) {
      if (artifactIds.has(name)) {
        issues.push({
          error: {
            type: "duplicate",
            message: `Runbook input '${name}' has the same identifier as an artifact`,
            path: `inputs.${name}`,
          },
          toError: () => new DuplicateArtifactError(name, { reason: "input and artifact share an identifier" }),
        });
      }
    }

    // Step 2b: Artifact ids become store keys
    for (const id of artifactIds) {
      if (!isValidKey(id)) {
        issues.push({
          error: {
            type: "identifier",
            message: `Artifact '${id}' has an invalid identifier`,
            path: `artifacts.${id}`,
          },
          toError: () => new InvalidArtifactIdError(id),
        });
      }
    }

    // Step 3: Production method of each artifact
    for (const [id, artifact] of Object.entries(runbook.artifacts)) {
      const path = `artifacts.${id}`;
      const production = (message: string): void => {
        issues.push({
          error: { type: "production", message: `Artifact '${id}' ${message}`, path },
          toError: () => new RunbookParseError(`Artifact '${id}' ${message}`, { artifactId: id }),
        });
      };

      const hasSource = artifact.source !== undefined;
      const hasInputs = artifact.inputs !== undefined;

      if (artifact.child_runbook) {
        const child = artifact.child_runbook;
        if (!hasInputs) production("uses child_runbook but declares no inputs");
        if (hasSource) production("cannot combine child_runbook with source");
        if (artifact.transform) production("cannot combine child_runbook with transform");
        if (artifact.reuse) production("cannot combine child_runbook with reuse");

        const hasOutput = child.output !== undefined;
        const hasOutputMapping = child.output_mapping !== undefined;
        if (hasOutput === hasOutputMapping) {
          const message = `Artifact '${id}' child_runbook must set exactly one of output or output_mapping`;
          issues.push({
            error: { type: "output", message, path: `${path}.child_runbook` },
            toError: () => new InvalidOutputMappingError(id, child.output ?? "", message),
          });
        }

        for (const [inputName, parentId] of Object.entries(child.input_mapping)) {
          if (!artifact.inputs?.includes(parentId)) {
            production(`maps child input '${inputName}' to '${parentId}', which is not listed in inputs`);
          }
        }
        continue;
      }

      if (artifact.reuse) {
        if (hasInputs) production("cannot combine reuse with inputs");
        if (artifact.transform) production("cannot combine reuse with transform");
        if (!hasSource && artifact.output_schema === undefined) {
          production("reuses a prior artifact without a source and must declare output_schema");
        }
        continue;
      }

      if (hasSource && hasInputs) {
        production("must not declare both source and inputs");
      } else if (!hasSource && !hasInputs) {
        production("must declare either source or inputs");
      }

      if (artifact.transform && !hasInputs) {
        production("declares a transform without inputs");
      }
    }

    // Step 4: A runbook with declared inputs receives its data from the parent
    if (declaredInputs.size > 0) {
      for (const [id, artifact] of Object.entries(runbook.artifacts)) {
        if (artifact.source) {
          const message = `Runbook declares inputs, so artifact '${id}' cannot use a source`;
          issues.push({
            error: { type: "production", message, path: `artifacts.${id}.source` },
            toError: () => new RunbookParseError(message, { artifactId: id }),
          });
        }
      }
    }

    // Step 5: Schema strings
    const checkSchemaString = (value: string | undefined, path: string): void => {
      if (value === undefined || tryParseSchemaString(value)) return;
      issues.push({
        error: { type: "schema-string", message: `${path}: invalid schema string '${value}'`, path },
        toError: () => new InvalidSchemaStringError(value, { path }),
      });
    };
    for (const [id, artifact] of Object.entries(runbook.artifacts)) {
      checkSchemaString(artifact.output_schema, `artifacts.${id}.output_schema`);
    }
    for (const [name, input] of Object.entries(runbook.inputs ?? {})) {
      checkSchemaString(input.input_schema, `inputs.${name}.input_schema`);
    }

    // Step 6: Input references (artifacts, declared inputs, child output aliases)
    const childAliases = new Set(
      Object.values(runbook.artifacts).flatMap((artifact) =>
        Object.values(artifact.child_runbook?.output_mapping ?? {})
      )
    );
    for (const [id, artifact] of Object.entries(runbook.artifacts)) {
      for (const ref of artifact.inputs ?? []) {
        if (!artifactIds.has(ref) && !declaredInputs.has(ref) && !childAliases.has(ref)) {
          issues.push({
            error: {
              type: "reference",
              message: `Artifact '${id}' references unknown artifact: ${ref}`,
              path: `artifacts.${id}.inputs`,
            },
            toError: () => new MissingArtifactError(id, ref),
          });
        }
      }
    }

    // Step 7: Declared outputs
    for (const [name, output] of Object.entries(runbook.outputs ?? {})) {
      if (!artifactIds.has(output.artifact)) {
        const message = `Output '${name}' references unknown artifact: ${output.artifact}`;
        issues.push({
          error: { type: "output", message, path: `outputs.${name}.artifact` },
          toError: () => new InvalidOutputMappingError(output.artifact, name, message),
        });
      }
    }

    return { issues, runbook };
  }
}

/**
 * Replace ${VAR} in every string value. Keys are left untouched.
 */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv, filePath?: string): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REFERENCE_RE, (_match, name: string) => {
      const replacement = env[name];
      if (replacement === undefined) {
        throw new RunbookParseError(
          `Environment variable ${name} is not set${filePath ? ` (referenced in ${filePath})` : ""}`,
          { variable: name, filePath }
        );
      }
      return replacement;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnv(item, env, filePath));
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
      result[key] = substituteEnv(member, env, filePath);
    }
    return result;
  }
  return value;
}

function duplicateKeyAt(text: string, line: number, column: number): string {
  const source = text.split(/\r?\n/)[line] ?? "";
  const match = source.slice(column).match(/^\s*["']?([^"':]+?)["']?\s*:/);
  return match?.[1] ?? `<line ${line + 1}>`;
}
