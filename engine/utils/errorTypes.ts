import type { Schema } from "../../shared/types/schema.js";
import { formatSchema } from "../../shared/utils/schemaString.js";

export type OrchestrationErrorKind =
  | "runbook-parse"
  | "duplicate-artifact"
  | "invalid-schema-string"
  | "invalid-artifact-id"
  | "component-not-found"
  | "missing-artifact"
  | "cycle-detected"
  | "circular-runbook"
  | "child-depth-exceeded"
  | "schema-compatibility"
  | "missing-input-mapping"
  | "invalid-output-mapping"
  | "run-already-active"
  | "runbook-changed"
  | "run-not-found"
  | "artifact-not-found"
  | "artifact-already-exists"
  | "invalid-store-key"
  | "step-timeout"
  | "invalid-state-transition"
  | "config";

export abstract class OrchestrationError extends Error {
  abstract readonly kind: OrchestrationErrorKind;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

// Runbook model

export class RunbookParseError extends OrchestrationError {
  readonly kind = "runbook-parse";

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

export class DuplicateArtifactError extends OrchestrationError {
  readonly kind = "duplicate-artifact";

  constructor(public readonly artifactId: string, context?: Record<string, unknown>) {
    super(`Duplicate artifact identifier: ${artifactId}`, { artifactId, ...context });
  }
}

export class InvalidSchemaStringError extends OrchestrationError {
  readonly kind = "invalid-schema-string";

  constructor(public readonly value: string, context?: Record<string, unknown>) {
    super(
      `Invalid schema string "${value}": expected "name" or "name/version" with a semantic version`,
      { value, ...context }
    );
  }
}

export class InvalidArtifactIdError extends OrchestrationError {
  readonly kind = "invalid-artifact-id";

  constructor(public readonly artifactId: string, context?: Record<string, unknown>) {
    super(
      `Invalid artifact identifier "${artifactId}": must not be "." or ".." or contain "/", "\\" or NUL`,
      { artifactId, ...context }
    );
  }
}

// Planning

export class ComponentNotFoundError extends OrchestrationError {
  readonly kind = "component-not-found";

  constructor(
    public readonly componentKind: "connector" | "analyser",
    public readonly typeName: string,
    public readonly artifactId?: string,
    reason?: string
  ) {
    super(
      reason ??
        `Unknown ${componentKind} type "${typeName}"${artifactId ? ` (artifact "${artifactId}")` : ""}`,
      { componentKind, typeName, artifactId }
    );
  }
}

export class MissingArtifactError extends OrchestrationError {
  readonly kind = "missing-artifact";

  constructor(
    public readonly artifactId: string,
    public readonly missingId: string
  ) {
    super(`Artifact "${artifactId}" references undeclared artifact "${missingId}"`, {
      artifactId,
      missingId,
    });
  }
}

export class CycleDetectedError extends OrchestrationError {
  readonly kind = "cycle-detected";

  constructor(public readonly cycle: readonly string[]) {
    super(`Dependency cycle detected: ${cycle.join(" -> ")}`, { cycle: [...cycle] });
  }
}

export class CircularRunbookError extends OrchestrationError {
  readonly kind = "circular-runbook";

  constructor(public readonly chain: readonly string[]) {
    super(`Runbook includes itself: ${chain.join(" -> ")}`, { chain: [...chain] });
  }
}

export class ChildDepthExceededError extends OrchestrationError {
  readonly kind = "child-depth-exceeded";

  constructor(
    public readonly maxDepth: number,
    public readonly chain: readonly string[]
  ) {
    super(`Child runbook nesting exceeds max_child_depth ${maxDepth}: ${chain.join(" -> ")}`, {
      maxDepth,
      chain: [...chain],
    });
  }
}

export class SchemaCompatibilityError extends OrchestrationError {
  readonly kind = "schema-compatibility";

  constructor(
    public readonly artifactId: string,
    public readonly expected: Schema,
    public readonly actual: Schema,
    detail?: string
  ) {
    super(
      `Schema mismatch for artifact "${artifactId}": ${formatSchema(expected)} vs ${formatSchema(actual)}${
        detail ? ` (${detail})` : ""
      }`,
      { artifactId, expected: formatSchema(expected), actual: formatSchema(actual) }
    );
  }
}

export class MissingInputMappingError extends OrchestrationError {
  readonly kind = "missing-input-mapping";

  constructor(
    public readonly artifactId: string,
    public readonly inputName: string,
    message?: string
  ) {
    super(
      message ?? `Child runbook for "${artifactId}" requires input "${inputName}" but it is not mapped`,
      { artifactId, inputName }
    );
  }
}

export class InvalidOutputMappingError extends OrchestrationError {
  readonly kind = "invalid-output-mapping";

  constructor(
    public readonly artifactId: string,
    public readonly outputName: string,
    message?: string
  ) {
    super(
      message ?? `Child runbook for "${artifactId}" does not declare output "${outputName}"`,
      { artifactId, outputName }
    );
  }
}

// Run lifecycle

export class RunAlreadyActiveError extends OrchestrationError {
  readonly kind = "run-already-active";

  constructor(public readonly runId: string, context?: Record<string, unknown>) {
    super(`Run "${runId}" is already active`, { runId, ...context });
  }
}

export class RunbookChangedError extends OrchestrationError {
  readonly kind = "runbook-changed";

  constructor(
    public readonly runId: string,
    public readonly storedFingerprint: string,
    public readonly currentFingerprint: string
  ) {
    super(`Runbook changed since run "${runId}" started; start a new run instead`, {
      runId,
      storedFingerprint,
      currentFingerprint,
    });
  }
}

export class RunNotFoundError extends OrchestrationError {
  readonly kind = "run-not-found";

  constructor(public readonly runId: string) {
    super(`Run "${runId}" not found`, { runId });
  }
}

// Store and execution

export class ArtifactNotFoundError extends OrchestrationError {
  readonly kind = "artifact-not-found";

  constructor(
    public readonly runId: string,
    public readonly artifactId: string
  ) {
    super(`Artifact "${artifactId}" not found in run "${runId}"`, { runId, artifactId });
  }
}

export class ArtifactAlreadyExistsError extends OrchestrationError {
  readonly kind = "artifact-already-exists";

  constructor(
    public readonly runId: string,
    public readonly artifactId: string
  ) {
    super(`Artifact "${artifactId}" already exists in run "${runId}"`, { runId, artifactId });
  }
}

export class InvalidStoreKeyError extends OrchestrationError {
  readonly kind = "invalid-store-key";

  constructor(
    public readonly keyKind: "run" | "artifact",
    public readonly key: string
  ) {
    super(`Invalid ${keyKind} id: "${key}"`, { keyKind, key });
  }
}

export class StepTimeoutError extends OrchestrationError {
  readonly kind = "step-timeout";

  constructor(
    public readonly artifactId: string,
    public readonly timeoutMs: number
  ) {
    super(`Artifact "${artifactId}" timed out after ${timeoutMs}ms`, { artifactId, timeoutMs });
  }
}

export class InvalidStateTransitionError extends OrchestrationError {
  readonly kind = "invalid-state-transition";

  constructor(
    public readonly artifactId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid status transition for "${artifactId}": ${from} -> ${to}`, {
      artifactId,
      from,
      to,
    });
  }
}

export class ConfigError extends OrchestrationError {
  readonly kind = "config";

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

export type PlanningError =
  | RunbookParseError
  | DuplicateArtifactError
  | InvalidSchemaStringError
  | InvalidArtifactIdError
  | ComponentNotFoundError
  | MissingArtifactError
  | CycleDetectedError
  | CircularRunbookError
  | ChildDepthExceededError
  | SchemaCompatibilityError
  | MissingInputMappingError
  | InvalidOutputMappingError;

export type RunLifecycleError = RunAlreadyActiveError | RunbookChangedError | RunNotFoundError;

const PLANNING_KINDS: ReadonlySet<OrchestrationErrorKind> = new Set<OrchestrationErrorKind>([
  "runbook-parse",
  "duplicate-artifact",
  "invalid-schema-string",
  "invalid-artifact-id",
  "component-not-found",
  "missing-artifact",
  "cycle-detected",
  "circular-runbook",
  "child-depth-exceeded",
  "schema-compatibility",
  "missing-input-mapping",
  "invalid-output-mapping",
]);

const RUN_LIFECYCLE_KINDS: ReadonlySet<OrchestrationErrorKind> = new Set<OrchestrationErrorKind>([
  "run-already-active",
  "runbook-changed",
  "run-not-found",
]);

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}

export function isPlanningError(error: unknown): error is PlanningError {
  return isOrchestrationError(error) && PLANNING_KINDS.has(error.kind);
}

export function isRunLifecycleError(error: unknown): error is RunLifecycleError {
  return isOrchestrationError(error) && RUN_LIFECYCLE_KINDS.has(error.kind);
}

function errnoField(error: unknown, field: "code" | "errno" | "syscall" | "path"): unknown {
  if (!error || typeof error !== "object" || !(field in error)) return undefined;
  return Reflect.get(error, field);
}

export function isNotFoundError(error: unknown): boolean {
  return errnoField(error, "code") === "ENOENT";
}

export function getUserMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Handles circular references safely to prevent infinite recursion
 */
export function getErrorDetails(
  error: unknown,
  seen = new WeakSet<Error>()
): Record<string, unknown> {
  const details: Record<string, unknown> = {
    message: getUserMessage(error),
  };

  if (error instanceof Error) {
    details.name = error.name;
    details.stack = error.stack;
  }

  if (isOrchestrationError(error)) {
    details.kind = error.kind;
    details.context = error.context;
    if (error.cause && !seen.has(error.cause)) {
      seen.add(error.cause);
      details.cause = getErrorDetails(error.cause, seen);
    }
  }

  for (const field of ["code", "errno", "syscall", "path"] as const) {
    const value = errnoField(error, field);
    if (value !== undefined) details[field] = value;
  }

  return details;
}

/**
 * Normalise a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
