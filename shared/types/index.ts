/**
 * Shared types for the runbook orchestrator
 *
 * Organization:
 * - schema.ts: Schema identifiers and the Message payload
 * - component.ts: Connector/analyser contracts and their factories
 * - runbook.ts: Runbook document schema and validation results
 * - execution.ts: Persisted run records and run results
 */

export { SchemaRefSchema, MessageSchema, DEFAULT_SCHEMA_VERSION } from "./schema.js";
export type { Schema, Message } from "./schema.js";

export { completed, pending } from "./component.js";
export type {
  ComponentConfig,
  ComponentOutcome,
  InvocationContext,
  AnalyserContext,
  Connector,
  Analyser,
  ComponentFactory,
  ConnectorFactory,
  AnalyserFactory,
  ComponentKind,
  ComponentSummary,
} from "./component.js";

export {
  ComponentRefSchema,
  ReuseConfigSchema,
  ChildRunbookConfigSchema,
  MergeStrategySchema,
  ArtifactDefinitionSchema,
  RunbookConfigSchema,
  RunbookInputDeclarationSchema,
  RunbookOutputDeclarationSchema,
  RunbookSchema,
} from "./runbook.js";
export type {
  ComponentRef,
  ReuseConfig,
  ChildRunbookConfig,
  MergeStrategy,
  ArtifactDefinition,
  ArtifactDefinitionDocument,
  RunbookConfig,
  RunbookInputDeclaration,
  RunbookOutputDeclaration,
  Runbook,
  RunbookDocument,
  RunbookValidationResult,
  RunbookValidationErrorType,
  RunbookValidationError,
  LoadedRunbook,
} from "./runbook.js";

export {
  ArtifactStatusSchema,
  RunStatusSchema,
  ExecutionStateSnapshotSchema,
  RunMetadataRecordSchema,
} from "./execution.js";
export type {
  ArtifactStatus,
  RunStatus,
  ExecutionStateSnapshot,
  RunMetadataRecord,
  ArtifactOutcome,
  RunResult,
} from "./execution.js";
