/**
 * Runbook orchestrator: plan a runbook into an immutable execution DAG and
 * run it against registered connectors and analysers, persisting every
 * artifact so interrupted or failed runs can be resumed.
 */

import type { ExecutionPlan, PlannerOptions } from "./services/Planner.js";
import { Planner } from "./services/Planner.js";
import type { ComponentRegistry } from "./services/ComponentRegistry.js";
import type { RunbookDocument } from "../shared/types/runbook.js";

export * from "../shared/types/index.js";
export { tryParseSchemaString, formatSchema, schemasEqual } from "../shared/utils/schemaString.js";

export * from "./utils/errorTypes.js";
export {
  initializeLogger,
  logDebug,
  logInfo,
  logWarn,
  logError,
  setVerboseLogging,
  isVerboseLogging,
} from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { logBuffer, LogBuffer } from "./services/LogBuffer.js";
export type { LogEntry, FilterOptions } from "./services/LogBuffer.js";
export { events, TypedEventBus, EVENT_META, getEventCategory } from "./services/events.js";
export type {
  OrchestratorEventMap,
  OrchestratorEventName,
  RunFinishedPayload,
  EventCategory,
  EventMetadata,
  EventListener,
} from "./services/events.js";

export {
  DEFAULT_EXECUTION_CONFIG,
  loadEngineConfig,
  resolveExecutionConfig,
} from "./types/config.js";
export type { ExecutionConfig, EngineConfig } from "./types/config.js";

export { RunbookLoader, substituteEnv } from "./services/RunbookLoader.js";
export type { ParseTextOptions } from "./services/RunbookLoader.js";
export { FilesystemRunbookResolver, InMemoryRunbookResolver } from "./services/RunbookResolver.js";
export type {
  RunbookResolver,
  FilesystemRunbookResolverOptions,
} from "./services/RunbookResolver.js";
export { ComponentRegistry } from "./services/ComponentRegistry.js";
export { ExecutionDag } from "./services/ExecutionDag.js";
export type { DagNodeSource } from "./services/ExecutionDag.js";
export {
  ChildRunbookFlattener,
  NAMESPACE_SEPARATOR,
  namespacedId,
} from "./services/ChildRunbookFlattener.js";
export type {
  ChildInputContract,
  FlattenResult,
  FlattenOptions,
} from "./services/ChildRunbookFlattener.js";
export { Planner, computePlanFingerprint } from "./services/Planner.js";
export type { ExecutionPlan, ArtifactSchemas, PlannerOptions, PlanOptions } from "./services/Planner.js";

export { assertValidKey, isValidKey } from "./services/artifact-store/ArtifactStore.js";
export type { ArtifactStore, SyncArtifactStore } from "./services/artifact-store/ArtifactStore.js";
export { InMemoryArtifactStore } from "./services/artifact-store/InMemoryArtifactStore.js";
export {
  AsyncInMemoryArtifactStore,
  toAsyncStore,
} from "./services/artifact-store/AsyncInMemoryArtifactStore.js";
export { FilesystemArtifactStore } from "./services/persistence/FilesystemArtifactStore.js";

export { ExecutionState } from "./services/ExecutionState.js";
export { RunMetadata } from "./services/RunMetadata.js";
export { mergeMessages } from "./services/messageMerge.js";
export { DagExecutor, run, resume } from "./services/DagExecutor.js";
export type { DagExecutorOptions } from "./services/DagExecutor.js";

/**
 * Plan a runbook document with a fresh Planner.
 */
export function plan(
  runbook: RunbookDocument,
  registry: ComponentRegistry,
  options: PlannerOptions & { filePath?: string } = {}
): Promise<ExecutionPlan> {
  const { filePath, ...plannerOptions } = options;
  return new Planner(registry, plannerOptions).plan(runbook, { filePath });
}
