/**
 * Execution State and Run Types
 *
 * Persisted per-run records (execution state, run metadata) and the result
 * returned to callers when a run finishes or is interrupted.
 */

import { z } from "zod";

export const ArtifactStatusSchema = z.enum([
  "not_started",
  "running",
  "completed",
  "failed",
  "skipped",
]);
export type ArtifactStatus = z.infer<typeof ArtifactStatusSchema>;

/**
 * Overall run status.
 *
 * - `active`: an executor currently owns the run
 * - `completed`: every artifact is completed or skipped and none failed
 * - `interrupted`: at least one artifact returned a pending outcome
 * - `failed`: at least one artifact failed or the run timed out
 */
export const RunStatusSchema = z.enum(["active", "completed", "interrupted", "failed"]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

/**
 * Serialized form of ExecutionState.
 */
export const ExecutionStateSnapshotSchema = z.object({
  runId: z.string().min(1),
  planFingerprint: z.string().min(1),
  artifacts: z.record(z.string(), ArtifactStatusSchema),
  errors: z.record(z.string(), z.string()).default({}),
  lastCheckpoint: z.number(),
});
export type ExecutionStateSnapshot = z.infer<typeof ExecutionStateSnapshotSchema>;

/**
 * Serialized form of RunMetadata.
 */
export const RunMetadataRecordSchema = z.object({
  runId: z.string().min(1),
  planFingerprint: z.string().min(1),
  runbookName: z.string(),
  status: RunStatusSchema,
  startedAt: z.number(),
  updatedAt: z.number(),
  completedAt: z.number().optional(),
});
export type RunMetadataRecord = z.infer<typeof RunMetadataRecordSchema>;

/**
 * Outcome of one artifact in a run.
 */
export interface ArtifactOutcome {
  status: ArtifactStatus;
  error?: string;
  /** Time spent producing the artifact in this invocation */
  durationMs?: number;
  /** Copied from a prior run */
  reused?: boolean;
  /** Reason given by a component that returned a pending outcome */
  pendingReason?: string;
}

/**
 * Result of run() or resume().
 */
export interface RunResult {
  runId: string;
  status: Exclude<RunStatus, "active">;
  startedAt: number;
  durationMs: number;
  outcomes: Record<string, ArtifactOutcome>;
  completed: string[];
  failed: string[];
  skipped: string[];
  /** Artifacts left not_started by a pending outcome (directly or upstream) */
  pending: string[];
  /** External name -> internal artifact id */
  aliases: Record<string, string>;
}
