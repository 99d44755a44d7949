/**
 * Artifact store contracts
 *
 * Artifacts are keyed by (runId, artifactId) and immutable once written. The
 * same store also keeps each run's system records (execution state and run
 * metadata) so a run can be resumed from the store alone.
 */

import type { Message } from "../../../shared/types/schema.js";
import type { ExecutionStateSnapshot, RunMetadataRecord } from "../../../shared/types/execution.js";
import { InvalidStoreKeyError } from "../../utils/errorTypes.js";

export interface SyncArtifactStore {
  readonly mode: "sync";
  /** Throws ArtifactAlreadyExistsError when the key is taken */
  put(runId: string, artifactId: string, message: Message): void;
  get(runId: string, artifactId: string): Message | null;
  exists(runId: string, artifactId: string): boolean;
  /** Returns whether an artifact was removed */
  delete(runId: string, artifactId: string): boolean;
  listArtifacts(runId: string): string[];
  listRuns(): string[];
  /** Remove one run, or every run when runId is omitted */
  clear(runId?: string): void;

  saveExecutionState(snapshot: ExecutionStateSnapshot): void;
  loadExecutionState(runId: string): ExecutionStateSnapshot | null;
  saveRunMetadata(record: RunMetadataRecord): void;
  loadRunMetadata(runId: string): RunMetadataRecord | null;

  /**
   * Claim exclusive use of a run. Throws RunAlreadyActiveError while another
   * holder has it; the returned function releases the claim.
   */
  acquireRunLock(runId: string): () => void;
}

export interface ArtifactStore {
  readonly mode: "async";
  /** Throws ArtifactAlreadyExistsError when the key is taken */
  put(runId: string, artifactId: string, message: Message): Promise<void>;
  get(runId: string, artifactId: string): Promise<Message | null>;
  exists(runId: string, artifactId: string): Promise<boolean>;
  /** Resolves to whether an artifact was removed */
  delete(runId: string, artifactId: string): Promise<boolean>;
  listArtifacts(runId: string): Promise<string[]>;
  listRuns(): Promise<string[]>;
  /** Remove one run, or every run when runId is omitted */
  clear(runId?: string): Promise<void>;

  saveExecutionState(snapshot: ExecutionStateSnapshot): Promise<void>;
  loadExecutionState(runId: string): Promise<ExecutionStateSnapshot | null>;
  saveRunMetadata(record: RunMetadataRecord): Promise<void>;
  loadRunMetadata(runId: string): Promise<RunMetadataRecord | null>;

  /**
   * Claim exclusive use of a run. Rejects with RunAlreadyActiveError while
   * another holder has it; the resolved function releases the claim.
   */
  acquireRunLock(runId: string): Promise<() => Promise<void>>;
}

const UNSAFE_KEY_RE = /[\\/\0]/;

/**
 * Run and artifact ids become path segments in durable stores.
 */
export function isValidKey(key: string): boolean {
  return key !== "" && key !== "." && key !== ".." && !UNSAFE_KEY_RE.test(key);
}

export function assertValidKey(kind: "run" | "artifact", key: string): void {
  if (!isValidKey(key)) {
    throw new InvalidStoreKeyError(kind, key);
  }
}
