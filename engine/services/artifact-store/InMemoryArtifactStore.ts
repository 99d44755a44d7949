import type { Message } from "../../../shared/types/schema.js";
import type { ExecutionStateSnapshot, RunMetadataRecord } from "../../../shared/types/execution.js";
import { ArtifactAlreadyExistsError, RunAlreadyActiveError } from "../../utils/errorTypes.js";
import { frozenCopy } from "../../utils/freeze.js";
import { assertValidKey, type SyncArtifactStore } from "./ArtifactStore.js";

interface RunRecords {
  artifacts: Map<string, Message>;
  state: ExecutionStateSnapshot | null;
  metadata: RunMetadataRecord | null;
}

/**
 * Synchronous store backed by nested maps. Stored values are frozen copies, so
 * callers can neither mutate what was written nor what they read back.
 */
export class InMemoryArtifactStore implements SyncArtifactStore {
  readonly mode = "sync";
  private readonly runs = new Map<string, RunRecords>();
  private readonly lockedRuns = new Set<string>();

  put(runId: string, artifactId: string, message: Message): void {
    assertValidKey("run", runId);
    assertValidKey("artifact", artifactId);

    const records = this.ensureRun(runId);
    if (records.artifacts.has(artifactId)) {
      throw new ArtifactAlreadyExistsError(runId, artifactId);
    }
    records.artifacts.set(artifactId, frozenCopy(message));
  }

  get(runId: string, artifactId: string): Message | null {
    return this.runs.get(runId)?.artifacts.get(artifactId) ?? null;
  }

  exists(runId: string, artifactId: string): boolean {
    return this.runs.get(runId)?.artifacts.has(artifactId) ?? false;
  }

  delete(runId: string, artifactId: string): boolean {
    return this.runs.get(runId)?.artifacts.delete(artifactId) ?? false;
  }

  listArtifacts(runId: string): string[] {
    return [...(this.runs.get(runId)?.artifacts.keys() ?? [])];
  }

  listRuns(): string[] {
    return [...this.runs.keys()];
  }

  clear(runId?: string): void {
    if (runId === undefined) {
      this.runs.clear();
    } else {
      this.runs.delete(runId);
    }
  }

  saveExecutionState(snapshot: ExecutionStateSnapshot): void {
    assertValidKey("run", snapshot.runId);
    this.ensureRun(snapshot.runId).state = frozenCopy(snapshot);
  }

  loadExecutionState(runId: string): ExecutionStateSnapshot | null {
    const state = this.runs.get(runId)?.state;
    return state ? structuredClone(state) : null;
  }

  saveRunMetadata(record: RunMetadataRecord): void {
    assertValidKey("run", record.runId);
    this.ensureRun(record.runId).metadata = frozenCopy(record);
  }

  loadRunMetadata(runId: string): RunMetadataRecord | null {
    const metadata = this.runs.get(runId)?.metadata;
    return metadata ? structuredClone(metadata) : null;
  }

  acquireRunLock(runId: string): () => void {
    assertValidKey("run", runId);
    if (this.lockedRuns.has(runId)) {
      throw new RunAlreadyActiveError(runId);
    }
    this.lockedRuns.add(runId);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.lockedRuns.delete(runId);
    };
  }

  private ensureRun(runId: string): RunRecords {
    let records = this.runs.get(runId);
    if (!records) {
      records = { artifacts: new Map(), state: null, metadata: null };
      this.runs.set(runId, records);
    }
    return records;
  }
}
