import type { Message } from "../../../shared/types/schema.js";
import type { ExecutionStateSnapshot, RunMetadataRecord } from "../../../shared/types/execution.js";
import type { ArtifactStore, SyncArtifactStore } from "./ArtifactStore.js";
import { InMemoryArtifactStore } from "./InMemoryArtifactStore.js";

/**
 * Asynchronous view over a synchronous store. Each call completes on a later
 * microtask, as a durable backend would.
 */
export class AsyncInMemoryArtifactStore implements ArtifactStore {
  readonly mode = "async";

  constructor(private readonly inner: SyncArtifactStore = new InMemoryArtifactStore()) {}

  /** The wrapped synchronous store */
  get sync(): SyncArtifactStore {
    return this.inner;
  }

  async put(runId: string, artifactId: string, message: Message): Promise<void> {
    this.inner.put(runId, artifactId, message);
  }

  async get(runId: string, artifactId: string): Promise<Message | null> {
    return this.inner.get(runId, artifactId);
  }

  async exists(runId: string, artifactId: string): Promise<boolean> {
    return this.inner.exists(runId, artifactId);
  }

  async delete(runId: string, artifactId: string): Promise<boolean> {
    return this.inner.delete(runId, artifactId);
  }

  async listArtifacts(runId: string): Promise<string[]> {
    return this.inner.listArtifacts(runId);
  }

  async listRuns(): Promise<string[]> {
    return this.inner.listRuns();
  }

  async clear(runId?: string): Promise<void> {
    this.inner.clear(runId);
  }

  async saveExecutionState(snapshot: ExecutionStateSnapshot): Promise<void> {
    this.inner.saveExecutionState(snapshot);
  }

  async loadExecutionState(runId: string): Promise<ExecutionStateSnapshot | null> {
    return this.inner.loadExecutionState(runId);
  }

  async saveRunMetadata(record: RunMetadataRecord): Promise<void> {
    this.inner.saveRunMetadata(record);
  }

  async loadRunMetadata(runId: string): Promise<RunMetadataRecord | null> {
    return this.inner.loadRunMetadata(runId);
  }

  async acquireRunLock(runId: string): Promise<() => Promise<void>> {
    const release = this.inner.acquireRunLock(runId);
    return async () => release();
  }
}

/**
 * Accept either store flavour where an ArtifactStore is expected.
 */
export function toAsyncStore(store: ArtifactStore | SyncArtifactStore): ArtifactStore {
  return store.mode === "sync" ? new AsyncInMemoryArtifactStore(store) : store;
}
