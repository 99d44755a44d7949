/**
 * ExecutionState - per-run artifact statuses with guarded transitions
 *
 *   not_started -> running | skipped
 *   running     -> completed | failed | not_started (pending outcome)
 *
 * failed, skipped and running artifacts only return to not_started through
 * prepareForResume(). completed is final.
 */

import type { ArtifactStatus, ExecutionStateSnapshot } from "../../shared/types/execution.js";
import { InvalidStateTransitionError } from "../utils/errorTypes.js";

const ALLOWED_TRANSITIONS: Record<ArtifactStatus, readonly ArtifactStatus[]> = {
  not_started: ["running", "skipped"],
  running: ["completed", "failed", "not_started"],
  completed: [],
  failed: [],
  skipped: [],
};

export class ExecutionState {
  private readonly statuses: Map<string, ArtifactStatus>;
  private readonly errors: Map<string, string>;
  private checkpoint: number;

  private constructor(
    readonly runId: string,
    readonly planFingerprint: string,
    statuses: Map<string, ArtifactStatus>,
    errors: Map<string, string>,
    checkpoint: number
  ) {
    this.statuses = statuses;
    this.errors = errors;
    this.checkpoint = checkpoint;
  }

  static create(
    runId: string,
    planFingerprint: string,
    artifactIds: Iterable<string>
  ): ExecutionState {
    const statuses = new Map<string, ArtifactStatus>();
    for (const id of artifactIds) {
      statuses.set(id, "not_started");
    }
    return new ExecutionState(runId, planFingerprint, statuses, new Map(), Date.now());
  }

  /**
   * Restore from a snapshot. Artifacts missing from the snapshot start as
   * not_started; artifacts no longer in the plan are dropped.
   */
  static fromSnapshot(
    snapshot: ExecutionStateSnapshot,
    artifactIds: Iterable<string>
  ): ExecutionState {
    const statuses = new Map<string, ArtifactStatus>();
    const errors = new Map<string, string>();
    for (const id of artifactIds) {
      statuses.set(id, snapshot.artifacts[id] ?? "not_started");
      const error = snapshot.errors[id];
      if (error !== undefined) errors.set(id, error);
    }
    return new ExecutionState(
      snapshot.runId,
      snapshot.planFingerprint,
      statuses,
      errors,
      snapshot.lastCheckpoint
    );
  }

  get lastCheckpoint(): number {
    return this.checkpoint;
  }

  get artifactIds(): string[] {
    return [...this.statuses.keys()];
  }

  getStatus(artifactId: string): ArtifactStatus {
    const status = this.statuses.get(artifactId);
    if (status === undefined) {
      throw new InvalidStateTransitionError(artifactId, "unknown", "read");
    }
    return status;
  }

  getError(artifactId: string): string | undefined {
    return this.errors.get(artifactId);
  }

  idsWithStatus(status: ArtifactStatus): string[] {
    return [...this.statuses].filter(([, current]) => current === status).map(([id]) => id);
  }

  hasStatus(status: ArtifactStatus): boolean {
    for (const current of this.statuses.values()) {
      if (current === status) return true;
    }
    return false;
  }

  markRunning(artifactId: string): void {
    this.transition(artifactId, "running");
    this.errors.delete(artifactId);
  }

  markCompleted(artifactId: string): void {
    this.transition(artifactId, "completed");
  }

  markFailed(artifactId: string, error: string): void {
    this.transition(artifactId, "failed");
    this.errors.set(artifactId, error);
  }

  markSkipped(artifactId: string, reason: string): void {
    this.transition(artifactId, "skipped");
    this.errors.set(artifactId, reason);
  }

  /** Pending outcome: the artifact goes back to not_started. */
  markPending(artifactId: string): void {
    this.transition(artifactId, "not_started");
  }

  /**
   * Reset failed, skipped and running artifacts to not_started. Returns the
   * ids that were reset.
   */
  prepareForResume(): string[] {
    const reset: string[] = [];
    for (const [id, status] of this.statuses) {
      if (status === "failed" || status === "skipped" || status === "running") {
        this.statuses.set(id, "not_started");
        this.errors.delete(id);
        reset.push(id);
      }
    }
    if (reset.length > 0) {
      this.checkpoint = Date.now();
    }
    return reset;
  }

  toSnapshot(): ExecutionStateSnapshot {
    return {
      runId: this.runId,
      planFingerprint: this.planFingerprint,
      artifacts: Object.fromEntries(this.statuses),
      errors: Object.fromEntries(this.errors),
      lastCheckpoint: this.checkpoint,
    };
  }

  private transition(artifactId: string, to: ArtifactStatus): void {
    const from = this.getStatus(artifactId);
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new InvalidStateTransitionError(artifactId, from, to);
    }
    this.statuses.set(artifactId, to);
    this.checkpoint = Date.now();
  }
}
