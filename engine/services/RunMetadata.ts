import type { RunMetadataRecord, RunStatus } from "../../shared/types/execution.js";

/**
 * Lifecycle record of one run. A run is `active` while an executor owns it
 * and ends `completed`, `interrupted` or `failed`; a later resume makes it
 * `active` again. Removal of finished runs is left to the caller.
 */
export class RunMetadata {
  private record: RunMetadataRecord;

  private constructor(record: RunMetadataRecord) {
    this.record = { ...record };
  }

  static create(runId: string, planFingerprint: string, runbookName: string): RunMetadata {
    const now = Date.now();
    return new RunMetadata({
      runId,
      planFingerprint,
      runbookName,
      status: "active",
      startedAt: now,
      updatedAt: now,
    });
  }

  static fromRecord(record: RunMetadataRecord): RunMetadata {
    return new RunMetadata(record);
  }

  get runId(): string {
    return this.record.runId;
  }

  get planFingerprint(): string {
    return this.record.planFingerprint;
  }

  get status(): RunStatus {
    return this.record.status;
  }

  get startedAt(): number {
    return this.record.startedAt;
  }

  get isActive(): boolean {
    return this.record.status === "active";
  }

  markActive(): void {
    this.update("active");
    delete this.record.completedAt;
  }

  markCompleted(): void {
    this.update("completed");
    this.record.completedAt = this.record.updatedAt;
  }

  markFailed(): void {
    this.update("failed");
    this.record.completedAt = this.record.updatedAt;
  }

  markInterrupted(): void {
    this.update("interrupted");
  }

  toRecord(): RunMetadataRecord {
    return { ...this.record };
  }

  private update(status: RunStatus): void {
    this.record.status = status;
    this.record.updatedAt = Date.now();
  }
}
