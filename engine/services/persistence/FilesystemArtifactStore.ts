import { z } from "zod";
import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { MessageSchema, type Message } from "../../../shared/types/schema.js";
import {
  ExecutionStateSnapshotSchema,
  RunMetadataRecordSchema,
  type ExecutionStateSnapshot,
  type RunMetadataRecord,
} from "../../../shared/types/execution.js";
import { ArtifactAlreadyExistsError, RunAlreadyActiveError, isNotFoundError } from "../../utils/errorTypes.js";
import { logDebug, logError, logWarn } from "../../utils/logger.js";
import { assertValidKey, type ArtifactStore } from "../artifact-store/ArtifactStore.js";

const RUNS_DIR = "runs";
const ARTIFACTS_DIR = "artifacts";
const SYSTEM_DIR = "_system";
const STATE_FILENAME = "state.json";
const RUN_FILENAME = "run.json";
const LOCK_FILENAME = "run.lock";
const ARTIFACT_EXTENSION = ".json";

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Durable artifact store on the local filesystem.
 *
 *   <baseDir>/runs/<runId>/artifacts/<artifactId>.json
 *   <baseDir>/runs/<runId>/_system/state.json
 *   <baseDir>/runs/<runId>/_system/run.json
 *   <baseDir>/runs/<runId>/_system/run.lock
 *
 * Artifacts are published with a hard link from a temp file, so a second put
 * for the same key fails even across processes. System records are replaced
 * atomically (temp file + rename); writes to the same file are serialised.
 * The run lock is an exclusively created file, removed on release or by clear().
 */
export class FilesystemArtifactStore implements ArtifactStore {
  readonly mode = "async";
  private readonly baseDir: string;
  private readonly runsDir: string;
  private inFlightWrites: Map<string, Promise<void>> = new Map();

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
    this.runsDir = path.join(this.baseDir, RUNS_DIR);
  }

  get directory(): string {
    return this.baseDir;
  }

  private runDir(runId: string): string {
    assertValidKey("run", runId);
    return path.join(this.runsDir, runId);
  }

  private artifactPath(runId: string, artifactId: string): string {
    assertValidKey("artifact", artifactId);
    return path.join(this.runDir(runId), ARTIFACTS_DIR, `${artifactId}${ARTIFACT_EXTENSION}`);
  }

  private systemPath(runId: string, filename: string): string {
    return path.join(this.runDir(runId), SYSTEM_DIR, filename);
  }

  async put(runId: string, artifactId: string, message: Message): Promise<void> {
    const filePath = this.artifactPath(runId, artifactId);
    await this.serialized(filePath, async () => {
      const tempFilePath = await this.writeTemp(filePath, message);
      try {
        await fs.link(tempFilePath, filePath);
      } catch (error) {
        if (hasErrorCode(error, "EEXIST")) {
          throw new ArtifactAlreadyExistsError(runId, artifactId);
        }
        throw error;
      } finally {
        await this.removeTemp(tempFilePath);
      }
    });
    logDebug("Stored artifact", { runId, artifactId });
  }

  async get(runId: string, artifactId: string): Promise<Message | null> {
    return this.readRecord(this.artifactPath(runId, artifactId), MessageSchema);
  }

  async exists(runId: string, artifactId: string): Promise<boolean> {
    try {
      await fs.access(this.artifactPath(runId, artifactId));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  async delete(runId: string, artifactId: string): Promise<boolean> {
    try {
      await fs.unlink(this.artifactPath(runId, artifactId));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  async listArtifacts(runId: string): Promise<string[]> {
    const entries = await this.readDir(path.join(this.runDir(runId), ARTIFACTS_DIR));
    return entries
      .filter((name) => name.endsWith(ARTIFACT_EXTENSION) && !name.endsWith(".tmp"))
      .map((name) => name.slice(0, -ARTIFACT_EXTENSION.length))
      .sort();
  }

  async listRuns(): Promise<string[]> {
    return (await this.readDir(this.runsDir)).sort();
  }

  async clear(runId?: string): Promise<void> {
    const target = runId === undefined ? this.runsDir : this.runDir(runId);
    await fs.rm(target, { recursive: true, force: true });
  }

  async saveExecutionState(snapshot: ExecutionStateSnapshot): Promise<void> {
    await this.writeAtomic(this.systemPath(snapshot.runId, STATE_FILENAME), snapshot);
  }

  async loadExecutionState(runId: string): Promise<ExecutionStateSnapshot | null> {
    return this.readRecord(this.systemPath(runId, STATE_FILENAME), ExecutionStateSnapshotSchema);
  }

  async saveRunMetadata(record: RunMetadataRecord): Promise<void> {
    await this.writeAtomic(this.systemPath(record.runId, RUN_FILENAME), record);
  }

  async loadRunMetadata(runId: string): Promise<RunMetadataRecord | null> {
    return this.readRecord(this.systemPath(runId, RUN_FILENAME), RunMetadataRecordSchema);
  }

  async acquireRunLock(runId: string): Promise<() => Promise<void>> {
    const lockPath = this.systemPath(runId, LOCK_FILENAME);
    await fs.mkdir(path.dirname(lockPath), { recursive: true });

    try {
      await fs.writeFile(lockPath, JSON.stringify({ pid: process.pid, acquiredAt: Date.now() }), {
        encoding: "utf-8",
        flag: "wx",
      });
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        throw new RunAlreadyActiveError(runId, { lockPath });
      }
      throw error;
    }
    logDebug("Acquired run lock", { runId });

    let released = false;
    return async () => {
      if (released) return;
      released = true;
      await fs.rm(lockPath, { force: true });
      logDebug("Released run lock", { runId });
    };
  }

  /**
   * Read and validate a JSON record. Missing files yield null; unreadable or
   * invalid files are quarantined and also yield null.
   */
  private async readRecord<T extends z.ZodTypeAny>(
    filePath: string,
    schema: T
  ): Promise<z.output<T> | null> {
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return schema.parse(parsed);
    } catch (error) {
      logError("Failed to parse stored record", error, { filePath });
      await this.quarantine(filePath);
      return null;
    }
  }

  private async quarantine(filePath: string): Promise<void> {
    const quarantinePath = `${filePath}.corrupted.${Date.now()}`;
    try {
      await fs.rename(filePath, quarantinePath);
      logWarn("Corrupted record moved aside", { filePath, quarantinePath });
    } catch (error) {
      logError("Failed to quarantine corrupted file", error, { filePath });
    }
  }

  private async writeAtomic(filePath: string, value: unknown): Promise<void> {
    await this.serialized(filePath, async () => {
      const tempFilePath = await this.writeTemp(filePath, value);
      try {
        await fs.rename(tempFilePath, filePath);
      } catch (error) {
        await this.removeTemp(tempFilePath);
        throw error;
      }
    });
  }

  private async writeTemp(filePath: string, value: unknown): Promise<string> {
    const uniqueSuffix = `${Date.now()}-${crypto.randomBytes(4).toString("hex")}`;
    const tempFilePath = `${filePath}.${uniqueSuffix}.tmp`;
    const content = JSON.stringify(value, null, 2);

    try {
      await fs.writeFile(tempFilePath, content, "utf-8");
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempFilePath, content, "utf-8");
    }
    return tempFilePath;
  }

  private async removeTemp(tempFilePath: string): Promise<void> {
    try {
      await fs.unlink(tempFilePath);
    } catch (error) {
      if (!isNotFoundError(error)) {
        logWarn("Failed to remove temp file", { tempFilePath, error: String(error) });
      }
    }
  }

  /**
   * Run `task` after any in-flight write to the same file settles.
   */
  private async serialized(filePath: string, task: () => Promise<void>): Promise<void> {
    const previous = this.inFlightWrites.get(filePath) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(task);
    this.inFlightWrites.set(filePath, next);

    try {
      await next;
    } finally {
      if (this.inFlightWrites.get(filePath) === next) {
        this.inFlightWrites.delete(filePath);
      }
    }
  }

  private async readDir(dir: string): Promise<string[]> {
    try {
      return await fs.readdir(dir);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }
  }
}
