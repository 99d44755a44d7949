/**
 * DagExecutor - run an ExecutionPlan against a registry and an artifact store
 *
 * Ready artifacts (not started, every dependency completed) are dispatched
 * onto a bounded queue. Each finished dispatch triggers a new scan of the
 * ready set, so independent branches never wait on each other.
 *
 * Per-artifact outcomes:
 *  - completed: message persisted, artifact completed
 *  - pending:   artifact back to not_started, run ends interrupted
 *  - failure:   artifact failed, dependents skipped, run ends failed
 *
 * Only run-lifecycle errors and store failures reject run()/resume().
 */

import crypto from "crypto";
import PQueue from "p-queue";
import type { ComponentOutcome } from "../../shared/types/component.js";
import type { ArtifactOutcome, RunResult, RunStatus } from "../../shared/types/execution.js";
import type { ArtifactDefinition } from "../../shared/types/runbook.js";
import { MessageSchema, type Message } from "../../shared/types/schema.js";
import { formatSchema, schemasEqual } from "../../shared/utils/schemaString.js";
import { resolveExecutionConfig, type ExecutionConfig } from "../types/config.js";
import { abortAfter, linkAbort, raceWithAbort } from "../utils/abort.js";
import {
  ArtifactNotFoundError,
  RunAlreadyActiveError,
  RunNotFoundError,
  RunbookChangedError,
  SchemaCompatibilityError,
  StepTimeoutError,
  getUserMessage,
} from "../utils/errorTypes.js";
import { logDebug, logError, logInfo, logWarn } from "../utils/logger.js";
import type { ArtifactStore, SyncArtifactStore } from "./artifact-store/ArtifactStore.js";
import { toAsyncStore } from "./artifact-store/AsyncInMemoryArtifactStore.js";
import type { ComponentRegistry } from "./ComponentRegistry.js";
import { events as defaultEventBus, type TypedEventBus } from "./events.js";
import { ExecutionState } from "./ExecutionState.js";
import { mergeMessages } from "./messageMerge.js";
import type { ExecutionPlan } from "./Planner.js";
import { RunMetadata } from "./RunMetadata.js";

/** Child depth is fixed when the plan is built, so the executor does not take it. */
export interface DagExecutorOptions extends Partial<Omit<ExecutionConfig, "maxChildDepth">> {
  eventBus?: TypedEventBus;
}

type ProducedOutcome =
  | { type: "completed"; message: Message; reused: boolean }
  | { type: "pending"; reason: string };

interface RunContext {
  plan: ExecutionPlan;
  registry: ComponentRegistry;
  store: ArtifactStore;
  state: ExecutionState;
  metadata: RunMetadata;
  config: ExecutionConfig;
  startedAt: number;
  /** Aborted when the whole run times out or the store fails */
  runAbort: AbortController;
  haltReason: string | null;
  storeError: unknown;
  /** Pending outcomes in this invocation; not redispatched until resume */
  pendingReasons: Map<string, string>;
  durations: Map<string, number>;
  reused: Set<string>;
}

export class DagExecutor {
  private readonly bus: TypedEventBus;

  constructor(private readonly options: DagExecutorOptions = {}) {
    this.bus = options.eventBus ?? defaultEventBus;
  }

  /**
   * Start a run. An explicit runId that already exists (and is not active) is
   * resumed instead.
   */
  async run(
    plan: ExecutionPlan,
    registry: ComponentRegistry,
    store: ArtifactStore | SyncArtifactStore,
    runId: string = crypto.randomUUID()
  ): Promise<RunResult> {
    const asyncStore = toAsyncStore(store);
    return this.withRunLock(asyncStore, runId, async () => {
      const existing = await asyncStore.loadRunMetadata(runId);
      if (existing) {
        return this.resumeExisting(plan, registry, asyncStore, RunMetadata.fromRecord(existing));
      }

      const metadata = RunMetadata.create(runId, plan.fingerprint, plan.runbook.name);
      const state = ExecutionState.create(runId, plan.fingerprint, plan.dag.nodes);
      await asyncStore.saveRunMetadata(metadata.toRecord());
      await asyncStore.saveExecutionState(state.toSnapshot());

      logInfo("Run started", { runId, runbook: plan.runbook.name, artifacts: plan.dag.size });
      this.bus.emit("run:started", {
        runId,
        runbookName: plan.runbook.name,
        artifactCount: plan.dag.size,
        timestamp: Date.now(),
      });

      return this.execute(this.createContext(plan, registry, asyncStore, state, metadata));
    });
  }

  /**
   * Continue a previous run. Completed artifacts are neither recomputed nor
   * rewritten; failed and skipped artifacts are retried.
   */
  async resume(
    plan: ExecutionPlan,
    registry: ComponentRegistry,
    store: ArtifactStore | SyncArtifactStore,
    runId: string
  ): Promise<RunResult> {
    const asyncStore = toAsyncStore(store);
    return this.withRunLock(asyncStore, runId, async () => {
      const existing = await asyncStore.loadRunMetadata(runId);
      if (!existing) {
        throw new RunNotFoundError(runId);
      }
      return this.resumeExisting(plan, registry, asyncStore, RunMetadata.fromRecord(existing));
    });
  }

  /**
   * Only one start or resume of a run may proceed; the claim is held until the
   * run settles.
   */
  private async withRunLock(
    store: ArtifactStore,
    runId: string,
    body: () => Promise<RunResult>
  ): Promise<RunResult> {
    const release = await store.acquireRunLock(runId);
    try {
      return await body();
    } finally {
      try {
        await release();
      } catch (error) {
        logError("Failed to release run lock", error, { runId });
      }
    }
  }

  private async resumeExisting(
    plan: ExecutionPlan,
    registry: ComponentRegistry,
    store: ArtifactStore,
    metadata: RunMetadata
  ): Promise<RunResult> {
    const runId = metadata.runId;
    if (metadata.isActive) {
      throw new RunAlreadyActiveError(runId);
    }
    if (metadata.planFingerprint !== plan.fingerprint) {
      throw new RunbookChangedError(runId, metadata.planFingerprint, plan.fingerprint);
    }

    const snapshot = await store.loadExecutionState(runId);
    if (snapshot && snapshot.planFingerprint !== plan.fingerprint) {
      throw new RunbookChangedError(runId, snapshot.planFingerprint, plan.fingerprint);
    }

    const state = snapshot
      ? ExecutionState.fromSnapshot(snapshot, plan.dag.nodes)
      : ExecutionState.create(runId, plan.fingerprint, plan.dag.nodes);
    const reset = state.prepareForResume();

    metadata.markActive();
    await store.saveRunMetadata(metadata.toRecord());
    await store.saveExecutionState(state.toSnapshot());

    const remaining = state.idsWithStatus("not_started").length;
    logInfo("Run resumed", { runId, reset: reset.length, remaining });
    this.bus.emit("run:resumed", {
      runId,
      runbookName: plan.runbook.name,
      remaining,
      timestamp: Date.now(),
    });

    return this.execute(this.createContext(plan, registry, store, state, metadata));
  }

  private createContext(
    plan: ExecutionPlan,
    registry: ComponentRegistry,
    store: ArtifactStore,
    state: ExecutionState,
    metadata: RunMetadata
  ): RunContext {
    const { maxConcurrency, stepTimeoutMs, runTimeoutMs } = this.options;
    return {
      plan,
      registry,
      store,
      state,
      metadata,
      config: resolveExecutionConfig(plan.runbook.config, {
        maxConcurrency,
        stepTimeoutMs,
        runTimeoutMs,
      }),
      startedAt: Date.now(),
      runAbort: new AbortController(),
      haltReason: null,
      storeError: undefined,
      pendingReasons: new Map(),
      durations: new Map(),
      reused: new Set(),
    };
  }

  private async execute(ctx: RunContext): Promise<RunResult> {
    const { plan, state } = ctx;
    const queue = new PQueue({ concurrency: ctx.config.maxConcurrency });
    const inFlight = new Map<string, Promise<void>>();

    const halt = (reason: string): void => {
      if (ctx.haltReason !== null) return;
      ctx.haltReason = reason;
      ctx.runAbort.abort(new Error(reason));
    };
    const runTimer = setTimeout(
      () => halt(`Run timed out after ${ctx.config.runTimeoutMs}ms`),
      ctx.config.runTimeoutMs
    );

    try {
      for (;;) {
        if (ctx.haltReason === null) {
          const ready = plan.dag
            .getReadySet((id) => state.getStatus(id))
            .filter((id) => !inFlight.has(id) && !ctx.pendingReasons.has(id));

          for (const artifactId of ready) {
            const task = queue
              .add(() => this.dispatch(ctx, artifactId))
              .catch((error: unknown) => {
                ctx.storeError ??= error;
                halt(`Artifact store failure: ${getUserMessage(error)}`);
              })
              .finally(() => {
                inFlight.delete(artifactId);
              });
            inFlight.set(artifactId, task);
          }
        }

        if (inFlight.size === 0) break;
        // Halting aborts running steps, so in-flight work settles promptly.
        await Promise.race(inFlight.values());
      }
    } finally {
      clearTimeout(runTimer);
    }

    if (ctx.storeError !== undefined) {
      ctx.metadata.markFailed();
      await this.saveMetadataAfterStoreFailure(ctx);
      throw ctx.storeError;
    }

    return this.finish(ctx);
  }

  private async dispatch(ctx: RunContext, artifactId: string): Promise<void> {
    const { state, store, plan } = ctx;
    if (ctx.haltReason !== null) return;

    const runId = state.runId;
    if (await store.exists(runId, artifactId)) {
      // Persisted by an earlier attempt that stopped before recording it.
      state.markRunning(artifactId);
      state.markCompleted(artifactId);
      await store.saveExecutionState(state.toSnapshot());
      logInfo("Artifact already persisted; marking completed", { runId, artifactId });
      return;
    }

    state.markRunning(artifactId);
    await store.saveExecutionState(state.toSnapshot());
    this.bus.emit("artifact:started", { runId, artifactId, timestamp: Date.now() });

    const started = Date.now();
    const stepAbort = new AbortController();
    const unlink = linkAbort(ctx.runAbort.signal, stepAbort);
    const stepTimeoutMs = ctx.config.stepTimeoutMs;
    const cancelStepTimer =
      stepTimeoutMs !== undefined
        ? abortAfter(stepAbort, stepTimeoutMs, () => new StepTimeoutError(artifactId, stepTimeoutMs))
        : () => undefined;

    let outcome: ProducedOutcome;
    try {
      outcome = await raceWithAbort(this.produce(ctx, artifactId, stepAbort.signal), stepAbort.signal);
      if (outcome.type === "completed") {
        this.checkProducedMessage(ctx, artifactId, outcome.message);
      }
    } catch (error) {
      ctx.durations.set(artifactId, Date.now() - started);
      await this.recordFailure(ctx, artifactId, error);
      return;
    } finally {
      cancelStepTimer();
      unlink();
    }

    const durationMs = Date.now() - started;
    ctx.durations.set(artifactId, durationMs);

    if (outcome.type === "pending") {
      state.markPending(artifactId);
      ctx.pendingReasons.set(artifactId, outcome.reason);
      await store.saveExecutionState(state.toSnapshot());
      logInfo("Artifact pending", { runId, artifactId, reason: outcome.reason });
      this.bus.emit("artifact:pending", {
        runId,
        artifactId,
        reason: outcome.reason,
        timestamp: Date.now(),
      });
      return;
    }

    await store.put(runId, artifactId, outcome.message);
    state.markCompleted(artifactId);
    await store.saveExecutionState(state.toSnapshot());

    if (outcome.reused) {
      ctx.reused.add(artifactId);
      const reuse = plan.runbook.artifacts[artifactId]?.reuse;
      this.bus.emit("artifact:reused", {
        runId,
        artifactId,
        fromRun: reuse?.from_run ?? "",
        sourceArtifact: reuse?.artifact ?? "",
        timestamp: Date.now(),
      });
    }
    logDebug("Artifact completed", { runId, artifactId, durationMs });
    this.bus.emit("artifact:completed", { runId, artifactId, durationMs, timestamp: Date.now() });
  }

  /**
   * Invoke the component (or copy/merge) that produces one artifact.
   */
  private async produce(
    ctx: RunContext,
    artifactId: string,
    signal: AbortSignal
  ): Promise<ProducedOutcome> {
    const definition = this.getDefinition(ctx, artifactId);
    const schemas = ctx.plan.artifactSchemas.get(artifactId);
    if (!schemas) {
      throw new ArtifactNotFoundError(ctx.state.runId, artifactId);
    }
    const invocation = {
      runId: ctx.state.runId,
      artifactId,
      outputSchema: schemas.output,
      signal,
    };

    if (definition.reuse) {
      const { from_run: fromRun, artifact } = definition.reuse;
      const copy = await ctx.store.get(fromRun, artifact);
      if (!copy) {
        throw new ArtifactNotFoundError(fromRun, artifact);
      }
      return { type: "completed", message: copy, reused: true };
    }

    if (definition.source) {
      const factory = ctx.registry.getConnectorFactory(definition.source.type);
      const connector = factory.create(definition.source.properties);
      return fromComponentOutcome(await connector.extract(invocation));
    }

    const inputIds = definition.inputs ?? [];
    const inputs = await Promise.all(
      inputIds.map(async (inputId) => {
        const message = await ctx.store.get(ctx.state.runId, inputId);
        if (!message) {
          throw new ArtifactNotFoundError(ctx.state.runId, inputId);
        }
        return message;
      })
    );

    const inputSchema = schemas.input ?? schemas.output;
    const merged = mergeMessages(inputs, inputSchema, definition.merge);

    if (!definition.transform) {
      return {
        type: "completed",
        message: {
          id: crypto.randomUUID(),
          schema: schemas.output,
          content: merged.content,
          producedAt: new Date().toISOString(),
          metadata: { derivedFrom: [...inputIds] },
        },
        reused: false,
      };
    }

    const factory = ctx.registry.getAnalyserFactory(definition.transform.type);
    const analyser = factory.create(definition.transform.properties);
    return fromComponentOutcome(
      await analyser.process(merged, { ...invocation, inputSchema, inputIds: [...inputIds] })
    );
  }

  private checkProducedMessage(ctx: RunContext, artifactId: string, message: Message): void {
    const parsed = MessageSchema.safeParse(message);
    if (!parsed.success) {
      throw new Error(
        `Artifact "${artifactId}" produced an invalid message: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`
      );
    }

    const expected = ctx.plan.artifactSchemas.get(artifactId)?.output;
    if (expected && !schemasEqual(expected, message.schema)) {
      throw new SchemaCompatibilityError(
        artifactId,
        expected,
        message.schema,
        `produced ${formatSchema(message.schema)}`
      );
    }
  }

  private async recordFailure(ctx: RunContext, artifactId: string, error: unknown): Promise<void> {
    const { state, plan } = ctx;
    const runId = state.runId;
    const message = getUserMessage(error);
    const optional = this.getDefinition(ctx, artifactId).optional;

    state.markFailed(artifactId, message);
    if (optional) {
      logWarn("Optional artifact failed", { runId, artifactId, error: message });
    } else {
      logError("Artifact failed", error, { runId, artifactId });
    }
    this.bus.emit("artifact:failed", {
      runId,
      artifactId,
      error: message,
      optional,
      timestamp: Date.now(),
    });

    const skipped: string[] = [];
    for (const dependent of plan.dag.getTransitiveDependents(artifactId)) {
      if (state.getStatus(dependent) !== "not_started") continue;
      const reason = `Upstream artifact "${artifactId}" failed`;
      state.markSkipped(dependent, reason);
      skipped.push(dependent);
      this.bus.emit("artifact:skipped", {
        runId,
        artifactId: dependent,
        reason,
        timestamp: Date.now(),
      });
    }
    if (skipped.length > 0) {
      logDebug("Skipped dependents of failed artifact", { runId, artifactId, skipped });
    }

    await ctx.store.saveExecutionState(state.toSnapshot());
  }

  private async finish(ctx: RunContext): Promise<RunResult> {
    const { state, metadata, plan, store } = ctx;
    const runId = state.runId;

    if (ctx.haltReason !== null) {
      const reason = ctx.haltReason;
      const waitingOnPending = new Set<string>();
      for (const id of ctx.pendingReasons.keys()) {
        waitingOnPending.add(id);
        for (const dependent of plan.dag.getTransitiveDependents(id)) {
          waitingOnPending.add(dependent);
        }
      }
      for (const id of state.idsWithStatus("not_started")) {
        if (waitingOnPending.has(id)) continue;
        state.markSkipped(id, reason);
        this.bus.emit("artifact:skipped", { runId, artifactId: id, reason, timestamp: Date.now() });
      }
      await store.saveExecutionState(state.toSnapshot());
    }

    let status: Exclude<RunStatus, "active">;
    if (ctx.pendingReasons.size > 0) {
      status = "interrupted";
      metadata.markInterrupted();
    } else if (state.hasStatus("failed") || ctx.haltReason !== null) {
      status = "failed";
      metadata.markFailed();
    } else {
      status = "completed";
      metadata.markCompleted();
    }
    await store.saveRunMetadata(metadata.toRecord());

    const outcomes: Record<string, ArtifactOutcome> = {};
    for (const id of plan.dag.nodes) {
      const outcome: ArtifactOutcome = { status: state.getStatus(id) };
      const error = state.getError(id);
      if (error !== undefined) outcome.error = error;
      const durationMs = ctx.durations.get(id);
      if (durationMs !== undefined) outcome.durationMs = durationMs;
      if (ctx.reused.has(id)) outcome.reused = true;
      const pendingReason = ctx.pendingReasons.get(id);
      if (pendingReason !== undefined) outcome.pendingReason = pendingReason;
      outcomes[id] = outcome;
    }

    const result: RunResult = {
      runId,
      status,
      startedAt: ctx.startedAt,
      durationMs: Date.now() - ctx.startedAt,
      outcomes,
      completed: state.idsWithStatus("completed"),
      failed: state.idsWithStatus("failed"),
      skipped: state.idsWithStatus("skipped"),
      pending: state.idsWithStatus("not_started"),
      aliases: Object.fromEntries(plan.aliases),
    };

    const payload = {
      runId,
      runbookName: plan.runbook.name,
      status,
      durationMs: result.durationMs,
      completed: result.completed.length,
      failed: result.failed.length,
      skipped: result.skipped.length,
      pending: result.pending.length,
      timestamp: Date.now(),
    };
    logInfo(`Run ${status}`, { ...payload, haltReason: ctx.haltReason ?? undefined });
    if (status === "completed") {
      this.bus.emit("run:completed", payload);
    } else if (status === "failed") {
      this.bus.emit("run:failed", payload);
    } else {
      this.bus.emit("run:interrupted", payload);
    }

    return result;
  }

  private async saveMetadataAfterStoreFailure(ctx: RunContext): Promise<void> {
    try {
      await ctx.store.saveRunMetadata(ctx.metadata.toRecord());
    } catch (error) {
      logError("Failed to record run failure after store error", error, {
        runId: ctx.state.runId,
      });
    }
  }

  private getDefinition(ctx: RunContext, artifactId: string): ArtifactDefinition {
    const definition = ctx.plan.runbook.artifacts[artifactId];
    if (!definition) {
      throw new ArtifactNotFoundError(ctx.state.runId, artifactId);
    }
    return definition;
  }
}

function fromComponentOutcome(outcome: ComponentOutcome): ProducedOutcome {
  if (outcome.type === "pending") {
    return { type: "pending", reason: outcome.reason };
  }
  return { type: "completed", message: outcome.message, reused: false };
}

/**
 * Run a plan with default executor options.
 */
export function run(
  plan: ExecutionPlan,
  registry: ComponentRegistry,
  store: ArtifactStore | SyncArtifactStore,
  runId?: string
): Promise<RunResult> {
  return new DagExecutor().run(plan, registry, store, runId);
}

/**
 * Resume a run with default executor options.
 */
export function resume(
  plan: ExecutionPlan,
  registry: ComponentRegistry,
  store: ArtifactStore | SyncArtifactStore,
  runId: string
): Promise<RunResult> {
  return new DagExecutor().resume(plan, registry, store, runId);
}
