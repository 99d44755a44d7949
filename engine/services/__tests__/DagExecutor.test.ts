/**
 * Tests for DagExecutor - dispatch, failure isolation, pending outcomes and resume.
 */

import { describe, it, expect, expectTypeOf, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { DagExecutor, type DagExecutorOptions } from "../DagExecutor.js";
import { Planner, type ExecutionPlan } from "../Planner.js";
import { TypedEventBus, type OrchestratorEventName } from "../events.js";
import { RunMetadata } from "../RunMetadata.js";
import { logBuffer } from "../LogBuffer.js";
import { InMemoryArtifactStore } from "../artifact-store/InMemoryArtifactStore.js";
import { AsyncInMemoryArtifactStore } from "../artifact-store/AsyncInMemoryArtifactStore.js";
import { FilesystemArtifactStore } from "../persistence/FilesystemArtifactStore.js";
import {
  RunAlreadyActiveError,
  RunNotFoundError,
  RunbookChangedError,
} from "../../utils/errorTypes.js";
import { completed, pending, type ComponentOutcome } from "../../../shared/types/component.js";
import type { RunbookDocument } from "../../../shared/types/runbook.js";
import {
  FakeConnectorFactory,
  createScanComponents,
  delay,
  message,
  schema,
  type ScanComponents,
} from "./helpers/fakes.js";

function scanRunbook(): RunbookDocument {
  return {
    name: "scan",
    description: "Secrets and licence scan",
    artifacts: {
      source_a: { source: { type: "filesystem", properties: { items: ["a1", "a2"] } } },
      findings_b: { inputs: "source_a", transform: { type: "secrets" } },
      findings_c: { inputs: "source_a", transform: { type: "licences" } },
      summary: { inputs: ["findings_b", "findings_c"], transform: { type: "summary" } },
    },
  };
}

function never(): Promise<ComponentOutcome> {
  return new Promise<ComponentOutcome>(() => undefined);
}

describe("DagExecutor", () => {
  let components: ScanComponents;
  let bus: TypedEventBus;
  let store: InMemoryArtifactStore;
  let executor: DagExecutor;

  const planFor = (runbook: RunbookDocument): Promise<ExecutionPlan> =>
    new Planner(components.registry).plan(runbook);

  beforeEach(() => {
    components = createScanComponents();
    bus = new TypedEventBus();
    store = new InMemoryArtifactStore();
    executor = new DagExecutor({ eventBus: bus });
  });

  describe("run", () => {
    it("produces every artifact and merges fan-in inputs", async () => {
      const plan = await planFor(scanRunbook());
      const analysed: Record<string, unknown[]> = { secrets: [], licences: [] };
      components.secrets.handler = (input, context) => {
        analysed.secrets.push(input.content);
        return completed(message(`${context.artifactId}-msg`, context.outputSchema, input.content));
      };
      components.licences.handler = (input, context) => {
        analysed.licences.push(input.content);
        return completed(message(`${context.artifactId}-msg`, context.outputSchema, input.content));
      };

      const result = await executor.run(plan, components.registry, store, "run-1");

      expect(plan.dag.getRoots()).toEqual(["source_a"]);
      expect(plan.dag.getDependents("source_a")).toEqual(["findings_b", "findings_c"]);
      expect(store.get("run-1", "source_a")?.content).toEqual(["a1", "a2"]);
      expect(analysed).toEqual({ secrets: [["a1", "a2"]], licences: [["a1", "a2"]] });

      expect(result.runId).toBe("run-1");
      expect(result.status).toBe("completed");
      expect(result.completed).toEqual(["source_a", "findings_b", "findings_c", "summary"]);
      expect(result.failed).toEqual([]);
      expect(result.pending).toEqual([]);
      expect(store.get("run-1", "summary")).toMatchObject({
        schema: schema("summary"),
        content: ["a1", "a2", "a1", "a2"],
      });
      expect(store.loadRunMetadata("run-1")?.status).toBe("completed");
      expect(components.fs.invocations).toEqual(["source_a"]);
      expect(components.summary.invocations).toEqual(["summary"]);
    });

    it("hands analysers the merged input and planned schemas", async () => {
      const plan = await planFor(scanRunbook());
      const seen: Array<{ input: unknown; inputIds: readonly string[]; inputSchema: string }> = [];
      components.summary.handler = (input, context) => {
        seen.push({
          input: input.content,
          inputIds: context.inputIds,
          inputSchema: `${context.inputSchema.name}/${context.inputSchema.version}`,
        });
        return completed(message("summary-msg", context.outputSchema, { total: 4 }));
      };

      await executor.run(plan, components.registry, store, "run-1");

      expect(seen).toEqual([
        {
          input: ["a1", "a2", "a1", "a2"],
          inputIds: ["findings_b", "findings_c"],
          inputSchema: "findings/1.0.0",
        },
      ]);
    });

    it("copies input through artifacts without a transform", async () => {
      const plan = await planFor({
        name: "copy",
        description: "Pass-through",
        artifacts: {
          source_a: { source: { type: "filesystem", properties: { items: ["a1"] } } },
          copy: { inputs: "source_a", output_schema: "raw_copy" },
        },
      });

      await executor.run(plan, components.registry, store, "run-1");

      expect(store.get("run-1", "copy")).toMatchObject({
        schema: schema("raw_copy"),
        content: ["a1"],
        metadata: { derivedFrom: ["source_a"] },
      });
    });

    it("emits lifecycle events in order", async () => {
      const plan = await planFor({
        name: "linear",
        description: "Two artifacts",
        artifacts: {
          source_a: { source: { type: "filesystem" } },
          copy: { inputs: "source_a" },
        },
      });
      const seen: string[] = [];
      const names: OrchestratorEventName[] = [
        "run:started",
        "run:completed",
        "artifact:started",
        "artifact:completed",
      ];
      for (const name of names) {
        bus.on(name, (payload) => {
          seen.push("artifactId" in payload ? `${name} ${payload.artifactId}` : name);
        });
      }

      await executor.run(plan, components.registry, store, "run-1");

      expect(seen).toEqual([
        "run:started",
        "artifact:started source_a",
        "artifact:completed source_a",
        "artifact:started copy",
        "artifact:completed copy",
        "run:completed",
      ]);
    });

    it("does not re-produce artifacts already in the store", async () => {
      const plan = await planFor(scanRunbook());
      store.put("run-1", "source_a", message("earlier", schema("standard_input"), ["kept"]));

      const result = await executor.run(plan, components.registry, store, "run-1");

      expect(result.status).toBe("completed");
      expect(components.fs.invocations).toEqual([]);
      expect(store.get("run-1", "findings_b")?.content).toEqual(["kept"]);
    });

    it("accepts an asynchronous store", async () => {
      const plan = await planFor(scanRunbook());
      const asyncStore = new AsyncInMemoryArtifactStore();

      const result = await executor.run(plan, components.registry, asyncStore);

      expect(result.status).toBe("completed");
      await expect(asyncStore.listArtifacts(result.runId)).resolves.toHaveLength(4);
    });
  });

  describe("run lifecycle", () => {
    it("rejects resuming an unknown run", async () => {
      const plan = await planFor(scanRunbook());

      await expect(
        executor.resume(plan, components.registry, store, "missing")
      ).rejects.toBeInstanceOf(RunNotFoundError);
    });

    it("rejects a run whose durable lock is held", async () => {
      const testDir = await fs.mkdtemp(path.join(os.tmpdir(), "dag-executor-test-"));
      try {
        const plan = await planFor(scanRunbook());
        const durable = new FilesystemArtifactStore(testDir);
        const release = await new FilesystemArtifactStore(testDir).acquireRunLock("run-1");

        await expect(
          executor.run(plan, components.registry, durable, "run-1")
        ).rejects.toBeInstanceOf(RunAlreadyActiveError);
        expect(await durable.loadRunMetadata("run-1")).toBeNull();

        await release();
        const result = await executor.run(plan, components.registry, durable, "run-1");
        expect(result.status).toBe("completed");
      } finally {
        await fs.rm(testDir, { recursive: true, force: true });
      }
    });

    it("rejects a run that is already active", async () => {
      const plan = await planFor(scanRunbook());
      store.saveRunMetadata(RunMetadata.create("run-1", plan.fingerprint, "scan").toRecord());

      await expect(executor.run(plan, components.registry, store, "run-1")).rejects.toBeInstanceOf(
        RunAlreadyActiveError
      );
      await expect(
        executor.resume(plan, components.registry, store, "run-1")
      ).rejects.toBeInstanceOf(RunAlreadyActiveError);
      expect(components.fs.invocations).toEqual([]);
    });

    it("lets only one of two concurrent starts of a run proceed", async () => {
      const plan = await planFor(scanRunbook());
      components.fs.handler = async (context) => {
        await delay(30);
        return completed(message(`${context.artifactId}-msg`, context.outputSchema, ["a1", "a2"]));
      };

      const results = await Promise.allSettled([
        executor.run(plan, components.registry, store, "run-1"),
        executor.run(plan, components.registry, store, "run-1"),
      ]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      const loser = results[1];
      expect(loser.status === "rejected" && loser.reason).toBeInstanceOf(RunAlreadyActiveError);
      expect(components.fs.invocations).toEqual(["source_a"]);
      expect(store.loadRunMetadata("run-1")?.status).toBe("completed");
    });

    it("lets only one of two concurrent resumes proceed", async () => {
      const plan = await planFor(scanRunbook());
      components.secrets.handler = () => {
        throw new Error("scanner crashed");
      };
      await executor.run(plan, components.registry, store, "run-1");

      components.secrets.handler = async (input, context) => {
        await delay(30);
        return completed(message("fixed", context.outputSchema, input.content));
      };
      const results = await Promise.allSettled([
        executor.resume(plan, components.registry, store, "run-1"),
        executor.resume(plan, components.registry, store, "run-1"),
      ]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      const loser = results[1];
      expect(loser.status === "rejected" && loser.reason).toBeInstanceOf(RunAlreadyActiveError);
      expect(components.secrets.invocations).toEqual(["findings_b", "findings_b"]);
      expect(components.summary.invocations).toEqual(["summary"]);
    });

    it("releases the run once it settles", async () => {
      const plan = await planFor(scanRunbook());
      await executor.run(plan, components.registry, store, "run-1");
      await executor.resume(plan, components.registry, store, "run-1");

      expect(() => store.acquireRunLock("run-1")).not.toThrow();
    });

    it("rejects resuming with a changed runbook", async () => {
      const plan = await planFor(scanRunbook());
      await executor.run(plan, components.registry, store, "run-1");

      const changed = scanRunbook();
      changed.artifacts.findings_c = { inputs: "source_a", transform: { type: "secrets" } };
      const changedPlan = await planFor(changed);

      await expect(
        executor.resume(changedPlan, components.registry, store, "run-1")
      ).rejects.toBeInstanceOf(RunbookChangedError);
    });

    it("resumes a completed run without invoking any component", async () => {
      const plan = await planFor(scanRunbook());
      await executor.run(plan, components.registry, store, "run-1");

      const resumed = await executor.resume(plan, components.registry, store, "run-1");
      const rerun = await executor.run(plan, components.registry, store, "run-1");

      expect(resumed.status).toBe("completed");
      expect(rerun.status).toBe("completed");
      expect(components.fs.invocations).toEqual(["source_a"]);
      expect(components.secrets.invocations).toEqual(["findings_b"]);
      expect(components.licences.invocations).toEqual(["findings_c"]);
      expect(components.summary.invocations).toEqual(["summary"]);
    });

    it("resumes from a durable store in a new process", async () => {
      const testDir = await fs.mkdtemp(path.join(os.tmpdir(), "dag-executor-test-"));
      try {
        const plan = await planFor(scanRunbook());
        components.secrets.handler = () => {
          throw new Error("scanner crashed");
        };
        const first = await executor.run(
          plan,
          components.registry,
          new FilesystemArtifactStore(testDir),
          "run-1"
        );
        expect(first.status).toBe("failed");

        components.secrets.handler = (input, context) =>
          completed(message("fixed", context.outputSchema, input.content));
        const second = await new DagExecutor({ eventBus: bus }).resume(
          plan,
          components.registry,
          new FilesystemArtifactStore(testDir),
          "run-1"
        );

        expect(second.status).toBe("completed");
        expect(components.fs.invocations).toEqual(["source_a"]);
        expect(components.licences.invocations).toEqual(["findings_c"]);
      } finally {
        await fs.rm(testDir, { recursive: true, force: true });
      }
    });
  });

  describe("failures", () => {
    it("isolates a failed branch and skips its dependents", async () => {
      const plan = await planFor(scanRunbook());
      components.secrets.handler = () => {
        throw new Error("scanner crashed");
      };
      const failures: string[] = [];
      bus.on("artifact:failed", (payload) => failures.push(`${payload.artifactId}: ${payload.error}`));

      const result = await executor.run(plan, components.registry, store, "run-1");

      expect(result.status).toBe("failed");
      expect(result.completed).toEqual(["source_a", "findings_c"]);
      expect(result.failed).toEqual(["findings_b"]);
      expect(result.skipped).toEqual(["summary"]);
      expect(result.outcomes.findings_b?.error).toBe("scanner crashed");
      expect(result.outcomes.summary).toEqual({
        status: "skipped",
        error: 'Upstream artifact "findings_b" failed',
      });
      expect(failures).toEqual(["findings_b: scanner crashed"]);
      expect(store.loadRunMetadata("run-1")?.status).toBe("failed");
      expect(store.exists("run-1", "findings_c")).toBe(true);
    });

    it("retries only failed and skipped artifacts on resume", async () => {
      const plan = await planFor(scanRunbook());
      components.secrets.handler = () => {
        throw new Error("scanner crashed");
      };
      await executor.run(plan, components.registry, store, "run-1");

      components.secrets.handler = (input, context) =>
        completed(message("fixed", context.outputSchema, input.content));
      const result = await executor.resume(plan, components.registry, store, "run-1");

      expect(result.status).toBe("completed");
      expect(components.fs.invocations).toEqual(["source_a"]);
      expect(components.licences.invocations).toEqual(["findings_c"]);
      expect(components.secrets.invocations).toEqual(["findings_b", "findings_b"]);
      expect(components.summary.invocations).toEqual(["summary"]);
    });

    it("fails an artifact whose message carries the wrong schema", async () => {
      components.fs.handler = () => completed(message("bad", schema("wrong"), []));
      const plan = await planFor({
        name: "wrong",
        description: "Mislabelled output",
        artifacts: { raw: { source: { type: "filesystem" } } },
      });

      const result = await executor.run(plan, components.registry, store, "run-1");

      expect(result.outcomes.raw?.error).toBe(
        'Schema mismatch for artifact "raw": standard_input/1.0.0 vs wrong/1.0.0 (produced wrong/1.0.0)'
      );
      expect(store.exists("run-1", "raw")).toBe(false);
    });

    it("fails an artifact whose message is malformed", async () => {
      components.fs.handler = (context) => completed(message("", context.outputSchema, []));
      const plan = await planFor({
        name: "malformed",
        description: "Empty message id",
        artifacts: { raw: { source: { type: "filesystem" } } },
      });

      const result = await executor.run(plan, components.registry, store, "run-1");

      expect(result.outcomes.raw?.error).toBe(
        'Artifact "raw" produced an invalid message: id: String must contain at least 1 character(s)'
      );
    });

    it("logs optional artifact failures as warnings", async () => {
      components.fs.handler = () => {
        throw new Error("optional source unavailable");
      };
      const plan = await planFor({
        name: "optional",
        description: "Optional source",
        artifacts: { extra: { source: { type: "filesystem" }, optional: true } },
      });
      const events: boolean[] = [];
      bus.on("artifact:failed", (payload) => events.push(payload.optional));

      await executor.run(plan, components.registry, store, "run-optional");

      expect(events).toEqual([true]);
      const warnings = logBuffer.getFiltered({ levels: ["warn"], runId: "run-optional" });
      expect(warnings.map((entry) => entry.message)).toEqual(["Optional artifact failed"]);
    });

    it("rejects when the store fails", async () => {
      class FailingStore extends AsyncInMemoryArtifactStore {
        async put(): Promise<void> {
          throw new Error("disk full");
        }
      }
      const failing = new FailingStore();
      const plan = await planFor(scanRunbook());

      await expect(executor.run(plan, components.registry, failing, "run-1")).rejects.toThrow(
        "disk full"
      );
      await expect(failing.loadRunMetadata("run-1")).resolves.toMatchObject({ status: "failed" });
    });
  });

  describe("pending outcomes", () => {
    let batch: FakeConnectorFactory;
    let batchReady: boolean;

    beforeEach(() => {
      batchReady = false;
      batch = new FakeConnectorFactory("batch", schema("standard_input"), (context) =>
        batchReady
          ? completed(message("batch-msg", context.outputSchema, ["batched"]))
          : pending("batch job accepted")
      );
      components.registry.registerConnector(batch);
    });

    const twoChains = (): RunbookDocument => ({
      name: "chains",
      description: "Independent chains",
      artifacts: {
        a: { source: { type: "batch" } },
        a_out: { inputs: "a", transform: { type: "secrets" } },
        b: { source: { type: "filesystem" } },
        b_out: { inputs: "b", transform: { type: "licences" } },
      },
    });

    it("interrupts the run while independent chains complete", async () => {
      const plan = await planFor(twoChains());

      const result = await executor.run(plan, components.registry, store, "run-1");

      expect(result.status).toBe("interrupted");
      expect(result.completed).toEqual(["b", "b_out"]);
      expect(result.pending).toEqual(["a", "a_out"]);
      expect(result.failed).toEqual([]);
      expect(result.skipped).toEqual([]);
      expect(result.outcomes.a?.pendingReason).toBe("batch job accepted");
      expect(components.secrets.invocations).toEqual([]);
      expect(store.loadRunMetadata("run-1")?.status).toBe("interrupted");
    });

    it("finishes pending work on resume", async () => {
      const plan = await planFor(twoChains());
      await executor.run(plan, components.registry, store, "run-1");

      batchReady = true;
      const result = await executor.resume(plan, components.registry, store, "run-1");

      expect(result.status).toBe("completed");
      expect(batch.invocations).toEqual(["a", "a"]);
      expect(components.fs.invocations).toEqual(["b"]);
      expect(components.secrets.invocations).toEqual(["a_out"]);
      expect(store.get("run-1", "a_out")?.content).toEqual(["batched"]);
    });
  });

  describe("reuse", () => {
    const reuseRunbook = (fromRun: string): RunbookDocument => ({
      name: "reuse",
      description: "Builds on a baseline",
      artifacts: {
        previous: {
          reuse: { from_run: fromRun, artifact: "source_a" },
          output_schema: "standard_input",
        },
        findings: { inputs: "previous", transform: { type: "secrets" } },
      },
    });

    it("copies an artifact from a prior run", async () => {
      const baseline = message("baseline-msg", schema("standard_input"), ["old"]);
      store.put("baseline", "source_a", baseline);
      const reused: string[] = [];
      bus.on("artifact:reused", (payload) =>
        reused.push(`${payload.artifactId} <- ${payload.fromRun}/${payload.sourceArtifact}`)
      );
      const plan = await planFor(reuseRunbook("baseline"));

      const result = await executor.run(plan, components.registry, store, "run-2");

      expect(result.status).toBe("completed");
      expect(result.outcomes.previous?.reused).toBe(true);
      expect(store.get("run-2", "previous")).toEqual(baseline);
      expect(store.get("run-2", "findings")?.content).toEqual(["old"]);
      expect(components.fs.invocations).toEqual([]);
      expect(reused).toEqual(["previous <- baseline/source_a"]);
    });

    it("fails when the prior artifact is missing", async () => {
      const plan = await planFor(reuseRunbook("missing-run"));

      const result = await executor.run(plan, components.registry, store, "run-2");

      expect(result.status).toBe("failed");
      expect(result.outcomes.previous?.error).toBe(
        'Artifact "source_a" not found in run "missing-run"'
      );
      expect(result.skipped).toEqual(["findings"]);
    });
  });

  describe("limits", () => {
    let slow: FakeConnectorFactory;
    let signals: AbortSignal[];

    beforeEach(() => {
      signals = [];
      slow = new FakeConnectorFactory("slow", schema("standard_input"), (context) => {
        signals.push(context.signal);
        return never();
      });
      components.registry.registerConnector(slow);
    });

    it("fails an artifact that exceeds the step timeout", async () => {
      const plan = await planFor({
        name: "timeout",
        description: "One slow source",
        artifacts: {
          stuck: { source: { type: "slow" } },
          fast: { source: { type: "filesystem" } },
        },
      });

      const result = await new DagExecutor({ eventBus: bus, stepTimeoutMs: 20 }).run(
        plan,
        components.registry,
        store,
        "run-1"
      );

      expect(result.status).toBe("failed");
      expect(result.completed).toEqual(["fast"]);
      expect(result.outcomes.stuck?.error).toBe('Artifact "stuck" timed out after 20ms');
      expect(signals.map((signal) => signal.aborted)).toEqual([true]);
    });

    it("stops the run when the run timeout expires", async () => {
      const plan = await planFor({
        name: "run-timeout",
        description: "Slow chain",
        artifacts: {
          stuck: { source: { type: "slow" } },
          after: { inputs: "stuck" },
        },
      });

      const result = await new DagExecutor({ eventBus: bus, runTimeoutMs: 30 }).run(
        plan,
        components.registry,
        store,
        "run-1"
      );

      expect(result.status).toBe("failed");
      expect(result.outcomes.stuck?.error).toBe("Run timed out after 30ms");
      expect(result.skipped).toEqual(["after"]);
    });

    it("never runs more artifacts at once than max concurrency", async () => {
      let active = 0;
      let peak = 0;
      components.fs.handler = async (context) => {
        active++;
        peak = Math.max(peak, active);
        await delay(10);
        active--;
        return completed(message(`${context.artifactId}-msg`, context.outputSchema, []));
      };
      const artifacts: RunbookDocument["artifacts"] = {};
      for (const id of ["s1", "s2", "s3", "s4", "s5"]) {
        artifacts[id] = { source: { type: "filesystem" } };
      }
      const plan = await planFor({ name: "wide", description: "Five sources", artifacts });

      const result = await new DagExecutor({ eventBus: bus, maxConcurrency: 2 }).run(
        plan,
        components.registry,
        store,
        "run-1"
      );

      expect(result.completed).toHaveLength(5);
      expect(peak).toBe(2);
    });
  });
});

describe("DagExecutor with runbook config", () => {
  let testStore: InMemoryArtifactStore;

  beforeEach(() => {
    testStore = new InMemoryArtifactStore();
  });

  afterEach(() => {
    testStore.clear();
  });

  it("leaves child depth to the plan rather than executor options", () => {
    expectTypeOf<DagExecutorOptions>().toHaveProperty("maxConcurrency");
    expectTypeOf<DagExecutorOptions>().not.toHaveProperty("maxChildDepth");
  });

  it("takes max_concurrency from the runbook", async () => {
    const components = createScanComponents();
    let active = 0;
    let peak = 0;
    components.fs.handler = async (context) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return completed(message(`${context.artifactId}-msg`, context.outputSchema, []));
    };
    const plan = await new Planner(components.registry).plan({
      name: "serial",
      description: "One at a time",
      config: { max_concurrency: 1 },
      artifacts: {
        a: { source: { type: "filesystem" } },
        b: { source: { type: "filesystem" } },
        c: { source: { type: "filesystem" } },
      },
    });

    await new DagExecutor({ eventBus: new TypedEventBus() }).run(plan, components.registry, testStore);

    expect(peak).toBe(1);
  });
});
