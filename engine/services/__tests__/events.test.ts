import { describe, expect, it } from "vitest";
import {
  EVENT_META,
  TypedEventBus,
  getEventCategory,
  type OrchestratorEventMap,
  type OrchestratorEventName,
} from "../events.js";

describe("TypedEventBus", () => {
  it("delivers payloads until the listener unsubscribes", () => {
    const bus = new TypedEventBus();
    const seen: Array<OrchestratorEventMap["artifact:pending"]> = [];

    const unsubscribe = bus.on("artifact:pending", (payload) => seen.push(payload));
    bus.emit("artifact:pending", {
      runId: "run-1",
      artifactId: "batch",
      reason: "batch job accepted",
      timestamp: 1,
    });
    unsubscribe();
    bus.emit("artifact:pending", {
      runId: "run-1",
      artifactId: "batch",
      reason: "ignored",
      timestamp: 2,
    });

    expect(seen).toEqual([
      { runId: "run-1", artifactId: "batch", reason: "batch job accepted", timestamp: 1 },
    ]);
  });

  it("keeps listeners of different events apart", () => {
    const bus = new TypedEventBus();
    const started: string[] = [];
    const completed: string[] = [];
    bus.on("artifact:started", (payload) => started.push(payload.artifactId));
    bus.on("artifact:completed", (payload) => completed.push(payload.artifactId));

    bus.emit("artifact:started", { runId: "run-1", artifactId: "a", timestamp: 1 });

    expect(started).toEqual(["a"]);
    expect(completed).toEqual([]);

    bus.removeAllListeners();
    bus.emit("artifact:started", { runId: "run-1", artifactId: "b", timestamp: 2 });
    expect(started).toEqual(["a"]);
  });
});

describe("EVENT_META", () => {
  it("categorises every event by its prefix", () => {
    const names = Object.keys(EVENT_META).filter((name): name is OrchestratorEventName =>
      name in EVENT_META
    );

    for (const name of names) {
      expect(getEventCategory(name)).toBe(name.split(":")[0]);
    }
    expect(getEventCategory("run:interrupted")).toBe("run");
    expect(getEventCategory("artifact:reused")).toBe("artifact");
  });
});
