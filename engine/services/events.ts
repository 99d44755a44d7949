import { EventEmitter } from "events";
import type { RunStatus } from "../../shared/types/execution.js";

export type EventCategory = "run" | "artifact";

/**
 * Metadata for each event type.
 */
export interface EventMetadata {
  category: EventCategory;
  description: string;
}

interface RunEventBase {
  runId: string;
  runbookName: string;
  timestamp: number;
}

interface ArtifactEventBase {
  runId: string;
  artifactId: string;
  timestamp: number;
}

export interface RunFinishedPayload extends RunEventBase {
  status: Exclude<RunStatus, "active">;
  durationMs: number;
  completed: number;
  failed: number;
  skipped: number;
  pending: number;
}

export type OrchestratorEventMap = {
  "run:started": RunEventBase & { artifactCount: number };
  "run:resumed": RunEventBase & { remaining: number };
  "run:completed": RunFinishedPayload;
  "run:failed": RunFinishedPayload;
  "run:interrupted": RunFinishedPayload;

  "artifact:started": ArtifactEventBase;
  "artifact:completed": ArtifactEventBase & { durationMs: number };
  "artifact:failed": ArtifactEventBase & { error: string; optional: boolean };
  "artifact:skipped": ArtifactEventBase & { reason: string };
  "artifact:pending": ArtifactEventBase & { reason: string };
  "artifact:reused": ArtifactEventBase & { fromRun: string; sourceArtifact: string };
};

export type OrchestratorEventName = keyof OrchestratorEventMap;

/**
 * Metadata mapping for all event types.
 */
export const EVENT_META: Record<OrchestratorEventName, EventMetadata> = {
  "run:started": {
    category: "run",
    description: "A new run began executing",
  },
  "run:resumed": {
    category: "run",
    description: "An existing run resumed from persisted state",
  },
  "run:completed": {
    category: "run",
    description: "Every artifact completed or was skipped without failures",
  },
  "run:failed": {
    category: "run",
    description: "At least one artifact failed or the run timed out",
  },
  "run:interrupted": {
    category: "run",
    description: "At least one artifact is pending an asynchronous operation",
  },
  "artifact:started": {
    category: "artifact",
    description: "Artifact dispatched to its connector or analyser",
  },
  "artifact:completed": {
    category: "artifact",
    description: "Artifact produced and persisted",
  },
  "artifact:failed": {
    category: "artifact",
    description: "Artifact production failed",
  },
  "artifact:skipped": {
    category: "artifact",
    description: "Artifact not executed because an upstream artifact failed",
  },
  "artifact:pending": {
    category: "artifact",
    description: "Component returned a pending outcome; artifact left not_started",
  },
  "artifact:reused": {
    category: "artifact",
    description: "Artifact copied from a prior run",
  },
};

export function getEventCategory(event: OrchestratorEventName): EventCategory {
  return EVENT_META[event].category;
}

export type EventListener<K extends OrchestratorEventName> = (
  payload: OrchestratorEventMap[K]
) => void;

export class TypedEventBus {
  private bus = new EventEmitter();

  private debugEnabled = process.env.ORCHESTRATOR_DEBUG_EVENTS === "1";

  constructor() {
    this.bus.setMaxListeners(100);
  }

  on<K extends OrchestratorEventName>(event: K, listener: EventListener<K>): () => void {
    this.bus.on(event, listener);
    return () => {
      this.bus.off(event, listener);
    };
  }

  off<K extends OrchestratorEventName>(event: K, listener: EventListener<K>): void {
    this.bus.off(event, listener);
  }

  emit<K extends OrchestratorEventName>(event: K, payload: OrchestratorEventMap[K]): void {
    if (this.debugEnabled) {
      console.log("[events]", event, payload);
    }
    this.bus.emit(event, payload);
  }

  removeAllListeners(): void {
    this.bus.removeAllListeners();
  }
}

export const events = new TypedEventBus();
