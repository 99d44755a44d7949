/**
 * Component Contract Types
 *
 * Connectors produce artifacts from external systems; analysers transform the
 * merged content of upstream artifacts. Both are created per dispatch by a
 * ComponentFactory registered under a type name.
 */

import type { Message, Schema } from "./schema.js";

/**
 * Properties from a runbook `source` or `transform` block.
 */
export type ComponentConfig = Record<string, unknown>;

/**
 * Outcome of a single component invocation.
 *
 * `pending` is a normal suspension (e.g. an asynchronous batch API has accepted
 * the work but has not finished it). Failures are signalled by throwing.
 */
export type ComponentOutcome =
  | { type: "completed"; message: Message }
  | { type: "pending"; reason: string };

export function completed(message: Message): ComponentOutcome {
  return { type: "completed", message };
}

export function pending(reason: string): ComponentOutcome {
  return { type: "pending", reason };
}

/**
 * Context passed to every component invocation.
 */
export interface InvocationContext {
  /** Run the artifact belongs to */
  runId: string;
  /** Artifact being produced (namespaced for flattened child artifacts) */
  artifactId: string;
  /** Schema the produced message must carry */
  outputSchema: Schema;
  /** Aborted when the per-step timeout expires */
  signal: AbortSignal;
}

export interface AnalyserContext extends InvocationContext {
  /** Schema shared by every (merged) input */
  inputSchema: Schema;
  /** Upstream artifact ids, in declaration order */
  inputIds: readonly string[];
}

export interface Connector {
  extract(context: InvocationContext): Promise<ComponentOutcome>;
}

export interface Analyser {
  process(input: Message, context: AnalyserContext): Promise<ComponentOutcome>;
}

/**
 * Factory contract implemented by connector and analyser packages.
 */
export interface ComponentFactory<T> {
  /** Create a component instance for one dispatch */
  create(config: ComponentConfig): T;
  /** Whether `create` would succeed for this configuration */
  canCreate(config: ComponentConfig): boolean;
  /** Type name the factory registers under by default */
  getComponentName(): string;
  /** Schemas the component accepts; empty means any */
  getInputSchemas(): readonly Schema[];
  /** Schemas the component can produce; the first is the default */
  getOutputSchemas(): readonly Schema[];
  /** Named infrastructure services the component needs (name -> service type) */
  getServiceDependencies(): Record<string, string>;
}

export type ConnectorFactory = ComponentFactory<Connector>;
export type AnalyserFactory = ComponentFactory<Analyser>;

export type ComponentKind = "connector" | "analyser";

/**
 * Summary of a registered component (for listing).
 */
export interface ComponentSummary {
  kind: ComponentKind;
  typeName: string;
  componentName: string;
  inputSchemas: Schema[];
  outputSchemas: Schema[];
}
