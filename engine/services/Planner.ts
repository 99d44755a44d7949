/**
 * Planner - compile a runbook into an immutable ExecutionPlan
 *
 * Fails closed: every check below runs before any component is invoked.
 *
 *  (a) every connector/analyser type resolves in the registry
 *  (b) child runbooks are flattened into one namespaced artifact set
 *  (c) ids are valid store keys, references resolve and the dependency graph is acyclic
 *  (d) input/output schemas are resolved in topological order
 *  (e) fan-in inputs share one schema; child input contracts hold
 */

import type { Schema } from "../../shared/types/schema.js";
import type {
  ArtifactDefinition,
  LoadedRunbook,
  Runbook,
  RunbookDocument,
} from "../../shared/types/runbook.js";
import { formatSchema, schemasEqual, tryParseSchemaString } from "../../shared/utils/schemaString.js";
import {
  ComponentNotFoundError,
  InvalidArtifactIdError,
  InvalidSchemaStringError,
  MissingArtifactError,
  RunbookParseError,
  SchemaCompatibilityError,
} from "../utils/errorTypes.js";
import { fingerprint } from "../utils/fingerprint.js";
import { deepFreeze } from "../utils/freeze.js";
import { logDebug, logInfo } from "../utils/logger.js";
import { ChildRunbookFlattener, namespacedId, type ChildInputContract } from "./ChildRunbookFlattener.js";
import type { ComponentRegistry } from "./ComponentRegistry.js";
import { isValidKey } from "./artifact-store/ArtifactStore.js";
import { ExecutionDag } from "./ExecutionDag.js";
import { RunbookLoader } from "./RunbookLoader.js";
import { FilesystemRunbookResolver, type RunbookResolver } from "./RunbookResolver.js";

export interface ArtifactSchemas {
  /** Schema of the (merged) input; null for source and standalone reuse artifacts */
  input: Schema | null;
  output: Schema;
}

export interface ExecutionPlan {
  /** Flattened runbook: no child_runbook artifacts remain */
  readonly runbook: Runbook;
  readonly dag: ExecutionDag;
  readonly artifactSchemas: ReadonlyMap<string, ArtifactSchemas>;
  /** External name -> internal artifact id */
  readonly aliases: ReadonlyMap<string, string>;
  /** Internal artifact id -> external names */
  readonly reversedAliases: ReadonlyMap<string, readonly string[]>;
  readonly fingerprint: string;
}

export interface PlannerOptions {
  resolver?: RunbookResolver;
  loader?: RunbookLoader;
  /** Overrides the root runbook's config.max_child_depth */
  maxChildDepth?: number;
}

export interface PlanOptions {
  /** Where the runbook came from; child paths resolve relative to it */
  filePath?: string;
}

export class Planner {
  private readonly resolver: RunbookResolver;
  private readonly loader: RunbookLoader;

  constructor(
    private readonly registry: ComponentRegistry,
    private readonly options: PlannerOptions = {}
  ) {
    this.loader = options.loader ?? new RunbookLoader();
    this.resolver = options.resolver ?? new FilesystemRunbookResolver({ loader: this.loader });
  }

  async plan(runbook: RunbookDocument, options: PlanOptions = {}): Promise<ExecutionPlan> {
    const loaded: LoadedRunbook = {
      runbook: this.loader.parse(runbook),
      filePath: options.filePath,
      loadedAt: Date.now(),
    };
    return this.planLoaded(loaded);
  }

  async planFromFile(filePath: string): Promise<ExecutionPlan> {
    return this.planLoaded(await this.loader.loadFromFile(filePath));
  }

  async planLoaded(loaded: LoadedRunbook): Promise<ExecutionPlan> {
    const root = loaded.runbook;

    // (a) component types of the root; children are checked as they load
    this.checkComponents(root, "");

    // (b) flatten child runbooks
    const flattener = new ChildRunbookFlattener({
      resolver: this.resolver,
      maxChildDepth: this.options.maxChildDepth ?? root.config.max_child_depth,
      onChildLoaded: (child, parentArtifactId) =>
        this.checkComponents(child.runbook, namespacedId(parentArtifactId, "")),
    });
    const { artifacts, aliases, inputContracts } = await flattener.flatten(loaded);

    // (c) identifiers, references, graph, cycles
    for (const [id, definition] of Object.entries(artifacts)) {
      if (!isValidKey(id)) {
        throw new InvalidArtifactIdError(id);
      }
      for (const ref of definition.inputs ?? []) {
        if (!(ref in artifacts)) {
          throw new MissingArtifactError(id, ref);
        }
      }
    }
    const dag = new ExecutionDag(artifacts);
    dag.validate();

    // (d) + (e) schemas
    const artifactSchemas = this.resolveSchemas(artifacts, dag);
    this.checkInputContracts(inputContracts, artifactSchemas);

    const reversedAliases = new Map<string, string[]>();
    for (const [external, internal] of aliases) {
      reversedAliases.set(internal, [...(reversedAliases.get(internal) ?? []), external]);
    }

    const plan: ExecutionPlan = {
      runbook: { ...root, artifacts },
      dag,
      artifactSchemas,
      aliases,
      reversedAliases,
      fingerprint: computePlanFingerprint(artifacts, artifactSchemas, aliases),
    };

    logInfo("Planned runbook", {
      runbook: root.name,
      artifacts: dag.size,
      aliases: aliases.size,
      fingerprint: plan.fingerprint,
    });

    return deepFreeze(plan);
  }

  private checkComponents(runbook: Runbook, prefix: string): void {
    for (const [localId, definition] of Object.entries(runbook.artifacts)) {
      const id = prefix + localId;
      if (definition.source && !this.registry.hasConnector(definition.source.type)) {
        throw new ComponentNotFoundError("connector", definition.source.type, id);
      }
      if (definition.transform && !this.registry.hasAnalyser(definition.transform.type)) {
        throw new ComponentNotFoundError("analyser", definition.transform.type, id);
      }
    }
  }

  private resolveSchemas(
    artifacts: Record<string, ArtifactDefinition>,
    dag: ExecutionDag
  ): Map<string, ArtifactSchemas> {
    const schemas = new Map<string, ArtifactSchemas>();

    for (const id of dag.topologicalOrder()) {
      const definition = artifacts[id];
      if (!definition) continue;

      const override =
        definition.output_schema !== undefined
          ? parseOverride(definition.output_schema, id)
          : undefined;

      if (!definition.inputs) {
        schemas.set(id, { input: null, output: this.resolveSourceSchema(id, definition, override) });
        continue;
      }

      const inputSchema = this.resolveInputSchema(id, definition.inputs, schemas);

      if (!definition.transform) {
        schemas.set(id, { input: inputSchema, output: override ?? inputSchema });
        continue;
      }

      const factory = this.registry.getAnalyserFactory(definition.transform.type);
      const accepted = factory.getInputSchemas();
      if (accepted.length > 0 && !accepted.some((schema) => schemasEqual(schema, inputSchema))) {
        throw new SchemaCompatibilityError(
          id,
          accepted[0] ?? inputSchema,
          inputSchema,
          `analyser "${definition.transform.type}" accepts ${accepted.map(formatSchema).join(", ")}`
        );
      }

      const output = override ?? factory.getOutputSchemas()[0];
      if (!output) {
        throw new ComponentNotFoundError(
          "analyser",
          definition.transform.type,
          id,
          `Analyser "${definition.transform.type}" declares no output schema (artifact "${id}")`
        );
      }
      schemas.set(id, { input: inputSchema, output });
    }

    logDebug("Resolved artifact schemas", { count: schemas.size });
    return schemas;
  }

  private resolveSourceSchema(
    id: string,
    definition: ArtifactDefinition,
    override: Schema | undefined
  ): Schema {
    if (override) return override;

    const source = definition.source;
    if (!source) {
      throw new RunbookParseError(`Artifact '${id}' needs a source or an output_schema`, {
        artifactId: id,
      });
    }

    const output = this.registry.getConnectorFactory(source.type).getOutputSchemas()[0];
    if (!output) {
      throw new ComponentNotFoundError(
        "connector",
        source.type,
        id,
        `Connector "${source.type}" declares no output schema (artifact "${id}")`
      );
    }
    return output;
  }

  /**
   * Every upstream output schema must be identical (name and version).
   */
  private resolveInputSchema(
    id: string,
    inputs: readonly string[],
    schemas: ReadonlyMap<string, ArtifactSchemas>
  ): Schema {
    let first: { id: string; schema: Schema } | undefined;

    for (const inputId of inputs) {
      const upstream = schemas.get(inputId);
      if (!upstream) {
        throw new MissingArtifactError(id, inputId);
      }
      if (!first) {
        first = { id: inputId, schema: upstream.output };
        continue;
      }
      if (!schemasEqual(first.schema, upstream.output)) {
        throw new SchemaCompatibilityError(
          id,
          first.schema,
          upstream.output,
          `fan-in inputs "${first.id}" and "${inputId}" differ`
        );
      }
    }

    if (!first) {
      throw new MissingArtifactError(id, "<none>");
    }
    return first.schema;
  }

  private checkInputContracts(
    contracts: readonly ChildInputContract[],
    schemas: ReadonlyMap<string, ArtifactSchemas>
  ): void {
    for (const contract of contracts) {
      const actual = schemas.get(contract.sourceId);
      if (!actual) {
        throw new MissingArtifactError(contract.childArtifactId, contract.sourceId);
      }
      if (!schemasEqual(contract.expectedSchema, actual.output)) {
        throw new SchemaCompatibilityError(
          contract.childArtifactId,
          contract.expectedSchema,
          actual.output,
          `child input "${contract.inputName}" is fed by "${contract.sourceId}"`
        );
      }
    }
  }
}

function parseOverride(value: string, artifactId: string): Schema {
  const schema = tryParseSchemaString(value);
  if (!schema) {
    throw new InvalidSchemaStringError(value, { artifactId });
  }
  return schema;
}

/**
 * Fingerprint over the structural parts of a plan. Names, descriptions and
 * contacts do not contribute.
 */
export function computePlanFingerprint(
  artifacts: Readonly<Record<string, ArtifactDefinition>>,
  schemas: ReadonlyMap<string, ArtifactSchemas>,
  aliases: ReadonlyMap<string, string>
): string {
  const structure: Record<string, unknown> = {};
  for (const [id, definition] of Object.entries(artifacts)) {
    const resolved = schemas.get(id);
    structure[id] = {
      source: definition.source,
      inputs: definition.inputs,
      transform: definition.transform,
      merge: definition.merge,
      reuse: definition.reuse,
      optional: definition.optional,
      input: resolved?.input ? formatSchema(resolved.input) : null,
      output: resolved ? formatSchema(resolved.output) : null,
    };
  }

  return fingerprint({
    artifacts: structure,
    aliases: Object.fromEntries(aliases),
  });
}
