/**
 * ChildRunbookFlattener - inline nested runbooks into one artifact set
 *
 * Every artifact of a child runbook included by parent artifact `P` is renamed
 * `P__<id>` (nesting compounds: `a__b__c`). References to the child's declared
 * inputs are rewired to the parent artifacts named in `input_mapping`, and the
 * parent artifact's name becomes an alias of the child output it exposes.
 *
 * Flattening runs in two passes: the first expands every child runbook and
 * records aliases, the second rewrites all references through the alias table.
 */

import type { Schema } from "../../shared/types/schema.js";
import type { ArtifactDefinition, LoadedRunbook, Runbook } from "../../shared/types/runbook.js";
import { tryParseSchemaString } from "../../shared/utils/schemaString.js";
import {
  ChildDepthExceededError,
  CircularRunbookError,
  DuplicateArtifactError,
  InvalidOutputMappingError,
  InvalidSchemaStringError,
  MissingInputMappingError,
} from "../utils/errorTypes.js";
import { logDebug } from "../utils/logger.js";
import type { RunbookResolver } from "./RunbookResolver.js";

export const NAMESPACE_SEPARATOR = "__";

/**
 * A parent artifact bound to a child runbook's declared input.
 */
export interface ChildInputContract {
  /** Parent artifact carrying the child_runbook directive */
  childArtifactId: string;
  inputName: string;
  /** Internal id of the parent artifact feeding the input */
  sourceId: string;
  expectedSchema: Schema;
}

export interface FlattenResult {
  artifacts: Record<string, ArtifactDefinition>;
  /** External name -> internal artifact id (chains already followed) */
  aliases: Map<string, string>;
  inputContracts: ChildInputContract[];
}

export interface FlattenOptions {
  resolver: RunbookResolver;
  maxChildDepth: number;
  /** Called for every child runbook before it is expanded */
  onChildLoaded?: (child: LoadedRunbook, parentArtifactId: string) => void;
}

/** Child input name -> global id, or null when an optional input is unmapped */
type InputBindings = ReadonlyMap<string, string | null>;

interface ExpandFrame {
  loaded: LoadedRunbook;
  prefix: string;
  bindings: InputBindings;
  ancestry: string[];
  depth: number;
}

export function namespacedId(parentArtifactId: string, childArtifactId: string): string {
  return `${parentArtifactId}${NAMESPACE_SEPARATOR}${childArtifactId}`;
}

function runbookKey(loaded: LoadedRunbook): string {
  return loaded.filePath ?? `<${loaded.runbook.name}>`;
}

function parseContractSchema(value: string, path: string): Schema {
  const schema = tryParseSchemaString(value);
  if (!schema) {
    throw new InvalidSchemaStringError(value, { path });
  }
  return schema;
}

export class ChildRunbookFlattener {
  private artifacts = new Map<string, ArtifactDefinition>();
  private rawAliases = new Map<string, string>();
  private contracts: ChildInputContract[] = [];

  constructor(private readonly options: FlattenOptions) {}

  async flatten(root: LoadedRunbook): Promise<FlattenResult> {
    this.artifacts = new Map();
    this.rawAliases = new Map();
    this.contracts = [];

    await this.expand({
      loaded: root,
      prefix: "",
      bindings: new Map(),
      ancestry: [runbookKey(root)],
      depth: 0,
    });

    for (const alias of this.rawAliases.keys()) {
      if (this.artifacts.has(alias)) {
        throw new DuplicateArtifactError(alias, { reason: "alias collides with an artifact" });
      }
    }

    const aliases = new Map<string, string>();
    for (const alias of this.rawAliases.keys()) {
      aliases.set(alias, this.followAlias(alias));
    }

    const artifacts: Record<string, ArtifactDefinition> = {};
    for (const [id, definition] of this.artifacts) {
      artifacts[id] = definition.inputs
        ? { ...definition, inputs: unique(definition.inputs.map((ref) => this.followAlias(ref))) }
        : definition;
    }

    const inputContracts = this.contracts.map((contract) => ({
      ...contract,
      sourceId: this.followAlias(contract.sourceId),
    }));

    return { artifacts, aliases, inputContracts };
  }

  private async expand(frame: ExpandFrame): Promise<void> {
    const { loaded, prefix, bindings } = frame;
    const runbook = loaded.runbook;

    for (const [localId, definition] of Object.entries(runbook.artifacts)) {
      const globalId = prefix + localId;

      if (definition.child_runbook) {
        await this.expandChild(frame, localId, definition);
        continue;
      }

      if (this.artifacts.has(globalId)) {
        throw new DuplicateArtifactError(globalId);
      }

      const flattened: ArtifactDefinition = { ...definition };
      if (definition.inputs) {
        const inputs: string[] = [];
        for (const ref of definition.inputs) {
          const resolved = this.resolveLocalRef(runbook, prefix, bindings, ref);
          if (resolved !== null) inputs.push(resolved);
        }
        if (inputs.length === 0) {
          throw new MissingInputMappingError(
            globalId,
            definition.inputs.join(", "),
            `Artifact "${globalId}" has no inputs left after dropping unmapped optional inputs`
          );
        }
        flattened.inputs = inputs;
      }

      this.artifacts.set(globalId, flattened);
    }
  }

  private async expandChild(
    frame: ExpandFrame,
    localId: string,
    definition: ArtifactDefinition
  ): Promise<void> {
    const directive = definition.child_runbook;
    if (!directive) return;

    const { loaded, prefix, bindings, ancestry, depth } = frame;
    const globalId = prefix + localId;

    if (depth + 1 > this.options.maxChildDepth) {
      throw new ChildDepthExceededError(this.options.maxChildDepth, [...ancestry, directive.path]);
    }

    const child = await this.options.resolver.resolve(directive.path, loaded);
    const childKey = runbookKey(child);
    if (ancestry.includes(childKey)) {
      throw new CircularRunbookError([...ancestry, childKey]);
    }

    this.options.onChildLoaded?.(child, globalId);
    logDebug("Flattening child runbook", { artifactId: globalId, path: childKey, depth: depth + 1 });

    const childRunbook = child.runbook;
    const declaredInputs = childRunbook.inputs ?? {};
    const declaredOutputs = childRunbook.outputs ?? {};

    for (const inputName of Object.keys(directive.input_mapping)) {
      if (!(inputName in declaredInputs)) {
        throw new MissingInputMappingError(
          globalId,
          inputName,
          `Child runbook for "${globalId}" does not declare input "${inputName}"`
        );
      }
    }

    const childBindings = new Map<string, string | null>();
    for (const [inputName, declaration] of Object.entries(declaredInputs)) {
      const mapped = directive.input_mapping[inputName];
      const resolved =
        mapped !== undefined
          ? this.resolveLocalRef(loaded.runbook, prefix, bindings, mapped)
          : null;

      if (resolved === null) {
        if (!declaration.optional) {
          throw new MissingInputMappingError(globalId, inputName);
        }
        childBindings.set(inputName, null);
        continue;
      }

      childBindings.set(inputName, resolved);
      this.contracts.push({
        childArtifactId: globalId,
        inputName,
        sourceId: resolved,
        expectedSchema: parseContractSchema(
          declaration.input_schema,
          `${childKey}: inputs.${inputName}.input_schema`
        ),
      });
    }

    const childPrefix = namespacedId(globalId, "");
    const exposed: Array<[alias: string, outputName: string]> = directive.output
      ? [[globalId, directive.output]]
      : Object.entries(directive.output_mapping ?? {}).map(
          ([outputName, alias]): [string, string] => [prefix + alias, outputName]
        );

    for (const [alias, outputName] of exposed) {
      const output = declaredOutputs[outputName];
      if (!output) {
        throw new InvalidOutputMappingError(globalId, outputName);
      }
      if (this.rawAliases.has(alias)) {
        throw new DuplicateArtifactError(alias, { reason: "alias declared twice" });
      }
      this.rawAliases.set(alias, childPrefix + output.artifact);
    }

    await this.expand({
      loaded: child,
      prefix: childPrefix,
      bindings: childBindings,
      ancestry: [...ancestry, childKey],
      depth: depth + 1,
    });
  }

  /**
   * Map an identifier used inside `runbook` to its global id, or null for an
   * unmapped optional input.
   */
  private resolveLocalRef(
    runbook: Runbook,
    prefix: string,
    bindings: InputBindings,
    ref: string
  ): string | null {
    if (runbook.inputs && ref in runbook.inputs && !(ref in runbook.artifacts)) {
      const bound = bindings.get(ref);
      return bound === undefined ? prefix + ref : bound;
    }
    return prefix + ref;
  }

  private followAlias(id: string): string {
    const seen = new Set<string>();
    let current = id;
    let next = this.rawAliases.get(current);
    while (next !== undefined) {
      if (seen.has(current)) {
        throw new CircularRunbookError([...seen, current]);
      }
      seen.add(current);
      current = next;
      next = this.rawAliases.get(current);
    }
    return current;
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
