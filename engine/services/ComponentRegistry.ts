/**
 * ComponentRegistry - connector and analyser factories by type name
 *
 * Constructed once and passed to the planner and executor. Registration is
 * additive; registering a type name again replaces the earlier factory.
 */

import type {
  AnalyserFactory,
  ComponentKind,
  ComponentSummary,
  ConnectorFactory,
} from "../../shared/types/component.js";
import { ComponentNotFoundError, ConfigError } from "../utils/errorTypes.js";
import { logWarn } from "../utils/logger.js";

export class ComponentRegistry {
  private readonly connectors = new Map<string, ConnectorFactory>();
  private readonly analysers = new Map<string, AnalyserFactory>();

  get connectorFactories(): ReadonlyMap<string, ConnectorFactory> {
    return this.connectors;
  }

  get analyserFactories(): ReadonlyMap<string, AnalyserFactory> {
    return this.analysers;
  }

  registerConnector(factory: ConnectorFactory, typeName = factory.getComponentName()): this {
    this.register("connector", this.connectors, factory, typeName);
    return this;
  }

  registerAnalyser(factory: AnalyserFactory, typeName = factory.getComponentName()): this {
    this.register("analyser", this.analysers, factory, typeName);
    return this;
  }

  hasConnector(typeName: string): boolean {
    return this.connectors.has(typeName);
  }

  hasAnalyser(typeName: string): boolean {
    return this.analysers.has(typeName);
  }

  getConnectorFactory(typeName: string): ConnectorFactory {
    const factory = this.connectors.get(typeName);
    if (!factory) {
      throw new ComponentNotFoundError("connector", typeName);
    }
    return factory;
  }

  getAnalyserFactory(typeName: string): AnalyserFactory {
    const factory = this.analysers.get(typeName);
    if (!factory) {
      throw new ComponentNotFoundError("analyser", typeName);
    }
    return factory;
  }

  listComponents(): ComponentSummary[] {
    const summaries: ComponentSummary[] = [];
    for (const [typeName, factory] of this.connectors) {
      summaries.push(this.summarize("connector", typeName, factory));
    }
    for (const [typeName, factory] of this.analysers) {
      summaries.push(this.summarize("analyser", typeName, factory));
    }
    return summaries;
  }

  private register<T>(
    kind: ComponentKind,
    target: Map<string, T>,
    factory: T,
    typeName: string
  ): void {
    if (!typeName) {
      throw new ConfigError(`Cannot register ${kind} without a type name`);
    }
    if (target.has(typeName)) {
      logWarn(`Replacing registered ${kind}`, { typeName });
    }
    target.set(typeName, factory);
  }

  private summarize(
    kind: ComponentKind,
    typeName: string,
    factory: ConnectorFactory | AnalyserFactory
  ): ComponentSummary {
    return {
      kind,
      typeName,
      componentName: factory.getComponentName(),
      inputSchemas: [...factory.getInputSchemas()],
      outputSchemas: [...factory.getOutputSchemas()],
    };
  }
}
