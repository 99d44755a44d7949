import { describe, it, expect } from "vitest";
import { ComponentRegistry } from "../ComponentRegistry.js";
import { ComponentNotFoundError, ConfigError } from "../../utils/errorTypes.js";
import { FakeAnalyserFactory, FakeConnectorFactory, schema } from "./helpers/fakes.js";

describe("ComponentRegistry", () => {
  it("registers factories under their component name by default", () => {
    const connector = new FakeConnectorFactory("filesystem", schema("standard_input"));
    const registry = new ComponentRegistry().registerConnector(connector);

    expect(registry.hasConnector("filesystem")).toBe(true);
    expect(registry.hasAnalyser("filesystem")).toBe(false);
    expect(registry.getConnectorFactory("filesystem")).toBe(connector);
  });

  it("registers under an explicit type name", () => {
    const analyser = new FakeAnalyserFactory("secrets", [], schema("findings"));
    const registry = new ComponentRegistry().registerAnalyser(analyser, "secrets-v2");

    expect(registry.hasAnalyser("secrets")).toBe(false);
    expect(registry.getAnalyserFactory("secrets-v2")).toBe(analyser);
  });

  it("replaces an earlier registration with the same type name", () => {
    const first = new FakeConnectorFactory("git", schema("standard_input"));
    const second = new FakeConnectorFactory("git", schema("standard_input", "2.0.0"));
    const registry = new ComponentRegistry().registerConnector(first).registerConnector(second);

    expect(registry.getConnectorFactory("git")).toBe(second);
    expect(registry.connectorFactories.size).toBe(1);
  });

  it("throws ComponentNotFoundError for unknown types", () => {
    const registry = new ComponentRegistry();

    expect(() => registry.getConnectorFactory("nope")).toThrow(ComponentNotFoundError);
    expect(() => registry.getAnalyserFactory("nope")).toThrow('Unknown analyser type "nope"');
  });

  it("rejects an empty type name", () => {
    const connector = new FakeConnectorFactory("", schema("standard_input"));

    expect(() => new ComponentRegistry().registerConnector(connector)).toThrow(ConfigError);
  });

  it("lists registered components with their schemas", () => {
    const registry = new ComponentRegistry()
      .registerConnector(new FakeConnectorFactory("filesystem", schema("standard_input")))
      .registerAnalyser(
        new FakeAnalyserFactory("secrets", [schema("standard_input")], schema("findings"))
      );

    expect(registry.listComponents()).toEqual([
      {
        kind: "connector",
        typeName: "filesystem",
        componentName: "filesystem",
        inputSchemas: [],
        outputSchemas: [{ name: "standard_input", version: "1.0.0" }],
      },
      {
        kind: "analyser",
        typeName: "secrets",
        componentName: "secrets",
        inputSchemas: [{ name: "standard_input", version: "1.0.0" }],
        outputSchemas: [{ name: "findings", version: "1.0.0" }],
      },
    ]);
  });
});
