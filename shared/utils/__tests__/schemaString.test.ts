import { describe, it, expect } from "vitest";
import { tryParseSchemaString, formatSchema, schemasEqual } from "../schemaString.js";

describe("tryParseSchemaString", () => {
  it("defaults the version for a bare name", () => {
    expect(tryParseSchemaString("standard_input")).toEqual({
      name: "standard_input",
      version: "1.0.0",
    });
  });

  it("parses an explicit version", () => {
    expect(tryParseSchemaString("personal_data_finding/2.1.0")).toEqual({
      name: "personal_data_finding",
      version: "2.1.0",
    });
  });

  it("accepts prerelease versions", () => {
    expect(tryParseSchemaString("findings/1.0.0-beta.1")).toEqual({
      name: "findings",
      version: "1.0.0-beta.1",
    });
  });

  it("rejects versions that are not semantic versions", () => {
    expect(tryParseSchemaString("findings/1.0")).toBeNull();
    expect(tryParseSchemaString("findings/v1.0.0")).toBeNull();
    expect(tryParseSchemaString("findings/latest")).toBeNull();
  });

  it("rejects empty and padded strings", () => {
    expect(tryParseSchemaString("")).toBeNull();
    expect(tryParseSchemaString(" findings")).toBeNull();
    expect(tryParseSchemaString("findings/")).toBeNull();
  });

  it("rejects extra path segments", () => {
    expect(tryParseSchemaString("a/1.0.0/extra")).toBeNull();
  });

  it("rejects names with invalid characters", () => {
    expect(tryParseSchemaString("/1.0.0")).toBeNull();
    expect(tryParseSchemaString("has space/1.0.0")).toBeNull();
    expect(tryParseSchemaString("1findings")).toBeNull();
  });
});

describe("formatSchema", () => {
  it("joins name and version", () => {
    expect(formatSchema({ name: "standard_input", version: "1.0.0" })).toBe(
      "standard_input/1.0.0"
    );
  });
});

describe("schemasEqual", () => {
  it("requires both name and version to match", () => {
    const a = { name: "findings", version: "1.0.0" };
    expect(schemasEqual(a, { name: "findings", version: "1.0.0" })).toBe(true);
    expect(schemasEqual(a, { name: "findings", version: "1.1.0" })).toBe(false);
    expect(schemasEqual(a, { name: "other", version: "1.0.0" })).toBe(false);
  });
});
