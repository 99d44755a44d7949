import * as semver from "semver";
import { DEFAULT_SCHEMA_VERSION, type Schema } from "../types/schema.js";

const SCHEMA_NAME_RE = /^[A-Za-z][A-Za-z0-9_.-]*$/;

/**
 * Parse "name" or "name/version". Returns null when the string is malformed or
 * the version is not a valid semantic version.
 */
export function tryParseSchemaString(value: string): Schema | null {
  const trimmed = value.trim();
  if (trimmed !== value || trimmed.length === 0) {
    return null;
  }

  const parts = trimmed.split("/");
  if (parts.length > 2) {
    return null;
  }

  const [name, version] = parts;
  if (!name || !SCHEMA_NAME_RE.test(name)) {
    return null;
  }

  if (version === undefined) {
    return { name, version: DEFAULT_SCHEMA_VERSION };
  }

  if (semver.valid(version) !== version) {
    return null;
  }

  return { name, version };
}

export function formatSchema(schema: Schema): string {
  return `${schema.name}/${schema.version}`;
}

export function schemasEqual(a: Schema, b: Schema): boolean {
  return a.name === b.name && a.version === b.version;
}
