import crypto from "crypto";

/**
 * JSON with object keys sorted at every level. Undefined object members are
 * dropped, matching JSON.stringify.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = sortKeys(member);
      }
    }
    return sorted;
  }
  return value;
}

/** `sha256:<hex>` over the canonical JSON of a value. */
export function fingerprint(value: unknown): string {
  const hash = crypto.createHash("sha256").update(canonicalJson(value)).digest("hex");
  return `sha256:${hash}`;
}
