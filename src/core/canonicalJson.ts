import { createHash } from "crypto";
import type { JsonObject, JsonValue } from "./json.js";

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${sha256Hex(data)}` as const;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)
  );
}

/**
 * Normalizes a value into JSON with sorted object keys. `undefined` members are
 * dropped, non-finite numbers become null, bigints and dates become strings.
 */
export function canonicalizeJson(value: unknown): JsonValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    if (Object.is(value, -0)) return 0;
    return value;
  }

  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map((v) => canonicalizeJson(v) ?? null);
  }

  if (isPlainObject(value)) {
    const out: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      const c = canonicalizeJson(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }

  throw new Error(`value is not JSON-serializable: ${Object.prototype.toString.call(value)}`);
}

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalizeJson(value) ?? null);
}
