import { createHash } from "crypto";
import type { JsonObject, JsonValue } from "./json.js";

export type Sha256Ref = `sha256:${string}`;

export function sha256Prefixed(data: string | Buffer): Sha256Ref {
  return `sha256:${createHash("sha256").update(data).digest("hex")}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Sorted keys, no `undefined` members, `-0` as `0` and non-finite numbers as
 * null. Equivalent configs and requests therefore hash alike.
 */
export function canonicalizeJson(value: unknown): JsonValue | undefined {
  switch (typeof value) {
    case "undefined":
      return undefined;
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) return null;
      return Object.is(value, -0) ? 0 : value;
    case "object": {
      if (value === null) return null;
      if (Array.isArray(value)) return value.map((v: unknown) => canonicalizeJson(v) ?? null);
      if (!isPlainObject(value)) break;
      const out: JsonObject = {};
      for (const key of Object.keys(value).sort()) {
        const c = canonicalizeJson(value[key]);
        if (c !== undefined) out[key] = c;
      }
      return out;
    }
  }
  throw new Error(`value is not JSON-serializable: ${typeof value}`);
}

export function canonicalObject(value: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    const c = canonicalizeJson(value[key]);
    if (c !== undefined) out[key] = c;
  }
  return out;
}

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalizeJson(value) ?? null);
}
