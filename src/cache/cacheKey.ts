import crypto from "crypto";

import type { CacheKey, StageKind } from "../pipeline/stages";

export function sha256Hex(input: string | Buffer): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

/**
 * JSON with object keys sorted and `undefined` members dropped, so that two
 * structurally equal values always serialize to the same string. Buffers are
 * replaced by their digest.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (Buffer.isBuffer(value)) return JSON.stringify({ $sha256: sha256Hex(value) });
  if (typeof value === "number") return Number.isFinite(value) ? JSON.stringify(value) : "null";
  if (typeof value === "string" || typeof value === "boolean") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map((v) => canonicalJson(v)).join(",")}]`;
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return "null";
}

export function fingerprintOf(inputs: unknown): string {
  return sha256Hex(canonicalJson(inputs));
}

export function stageKey<K extends StageKind>(kind: K, inputs: unknown): CacheKey<K> {
  return { kind, fingerprint: fingerprintOf(inputs) };
}

// The kind prefix keeps namespaces apart even if two fingerprints collide.
export function storageKey(key: CacheKey<StageKind>): string {
  return `${key.kind}:${key.fingerprint}`;
}
