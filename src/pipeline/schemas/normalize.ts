// Lenient field readers for model output. Models drop fields, send numbers as
// strings and invent enum values; each reader maps whatever arrived onto the
// payload type or its default.

export type LooseRecord = Record<string, unknown>;

export function asRecord(v: unknown): LooseRecord {
  if (v && typeof v === "object" && !Array.isArray(v)) return Object.fromEntries(Object.entries(v));
  return {};
}

export function readText(v: unknown, fallback = ""): string {
  if (typeof v === "string") return v.trim();
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return fallback;
}

export function readLevel(v: unknown, fallback = 50): number {
  if (v === null || v === undefined || v === "") return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(0, Math.min(100, Math.round(n)));
}

export function readUnit(v: unknown, fallback = 0.5): number {
  if (v === null || v === undefined || v === "") return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(0, Math.min(1, n));
}

export function readEnum<T extends string>(v: unknown, allowed: readonly T[], fallback: T): T {
  const s = readText(v).toLowerCase();
  for (const candidate of allowed) {
    if (candidate.toLowerCase() === s) return candidate;
  }
  return fallback;
}

export function readStringList(v: unknown, max = 20): string[] {
  if (!Array.isArray(v)) return [];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of v) {
    const s = readText(item);
    if (!s || seen.has(s)) continue;
    seen.add(s);
    out.push(s);
    if (out.length >= max) break;
  }
  return out;
}
