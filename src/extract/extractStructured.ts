import { z } from "zod";

import { repairJsonText } from "./repairSteps";
import { scanJsonObjects } from "./scanJsonObjects";

export type ExtractionStep = "strict_parse" | "object_scan" | "schema_validation";

const EXCERPT_CHARS = 200;

export class UnparsableModelOutputError extends Error {
  public readonly code = "UNPARSABLE_MODEL_OUTPUT" as const;

  public readonly rawText: string;

  public readonly abandonedAt: ExtractionStep;

  public readonly excerpt: string;

  public readonly cause?: unknown;

  constructor(rawText: string, abandonedAt: ExtractionStep, detail: string, cause?: unknown) {
    const excerpt = rawText.length > EXCERPT_CHARS ? `${rawText.slice(0, EXCERPT_CHARS)}...` : rawText;
    super(`Could not extract valid JSON from model output (${abandonedAt}: ${detail})`);
    this.name = "UnparsableModelOutputError";
    this.rawText = rawText;
    this.abandonedAt = abandonedAt;
    this.excerpt = excerpt;
    this.cause = cause;
  }
}

export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

type Failed = { ok: false; step: ExtractionStep; error: unknown };

type Attempt<T> = { ok: true; value: T } | Failed;

function tryParse<T>(text: string, schema: OutputSchema<T>): Attempt<T> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return { ok: false, step: "strict_parse", error: err };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) return { ok: false, step: "schema_validation", error: parsed.error };
  return { ok: true, value: parsed.data };
}

function describe(err: unknown): string {
  if (err instanceof z.ZodError) {
    const first = err.issues[0];
    return first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "schema mismatch";
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Turns raw model text into a value of the schema's output type: repair the
 * whole text and parse it, otherwise take the first complete embedded object
 * that parses (as-is or repaired) and validates.
 */
export function extractStructured<T>(rawText: string, schema: OutputSchema<T>): T {
  const repaired = tryParse(repairJsonText(rawText), schema);
  if (repaired.ok) return repaired.value;

  let last: Failed = repaired;
  const objects = scanJsonObjects(rawText);
  for (const candidate of objects) {
    let attempt = tryParse(candidate, schema);
    if (!attempt.ok && attempt.step === "strict_parse") {
      attempt = tryParse(repairJsonText(candidate), schema);
    }
    if (attempt.ok) return attempt.value;
    last = attempt;
  }

  if (objects.length === 0) {
    throw new UnparsableModelOutputError(
      rawText,
      "object_scan",
      `no complete JSON object found; ${describe(repaired.error)}`,
      repaired.error,
    );
  }
  throw new UnparsableModelOutputError(rawText, last.step, describe(last.error), last.error);
}

export function extractJson(rawText: string): unknown {
  return extractStructured(rawText, z.unknown());
}
