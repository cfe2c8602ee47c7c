import { z } from "zod";

import { asRecord, readEnum, readText, readUnit } from "./normalize";

export const PACINGS = ["slow", "normal", "fast"] as const;
export const RISK_TOLERANCES = ["low", "medium", "high"] as const;

export const PersonaAnalysisV0Schema = z
  .object({
    pacing: z.enum(PACINGS),
    riskTolerance: z.enum(RISK_TOLERANCES),
    confidence: z.number().min(0).max(1),
    summary: z.string(),
  })
  .strict();

export type PersonaAnalysisV0 = z.infer<typeof PersonaAnalysisV0Schema>;

export function normalizePersona(raw: unknown): PersonaAnalysisV0 {
  const r = asRecord(raw);
  return {
    pacing: readEnum(r.pacing, PACINGS, "normal"),
    riskTolerance: readEnum(r.risk_tolerance, RISK_TOLERANCES, "medium"),
    confidence: readUnit(r.confidence, 0.5),
    summary: readText(r.summary),
  };
}

export const PersonaAnalysisOutputSchema = z
  .object({ pacing: z.string() })
  .passthrough()
  .transform((o) => normalizePersona(o));
