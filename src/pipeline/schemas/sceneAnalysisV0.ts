import { z } from "zod";

import { asRecord, readEnum, readLevel, readStringList, readText } from "./normalize";

export const RELATIONSHIP_STATES = ["ignition", "propulsion", "ventilation", "equilibrium"] as const;
export const SCENARIOS = ["SAFE", "BALANCED", "RISKY", "RECOVERY", "NEGATIVE"] as const;

export const SceneAnalysisV0Schema = z
  .object({
    relationshipState: z.enum(RELATIONSHIP_STATES),
    scenario: z.enum(SCENARIOS),
    recommendedScenario: z.enum(SCENARIOS),
    currentScenario: z.string(),
    intimacyLevel: z.number().int().min(0).max(100),
    riskFlags: z.array(z.string().min(1)).default([]),
    recommendedStrategies: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type SceneAnalysisV0 = z.infer<typeof SceneAnalysisV0Schema>;

export function normalizeScene(raw: unknown): SceneAnalysisV0 {
  const r = asRecord(raw);
  const recommendedScenario = readEnum(r.recommended_scenario, SCENARIOS, "SAFE");
  return {
    relationshipState: readEnum(r.relationship_state, RELATIONSHIP_STATES, "equilibrium"),
    scenario: readEnum(r.scenario, SCENARIOS, recommendedScenario),
    recommendedScenario,
    currentScenario: readText(r.current_scenario),
    intimacyLevel: readLevel(r.intimacy_level, 50),
    riskFlags: readStringList(r.risk_flags),
    recommendedStrategies: readStringList(r.recommended_strategies, 3),
  };
}

export const SceneAnalysisOutputSchema = z
  .object({ relationship_state: z.string() })
  .passthrough()
  .transform((o) => normalizeScene(o));
