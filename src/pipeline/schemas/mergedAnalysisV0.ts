import { z } from "zod";

import { type ContextAnalysisCore, normalizeContextCore } from "./contextAnalysisV0";
import { type SceneAnalysisV0, normalizeScene } from "./sceneAnalysisV0";

export type MergedAnalysisV0 = {
  context: ContextAnalysisCore;
  scene: SceneAnalysisV0;
};

// One call, two stage payloads. Both sections must be present; fields inside
// them are filled with defaults like the single-stage outputs.
export const MergedAnalysisOutputSchema = z
  .object({
    conversation_analysis: z.record(z.string(), z.unknown()),
    scenario_decision: z.record(z.string(), z.unknown()),
  })
  .passthrough()
  .transform(
    (o): MergedAnalysisV0 => ({
      context: normalizeContextCore(o.conversation_analysis),
      scene: normalizeScene(o.scenario_decision),
    }),
  );
