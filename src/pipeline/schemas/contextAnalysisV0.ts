import { z } from "zod";

import { asRecord, readEnum, readLevel, readStringList, readText } from "./normalize";

export const EMOTION_STATES = ["positive", "neutral", "negative"] as const;

export const EnrichedMessageV0Schema = z
  .object({
    index: z.number().int().nonnegative(),
    speaker: z.string().min(1),
    text: z.string(),
    timestamp: z.string().nullable(),
    source: z.enum(["text", "image"]),
  })
  .strict();

export type EnrichedMessageV0 = z.infer<typeof EnrichedMessageV0Schema>;

export const ContextAnalysisCoreSchema = z
  .object({
    conversationSummary: z.string(),
    emotionState: z.enum(EMOTION_STATES),
    currentIntimacyLevel: z.number().int().min(0).max(100),
    riskFlags: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type ContextAnalysisCore = z.infer<typeof ContextAnalysisCoreSchema>;

export const ContextAnalysisV0Schema = ContextAnalysisCoreSchema.extend({
  conversation: z.array(EnrichedMessageV0Schema),
}).strict();

export type ContextAnalysisV0 = z.infer<typeof ContextAnalysisV0Schema>;

export function normalizeContextCore(raw: unknown): ContextAnalysisCore {
  const r = asRecord(raw);
  return {
    conversationSummary: readText(r.conversation_summary),
    emotionState: readEnum(r.emotion_state, EMOTION_STATES, "neutral"),
    currentIntimacyLevel: readLevel(r.current_intimacy_level, 50),
    riskFlags: readStringList(r.risk_flags),
  };
}

// What the context prompt asks the model for.
export const ContextAnalysisOutputSchema = z
  .object({ conversation_summary: z.string() })
  .passthrough()
  .transform((o) => normalizeContextCore(o));
