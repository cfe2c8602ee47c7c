import { z } from "zod";

import { type ContextAnalysisV0, ContextAnalysisV0Schema } from "./schemas/contextAnalysisV0";
import { type ImageResultV0, ImageResultV0Schema } from "./schemas/imageResultV0";
import { type PersonaAnalysisV0, PersonaAnalysisV0Schema } from "./schemas/personaAnalysisV0";
import { type ReplyV0, ReplyV0Schema } from "./schemas/replyV0";
import { type SceneAnalysisV0, SceneAnalysisV0Schema } from "./schemas/sceneAnalysisV0";

export const StageKindSchema = z.enum([
  "context_analysis",
  "scene_analysis",
  "persona_analysis",
  "image_result",
  "reply",
]);

export type StageKind = z.infer<typeof StageKindSchema>;

// The merged strategy makes one call that is not a stage of its own.
export type PipelineStage = StageKind | "merged_analysis";

export type StagePayloads = {
  context_analysis: ContextAnalysisV0;
  scene_analysis: SceneAnalysisV0;
  persona_analysis: PersonaAnalysisV0;
  image_result: ImageResultV0;
  reply: ReplyV0;
};

type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const StagePayloadSchemas: { [K in StageKind]: PayloadSchema<StagePayloads[K]> } = {
  context_analysis: ContextAnalysisV0Schema,
  scene_analysis: SceneAnalysisV0Schema,
  persona_analysis: PersonaAnalysisV0Schema,
  image_result: ImageResultV0Schema,
  reply: ReplyV0Schema,
};

export function safeParseStagePayload<K extends StageKind>(kind: K, value: unknown): StagePayloads[K] | undefined {
  const schema: PayloadSchema<StagePayloads[K]> = StagePayloadSchemas[kind];
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export type StageResult<K extends StageKind> = {
  kind: K;
  payload: StagePayloads[K];
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
  costUsd: number;
  fromCache: boolean;
  createdAt: string;
};

export type CacheKey<K extends StageKind> = {
  kind: K;
  fingerprint: string;
};
