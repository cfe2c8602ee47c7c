// Fingerprint inputs per stage. Both strategies build their keys here and
// nowhere else, so equal inputs give equal keys whichever flow computes them.

import { sha256Hex, stageKey } from "../cache/cacheKey";
import type { ImageInput } from "../llm/provider";
import type { ConversationEntryV0, PipelineRequestV0, QualityTier } from "./schemas/pipelineRequestV0";
import type { CacheKey, StagePayloads } from "./stages";

function conversationContent(conversation: ConversationEntryV0[]) {
  return conversation.map((e) => ({
    speaker: e.speaker,
    text: e.text,
    timestamp: e.timestamp ?? null,
    kind: e.kind,
  }));
}

export function imageFingerprint(image: ImageInput): string {
  return image.kind === "url" ? sha256Hex(`url:${image.url}`) : sha256Hex(image.bytes);
}

export function imageResultKey(image: ImageInput): CacheKey<"image_result"> {
  return { kind: "image_result", fingerprint: imageFingerprint(image) };
}

export function contextKey(req: PipelineRequestV0): CacheKey<"context_analysis"> {
  return stageKey("context_analysis", {
    conversation: conversationContent(req.conversation),
    participants: { selfId: req.participants.selfId, otherId: req.participants.otherId },
    screenshot: req.image ? imageFingerprint(req.image) : undefined,
  });
}

export function sceneKey(req: PipelineRequestV0): CacheKey<"scene_analysis"> {
  return stageKey("scene_analysis", {
    conversation: conversationContent(req.conversation),
    screenshot: req.image ? imageFingerprint(req.image) : undefined,
  });
}

export function personaKey(
  context: StagePayloads["context_analysis"],
  participantId: string,
): CacheKey<"persona_analysis"> {
  return stageKey("persona_analysis", { context, participantId });
}

export function replyKey(input: {
  context: StagePayloads["context_analysis"];
  scene: StagePayloads["scene_analysis"];
  persona: StagePayloads["persona_analysis"];
  quality: QualityTier;
  language: string;
}): CacheKey<"reply"> {
  return stageKey("reply", input);
}
