import { z } from "zod";

import { ImageInputSchema } from "../../llm/provider";

export const QUALITY_TIERS = ["cheap", "normal", "premium"] as const;
export const QualityTierSchema = z.enum(QUALITY_TIERS);
export type QualityTier = z.infer<typeof QualityTierSchema>;

export const ConversationEntryV0Schema = z
  .object({
    speaker: z.string().trim().min(1),
    // For image entries this is the image URL.
    text: z.string(),
    timestamp: z.string().nullable().optional(),
    kind: z.enum(["text", "image"]).default("text"),
  })
  .strict()
  .superRefine((entry, ctx) => {
    if (entry.kind === "image" && !z.string().url().safeParse(entry.text).success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["text"], message: "image entries carry an image URL" });
    }
  });

export type ConversationEntryV0 = z.infer<typeof ConversationEntryV0Schema>;

export const PipelineRequestV0Schema = z
  .object({
    requestId: z.string().trim().min(1).optional(),
    conversation: z.array(ConversationEntryV0Schema).default([]),
    participants: z
      .object({
        selfId: z.string().trim().min(1),
        otherId: z.string().trim().min(1),
      })
      .strict(),
    language: z.string().trim().min(2).default("en"),
    quality: QualityTierSchema.default("normal"),
    image: ImageInputSchema.optional(),
  })
  .strict()
  .refine((req) => req.conversation.length > 0 || req.image !== undefined, {
    message: "conversation or image is required",
    path: ["conversation"],
  });

export type PipelineRequestV0 = z.infer<typeof PipelineRequestV0Schema>;
export type PipelineRequestInput = z.input<typeof PipelineRequestV0Schema>;

