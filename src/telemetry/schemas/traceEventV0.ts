import { z } from "zod";

export const TraceEventTypeSchema = z.enum(["provider_attempt", "stage_complete"]);

export const TraceEventV0Schema = z
  .object({
    schemaVersion: z.literal("v0"),
    type: TraceEventTypeSchema,
    requestId: z.string().min(1),
    stage: z.string().min(1),
    provider: z.string().min(1).nullable(),
    model: z.string().min(1).nullable(),
    durationMs: z.number().int().nonnegative(),
    inputTokens: z.number().int().nonnegative(),
    outputTokens: z.number().int().nonnegative(),
    fromCache: z.boolean(),
    outcome: z.string().min(1),
    ts: z.string().datetime(),
  })
  .strict();

export type TraceEventV0 = z.infer<typeof TraceEventV0Schema>;
