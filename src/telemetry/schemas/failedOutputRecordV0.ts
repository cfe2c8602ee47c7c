import { z } from "zod";

export const FAILED_OUTPUT_MAX_CHARS = 2000;

export const FailedOutputRecordV0Schema = z
  .object({
    schemaVersion: z.literal("v0"),
    timestamp: z.string().datetime(),
    requestId: z.string().min(1),
    stage: z.string().min(1),
    rawTextTruncated: z.string().max(FAILED_OUTPUT_MAX_CHARS),
    rawTextLength: z.number().int().nonnegative(),
    parseError: z.string(),
  })
  .strict();

export type FailedOutputRecordV0 = z.infer<typeof FailedOutputRecordV0Schema>;
