import { z } from "zod";

export const ReplyV0Schema = z
  .object({
    text: z.string().min(1),
    strategy: z.string().min(1).nullable(),
  })
  .strict();

export type ReplyV0 = z.infer<typeof ReplyV0Schema>;

export const ReplyOutputSchema = z
  .object({
    reply: z.string().trim().min(1),
    strategy: z.string().trim().optional().nullable(),
  })
  .passthrough()
  .transform((o): ReplyV0 => ({ text: o.reply, strategy: o.strategy ? o.strategy : null }));
