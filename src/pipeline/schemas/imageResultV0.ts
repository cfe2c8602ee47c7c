import { z } from "zod";

import { asRecord, readText } from "./normalize";

const ParticipantSchema = z
  .object({
    id: z.string().min(1),
    nickname: z.string(),
  })
  .strict();

export const ImageMessageV0Schema = z
  .object({
    speaker: z.string().min(1),
    text: z.string(),
  })
  .strict();

export const ImageResultV0Schema = z
  .object({
    participants: z.object({ self: ParticipantSchema, other: ParticipantSchema }).strict(),
    messages: z.array(ImageMessageV0Schema),
    description: z.string(),
  })
  .strict();

export type ImageResultV0 = z.infer<typeof ImageResultV0Schema>;

export function normalizeImageResult(raw: unknown): ImageResultV0 {
  const r = asRecord(raw);
  const participants = asRecord(r.participants);
  const self = asRecord(participants.self);
  const other = asRecord(participants.other);

  const messages: ImageResultV0["messages"] = [];
  if (Array.isArray(r.messages)) {
    for (const item of r.messages) {
      const m = asRecord(item);
      const text = readText(m.text);
      if (!text) continue;
      messages.push({ speaker: readText(m.speaker) || "other", text });
    }
  }

  return {
    participants: {
      self: { id: readText(self.id) || "self", nickname: readText(self.nickname) },
      other: { id: readText(other.id) || "other", nickname: readText(other.nickname) },
    },
    messages,
    description: readText(r.description),
  };
}

export const ImageResultOutputSchema = z
  .object({ messages: z.array(z.unknown()) })
  .passthrough()
  .transform((o) => normalizeImageResult(o));
