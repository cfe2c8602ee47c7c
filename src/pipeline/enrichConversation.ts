import type { ImageResultV0 } from "./schemas/imageResultV0";
import type { EnrichedMessageV0 } from "./schemas/contextAnalysisV0";
import type { ConversationEntryV0 } from "./schemas/pipelineRequestV0";

/** Runs `mapper` over `items` with at most `concurrency` in flight; output order follows input order. */
export async function mapWithConcurrency<TIn, TOut>(
  items: readonly TIn[],
  concurrency: number,
  mapper: (item: TIn, index: number) => Promise<TOut>,
): Promise<TOut[]> {
  const results: TOut[] = [];
  let index = 0;

  async function worker() {
    while (index < items.length) {
      const currentIndex = index;
      index += 1;
      results[currentIndex] = await mapper(items[currentIndex], currentIndex);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export function imageResultText(result: ImageResultV0): string {
  const lines = result.messages.map((m) => `${m.speaker}: ${m.text}`);
  if (lines.length > 0) return lines.join("\n");
  return result.description;
}

export type EnrichOptions = {
  concurrency: number;
  resolveImage: (url: string, index: number) => Promise<ImageResultV0>;
};

/**
 * Turns request entries into the messages folded into context analysis.
 * Image entries are read through `resolveImage`; everything else passes
 * through trimmed.
 */
export async function enrichConversation(
  entries: readonly ConversationEntryV0[],
  opts: EnrichOptions,
): Promise<EnrichedMessageV0[]> {
  return mapWithConcurrency(entries, opts.concurrency, async (entry, index): Promise<EnrichedMessageV0> => {
    if (entry.kind === "image") {
      const result = await opts.resolveImage(entry.text, index);
      return {
        index,
        speaker: entry.speaker,
        text: imageResultText(result),
        timestamp: entry.timestamp ?? null,
        source: "image",
      };
    }
    return { index, speaker: entry.speaker, text: entry.text.trim(), timestamp: entry.timestamp ?? null, source: "text" };
  });
}

// Screenshot messages follow the request conversation; "self"/"other" become the request's participant ids.
export function screenshotMessages(
  result: ImageResultV0,
  startIndex: number,
  participants: { selfId: string; otherId: string },
): EnrichedMessageV0[] {
  return result.messages.map((m, i): EnrichedMessageV0 => ({
    index: startIndex + i,
    speaker: m.speaker === "self" ? participants.selfId : m.speaker === "other" ? participants.otherId : m.speaker,
    text: m.text,
    timestamp: null,
    source: "image",
  }));
}

export function formatConversation(messages: readonly EnrichedMessageV0[]): string {
  return messages.map((m) => `${m.speaker}: ${m.text.replace(/\s*\n\s*/g, " / ")}`).join("\n");
}
