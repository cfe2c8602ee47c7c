import fs from "node:fs";
import path from "node:path";

import {
  FAILED_OUTPUT_MAX_CHARS,
  type FailedOutputRecordV0,
  FailedOutputRecordV0Schema,
} from "./schemas/failedOutputRecordV0";

/** Sink for model output that could not be turned into a stage result. */
export interface FailedOutputStore {
  save(record: FailedOutputRecordV0): Promise<void>;
}

export function buildFailedOutputRecord(input: {
  requestId: string;
  stage: string;
  rawText: string;
  parseError: string;
  now?: Date;
}): FailedOutputRecordV0 {
  return FailedOutputRecordV0Schema.parse({
    schemaVersion: "v0",
    timestamp: (input.now ?? new Date()).toISOString(),
    requestId: input.requestId,
    stage: input.stage,
    rawTextTruncated: input.rawText.slice(0, FAILED_OUTPUT_MAX_CHARS),
    rawTextLength: input.rawText.length,
    parseError: input.parseError,
  });
}

function dayStamp(timestamp: string): string {
  return timestamp.slice(0, 10).replace(/-/g, "");
}

// One JSON line per failure, one file per UTC day.
export function createJsonlFailedOutputStore(dir: string): FailedOutputStore {
  return {
    async save(record) {
      await fs.promises.mkdir(dir, { recursive: true });
      const file = path.join(dir, `failed_outputs_${dayStamp(record.timestamp)}.jsonl`);
      await fs.promises.appendFile(file, `${JSON.stringify(record)}\n`, "utf8");
    },
  };
}

export type MemoryFailedOutputStore = FailedOutputStore & { readonly records: FailedOutputRecordV0[] };

export function createMemoryFailedOutputStore(): MemoryFailedOutputStore {
  const records: FailedOutputRecordV0[] = [];
  return {
    records,
    async save(record) {
      records.push(record);
    },
  };
}
