import { ZodError } from "zod";

import { UnparsableModelOutputError } from "../extract/extractStructured";
import { ProviderError, type ProviderErrorCode } from "../llm/provider";
import { DeadlineExceededError } from "./deadline";
import type { PipelineStage } from "./stages";

export type PipelineErrorKind =
  | ProviderErrorCode
  | "UNPARSABLE_MODEL_OUTPUT"
  | "TIMEOUT"
  | "INVALID_REQUEST"
  | "INTERNAL_ERROR";

/** The one failure a caller of the orchestrator sees. `stage` is null for request-level failures. */
export class PipelineError extends Error {
  public readonly stage: PipelineStage | null;

  public readonly kind: PipelineErrorKind;

  public readonly cause?: unknown;

  constructor(stage: PipelineStage | null, kind: PipelineErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = "PipelineError";
    this.stage = stage;
    this.kind = kind;
    this.cause = cause;
  }
}

export function kindOf(err: unknown): PipelineErrorKind {
  if (err instanceof PipelineError) return err.kind;
  if (err instanceof DeadlineExceededError) return "TIMEOUT";
  if (err instanceof ProviderError) return err.code;
  if (err instanceof UnparsableModelOutputError) return err.code;
  if (err instanceof ZodError) return "INVALID_REQUEST";
  return "INTERNAL_ERROR";
}

export function toPipelineError(err: unknown, stage: PipelineStage | null): PipelineError {
  if (err instanceof PipelineError) return err;
  const kind = kindOf(err);
  const detail = err instanceof Error ? err.message : String(err);
  const where = stage ? `Stage ${stage} failed` : "Pipeline failed";
  return new PipelineError(stage, kind, `${where} (${kind}): ${detail}`, err);
}
