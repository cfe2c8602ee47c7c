import crypto from "crypto";

import type { Strategy } from "../config/pipelineConfig";
import { extractStructured, type OutputSchema, UnparsableModelOutputError } from "../extract/extractStructured";
import type { CallOptions, ImageInput, ProviderAdapter, ProviderCompletion } from "../llm/provider";
import { errorMessage, type Logger } from "../logging/logger";
import { buildFailedOutputRecord } from "../telemetry/failedOutputStore";
import type { PipelineContext } from "./context";
import { createDeadline } from "./deadline";
import { enrichConversation, formatConversation, screenshotMessages } from "./enrichConversation";
import { PipelineError, toPipelineError } from "./errors";
import { callWithFallback } from "./fallback";
import { type PromptName, type PromptVars, renderPrompt } from "./prompts";
import { type ContextAnalysisV0, ContextAnalysisOutputSchema, type EnrichedMessageV0 } from "./schemas/contextAnalysisV0";
import { ImageResultOutputSchema } from "./schemas/imageResultV0";
import { MergedAnalysisOutputSchema } from "./schemas/mergedAnalysisV0";
import { PersonaAnalysisOutputSchema, type PersonaAnalysisV0 } from "./schemas/personaAnalysisV0";
import {
  type PipelineRequestInput,
  type PipelineRequestV0,
  PipelineRequestV0Schema,
  type QualityTier,
} from "./schemas/pipelineRequestV0";
import { ReplyOutputSchema } from "./schemas/replyV0";
import { SceneAnalysisOutputSchema, type SceneAnalysisV0 } from "./schemas/sceneAnalysisV0";
import { contextKey, imageResultKey, personaKey, replyKey, sceneKey } from "./stageKeys";
import type { CacheKey, PipelineStage, StageKind, StagePayloads, StageResult } from "./stages";

export type RunOptions = {
  strategy?: Strategy;
  deadlineMs?: number;
  requestId?: string;
  signal?: AbortSignal;
};

export type PipelineResult = {
  requestId: string;
  strategy: Strategy;
  replyText: string;
  replyStrategy: string | null;
  stages: StageResult<StageKind>[];
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCostUsd: number;
  durationMs: number;
};

const REPLY_MAX_TOKENS: Record<QualityTier, number> = {
  cheap: 300,
  normal: 600,
  premium: 1000,
};

const ANALYSIS_OPTIONS: CallOptions = { temperature: 0.2, maxTokens: 900 };

type RunState = {
  requestId: string;
  req: PipelineRequestV0;
  signal: AbortSignal;
  stages: StageResult<StageKind>[];
  log: Logger;
  conversation: () => Promise<EnrichedMessageV0[]>;
};

type ModelCall<T> = {
  prompt: string;
  image?: ImageInput;
  options: CallOptions;
  schema: OutputSchema<T>;
};

type ModelOutput<T> = {
  value: T;
  adapter: ProviderAdapter;
  completion: ProviderCompletion;
  durationMs: number;
};

function costUsd(adapter: ProviderAdapter, completion: ProviderCompletion): number {
  const { inputPer1k, outputPer1k } = adapter.pricing;
  return (completion.inputTokens / 1000) * inputPer1k + (completion.outputTokens / 1000) * outputPer1k;
}

function toStageResult<K extends StageKind>(
  kind: K,
  payload: StagePayloads[K],
  out: Pick<ModelOutput<unknown>, "adapter" | "completion" | "durationMs">,
): StageResult<K> {
  return {
    kind,
    payload,
    provider: out.adapter.id,
    model: out.completion.model,
    inputTokens: out.completion.inputTokens,
    outputTokens: out.completion.outputTokens,
    durationMs: out.durationMs,
    costUsd: costUsd(out.adapter, out.completion),
    fromCache: false,
    createdAt: new Date().toISOString(),
  };
}

function attributed<T>(work: Promise<T>, stage: PipelineStage): Promise<T> {
  return work.catch((err: unknown) => {
    throw toPipelineError(err, stage);
  });
}

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(", ") : "none";
}

/**
 * Runs the stage graph for one request: image reading, context, scene,
 * persona and reply. Every stage goes through the shared stage cache, so a
 * stage computed by either strategy is reused by the other.
 */
export class Orchestrator {
  private readonly ctx: PipelineContext;

  private readonly log: Logger;

  constructor(ctx: PipelineContext) {
    this.ctx = ctx;
    this.log = ctx.logger.child({ component: "orchestrator" });
  }

  async run(input: PipelineRequestInput, opts: RunOptions = {}): Promise<PipelineResult> {
    const parsed = PipelineRequestV0Schema.safeParse(input);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "invalid request";
      throw new PipelineError(null, "INVALID_REQUEST", `Invalid pipeline request (${where})`, parsed.error);
    }

    const req = parsed.data;
    const strategy = opts.strategy ?? this.ctx.config.strategy;
    const requestId = opts.requestId ?? req.requestId ?? crypto.randomUUID();
    const startedAt = Date.now();
    const deadline = createDeadline(opts.deadlineMs ?? this.ctx.config.deadlineMs, opts.signal);
    const log = this.log.child({ requestId, strategy });

    let enriched: Promise<EnrichedMessageV0[]> | null = null;
    const run: RunState = {
      requestId,
      req,
      signal: deadline.signal,
      stages: [],
      log,
      conversation: () => {
        if (!enriched) enriched = this.materializeConversation(run);
        return enriched;
      },
    };

    try {
      const reply = strategy === "merged" ? await this.runMerged(run) : await this.runTraditional(run);
      const computed = run.stages.filter((s) => !s.fromCache);
      const result: PipelineResult = {
        requestId,
        strategy,
        replyText: reply.payload.text,
        replyStrategy: reply.payload.strategy,
        stages: run.stages,
        totalInputTokens: computed.reduce((n, s) => n + s.inputTokens, 0),
        totalOutputTokens: computed.reduce((n, s) => n + s.outputTokens, 0),
        totalCostUsd: computed.reduce((n, s) => n + s.costUsd, 0),
        durationMs: Date.now() - startedAt,
      };
      log.info(
        {
          event: "pipeline_complete",
          durationMs: result.durationMs,
          stages: run.stages.length,
          cached: run.stages.length - computed.length,
          costUsd: result.totalCostUsd,
        },
        "pipeline complete",
      );
      return result;
    } catch (err) {
      const failure = toPipelineError(err, null);
      log.error(
        { event: "pipeline_failed", stage: failure.stage, kind: failure.kind, err: failure.message },
        "pipeline failed",
      );
      throw failure;
    } finally {
      deadline.dispose();
    }
  }

  private async runTraditional(run: RunState): Promise<StageResult<"reply">> {
    const contextThenPersona = (async () => {
      const context = await this.contextStage(run);
      const persona = await this.personaStage(run, context.payload);
      return { context, persona };
    })();
    const [{ context, persona }, scene] = await Promise.all([contextThenPersona, this.sceneStage(run)]);
    return this.replyStage(run, context.payload, scene.payload, persona.payload);
  }

  private async runMerged(run: RunState): Promise<StageResult<"reply">> {
    const keys: [CacheKey<"context_analysis">, CacheKey<"scene_analysis">] = [contextKey(run.req), sceneKey(run.req)];
    const startedAt = Date.now();
    let pair: [StageResult<"context_analysis">, StageResult<"scene_analysis">];
    try {
      pair = await this.ctx.cache.getOrComputePair(
        keys,
        {
          both: () => this.computeMerged(run),
          first: () => attributed(this.computeContext(run), "context_analysis"),
          second: () => attributed(this.computeScene(run), "scene_analysis"),
        },
        { signal: run.signal },
      );
    } catch (err) {
      throw toPipelineError(err, "merged_analysis");
    }
    const [context, scene] = pair;
    this.record(run, context, Date.now() - startedAt);
    this.record(run, scene, Date.now() - startedAt);

    const persona = await this.personaStage(run, context.payload);
    return this.replyStage(run, context.payload, scene.payload, persona.payload);
  }

  private async computeMerged(
    run: RunState,
  ): Promise<[StageResult<"context_analysis">, StageResult<"scene_analysis">]> {
    const conversation = await run.conversation();
    const out = await this.callModel(run, "merged_analysis", {
      prompt: this.prompt("merged_analysis", {
        ...this.participantVars(run),
        conversation: formatConversation(conversation),
      }),
      options: ANALYSIS_OPTIONS,
      schema: MergedAnalysisOutputSchema,
    });

    // The call is accounted once, on the context result.
    const context = toStageResult("context_analysis", { ...out.value.context, conversation }, out);
    const scene: StageResult<"scene_analysis"> = {
      ...toStageResult("scene_analysis", out.value.scene, out),
      inputTokens: 0,
      outputTokens: 0,
      costUsd: 0,
    };
    return [context, scene];
  }

  private contextStage(run: RunState): Promise<StageResult<"context_analysis">> {
    return this.stage(run, contextKey(run.req), () => this.computeContext(run));
  }

  private sceneStage(run: RunState): Promise<StageResult<"scene_analysis">> {
    return this.stage(run, sceneKey(run.req), () => this.computeScene(run));
  }

  private async computeContext(run: RunState): Promise<StageResult<"context_analysis">> {
    const conversation = await run.conversation();
    const out = await this.callModel(run, "context_analysis", {
      prompt: this.prompt("context_analysis", {
        ...this.participantVars(run),
        conversation: formatConversation(conversation),
      }),
      options: ANALYSIS_OPTIONS,
      schema: ContextAnalysisOutputSchema,
    });
    return toStageResult("context_analysis", { ...out.value, conversation }, out);
  }

  private async computeScene(run: RunState): Promise<StageResult<"scene_analysis">> {
    const conversation = await run.conversation();
    const out = await this.callModel(run, "scene_analysis", {
      prompt: this.prompt("scene_analysis", {
        ...this.participantVars(run),
        conversation: formatConversation(conversation),
      }),
      options: ANALYSIS_OPTIONS,
      schema: SceneAnalysisOutputSchema,
    });
    return toStageResult("scene_analysis", out.value, out);
  }

  private personaStage(run: RunState, context: ContextAnalysisV0): Promise<StageResult<"persona_analysis">> {
    const participantId = run.req.participants.selfId;
    return this.stage(run, personaKey(context, participantId), async () => {
      const out = await this.callModel(run, "persona_analysis", {
        prompt: this.prompt("persona_analysis", {
          participant_id: participantId,
          summary: context.conversationSummary || "none",
          emotion_state: context.emotionState,
          intimacy_level: context.currentIntimacyLevel,
          conversation: formatConversation(context.conversation),
        }),
        options: ANALYSIS_OPTIONS,
        schema: PersonaAnalysisOutputSchema,
      });
      return toStageResult("persona_analysis", out.value, out);
    });
  }

  private replyStage(
    run: RunState,
    context: ContextAnalysisV0,
    scene: SceneAnalysisV0,
    persona: PersonaAnalysisV0,
  ): Promise<StageResult<"reply">> {
    const { quality, language } = run.req;
    return this.stage(run, replyKey({ context, scene, persona, quality, language }), async () => {
      const out = await this.callModel(run, "reply", {
        prompt: this.prompt("reply", {
          ...this.participantVars(run),
          summary: context.conversationSummary || "none",
          emotion_state: context.emotionState,
          relationship_state: scene.relationshipState,
          scenario: scene.scenario,
          strategies: listOrNone(scene.recommendedStrategies),
          pacing: persona.pacing,
          risk_tolerance: persona.riskTolerance,
          persona_summary: persona.summary,
          risk_flags: listOrNone([...context.riskFlags, ...scene.riskFlags]),
          conversation: formatConversation(context.conversation),
        }),
        options: { temperature: 0.7, maxTokens: REPLY_MAX_TOKENS[quality] },
        schema: ReplyOutputSchema,
      });
      return toStageResult("reply", out.value, out);
    });
  }

  private imageStage(run: RunState, image: ImageInput): Promise<StageResult<"image_result">> {
    return this.stage(run, imageResultKey(image), async () => {
      const out = await this.callModel(run, "image_result", {
        prompt: this.prompt("image_result", {}),
        image,
        options: ANALYSIS_OPTIONS,
        schema: ImageResultOutputSchema,
      });
      return toStageResult("image_result", out.value, out);
    });
  }

  private async materializeConversation(run: RunState): Promise<EnrichedMessageV0[]> {
    const { req } = run;
    const [screenshot, messages] = await Promise.all([
      req.image ? this.imageStage(run, req.image) : null,
      enrichConversation(req.conversation, {
        concurrency: this.ctx.config.maxConcurrency,
        resolveImage: async (url) => (await this.imageStage(run, { kind: "url", url })).payload,
      }),
    ]);
    if (!screenshot) return messages;
    return [...messages, ...screenshotMessages(screenshot.payload, messages.length, req.participants)];
  }

  /** Cache lookup, else compute and store. Failures are attributed to `key.kind`. */
  private async stage<K extends StageKind>(
    run: RunState,
    key: CacheKey<K>,
    compute: () => Promise<StageResult<K>>,
  ): Promise<StageResult<K>> {
    const startedAt = Date.now();
    let result: StageResult<K>;
    try {
      result = await this.ctx.cache.getOrCompute(key, compute, { signal: run.signal });
    } catch (err) {
      throw toPipelineError(err, key.kind);
    }
    this.record(run, result, Date.now() - startedAt);
    return result;
  }

  private record<K extends StageKind>(run: RunState, result: StageResult<K>, waitedMs: number): void {
    run.stages.push(result);
    run.log.debug(
      { event: result.fromCache ? "stage_cache_hit" : "stage_computed", stage: result.kind, provider: result.provider },
      "stage complete",
    );
    this.ctx.trace.emit({
      schemaVersion: "v0",
      type: "stage_complete",
      requestId: run.requestId,
      stage: result.kind,
      provider: result.provider,
      model: result.model,
      durationMs: result.fromCache ? waitedMs : result.durationMs,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
      fromCache: result.fromCache,
      outcome: result.fromCache ? "cache_hit" : "success",
      ts: new Date().toISOString(),
    });
  }

  private async callModel<T>(run: RunState, stage: PipelineStage, call: ModelCall<T>): Promise<ModelOutput<T>> {
    const { image } = call;
    const { adapter, completion, durationMs } = await callWithFallback(
      {
        registry: this.ctx.registry,
        trace: this.ctx.trace,
        logger: run.log,
        policy: this.ctx.config,
        random: this.ctx.random,
      },
      {
        requestId: run.requestId,
        stage,
        capability: image ? "vision" : "text",
        options: { ...call.options, signal: run.signal },
        invoke: (a, options) => (image ? a.callVision(call.prompt, image, options) : a.callText(call.prompt, options)),
      },
    );

    try {
      const value = extractStructured(completion.text, call.schema);
      return { value, adapter, completion, durationMs };
    } catch (err) {
      if (err instanceof UnparsableModelOutputError) await this.persistFailure(run, stage, err);
      throw err;
    }
  }

  private async persistFailure(run: RunState, stage: PipelineStage, err: UnparsableModelOutputError): Promise<void> {
    const record = buildFailedOutputRecord({
      requestId: run.requestId,
      stage,
      rawText: err.rawText,
      parseError: err.message,
    });
    try {
      await this.ctx.failedOutputs.save(record);
      run.log.warn(
        { event: "failed_output_persisted", stage, rawTextLength: record.rawTextLength, abandonedAt: err.abandonedAt },
        "model output could not be parsed",
      );
    } catch (saveErr) {
      run.log.error(
        { event: "failed_output_persist_error", stage, err: errorMessage(saveErr) },
        "could not persist failed model output",
      );
    }
  }

  private participantVars(run: RunState): PromptVars {
    return {
      self_id: run.req.participants.selfId,
      other_id: run.req.participants.otherId,
      language: run.req.language,
    };
  }

  private prompt(name: PromptName, vars: PromptVars): string {
    return renderPrompt(this.ctx.prompts(name), vars);
  }
}
