import { ProviderError } from "../../src/llm/provider";
import { PipelineError } from "../../src/pipeline/errors";
import { Orchestrator } from "../../src/pipeline/orchestrator";
import type { PipelineRequestInput } from "../../src/pipeline/schemas/pipelineRequestV0";
import { TraceEventV0Schema } from "../../src/telemetry/schemas/traceEventV0";
import { countCalls, type FakeCall, fakeAdapter, promptKind, scripted, testContext } from "../helpers/fakes";

const request: PipelineRequestInput = {
  requestId: "req-1",
  conversation: [
    { speaker: "u1", text: "Are you free this weekend?" },
    { speaker: "u2", text: "Maybe! What did you have in mind?" },
  ],
  participants: { selfId: "u1", otherId: "u2" },
};

async function failureOf(promise: Promise<unknown>): Promise<PipelineError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (err instanceof PipelineError) return err;
  throw new Error(`expected a PipelineError, got ${String(err)}`);
}

function kindsOf(stages: { kind: string }[]): string[] {
  return stages.map((s) => s.kind).sort();
}

describe("Orchestrator (traditional)", () => {
  test("runs context, scene, persona and reply once each", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted(), pricing: { inputPer1k: 1, outputPer1k: 2 } });
    const { ctx, trace } = testContext([llm]);

    const result = await new Orchestrator(ctx).run(request);

    expect(result).toMatchObject({
      requestId: "req-1",
      strategy: "traditional",
      replyText: "Saturday it is! Trailhead at 9?",
      replyStrategy: "ask_followup",
      totalInputTokens: 400,
      totalOutputTokens: 80,
    });
    expect(result.totalCostUsd).toBeCloseTo(0.56, 10);
    expect(kindsOf(result.stages)).toEqual(["context_analysis", "persona_analysis", "reply", "scene_analysis"]);
    expect(result.stages.every((s) => !s.fromCache && s.provider === "primary")).toBe(true);
    expect(llm.calls.map((c) => promptKind(c.prompt)).sort()).toEqual(["context", "persona", "reply", "scene"]);
    expect(trace.events.filter((e) => e.type === "provider_attempt")).toHaveLength(4);
    expect(trace.events.filter((e) => e.type === "stage_complete")).toHaveLength(4);
    expect(trace.events.every((e) => TraceEventV0Schema.safeParse(e).success)).toBe(true);
  });

  test("persona starts after context and reply after everything else", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted(), delayMs: 5 });
    const { ctx } = testContext([llm]);

    const result = await new Orchestrator(ctx).run(request);

    const order = result.stages.map((s) => s.kind);
    expect(order.indexOf("persona_analysis")).toBeGreaterThan(order.indexOf("context_analysis"));
    expect(order[order.length - 1]).toBe("reply");
  });

  test("a repeated request is served entirely from the cache", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx, trace } = testContext([llm]);
    const orchestrator = new Orchestrator(ctx);

    await orchestrator.run(request);
    const again = await orchestrator.run(request, { requestId: "req-2" });

    expect(llm.calls).toHaveLength(4);
    expect(again.stages.every((s) => s.fromCache)).toBe(true);
    expect(again).toMatchObject({ replyText: "Saturday it is! Trailhead at 9?", totalInputTokens: 0, totalCostUsd: 0 });
    const cachedEvents = trace.events.filter((e) => e.requestId === "req-2");
    expect(cachedEvents.map((e) => [e.type, e.fromCache, e.outcome])).toEqual(
      Array.from({ length: 4 }, () => ["stage_complete", true, "cache_hit"]),
    );
  });

  test("changing a returned stage does not change what later runs see", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx } = testContext([llm]);
    const orchestrator = new Orchestrator(ctx);

    const first = await orchestrator.run(request);
    const reply = first.stages.find((s) => s.kind === "reply");
    if (reply && "text" in reply.payload) reply.payload.text = "changed";

    const again = await orchestrator.run(request);

    expect(again.replyText).toBe("Saturday it is! Trailhead at 9?");
    expect(llm.calls).toHaveLength(4);
  });

  test("concurrent identical requests share every upstream call", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted(), delayMs: 5 });
    const { ctx } = testContext([llm]);
    const orchestrator = new Orchestrator(ctx);

    const [a, b] = await Promise.all([orchestrator.run(request), orchestrator.run(request, { requestId: "req-2" })]);

    expect(llm.calls).toHaveLength(4);
    expect(a.replyText).toBe(b.replyText);
  });

  test("quality tier sets the reply budget and keys the reply separately", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx } = testContext([llm]);
    const orchestrator = new Orchestrator(ctx);

    await orchestrator.run({ ...request, quality: "premium" });
    await orchestrator.run({ ...request, quality: "cheap" });

    const replyCalls = llm.calls.filter((c) => promptKind(c.prompt) === "reply");
    expect(replyCalls.map((c) => c.options.maxTokens)).toEqual([1000, 300]);
    expect(countCalls(llm, "context")).toBe(1);
  });

  test("falls back to the next provider and reports it on every stage", async () => {
    const busy = fakeAdapter({
      id: "busy",
      priority: 0,
      respond: () => {
        throw new ProviderError("PROVIDER_RATE_LIMITED", "busy");
      },
    });
    const spare = fakeAdapter({ id: "spare", priority: 1, respond: scripted() });
    const { ctx } = testContext([busy, spare]);

    const result = await new Orchestrator(ctx).run(request);

    expect(result.stages.map((s) => s.provider)).toEqual(["spare", "spare", "spare", "spare"]);
    expect(busy.calls).toHaveLength(4);
  });
});

describe("Orchestrator (merged)", () => {
  test("one merged call stands in for context and scene", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx } = testContext([llm]);

    const result = await new Orchestrator(ctx).run(request, { strategy: "merged" });

    expect(result.strategy).toBe("merged");
    expect(result.replyText).toBe("Saturday it is! Trailhead at 9?");
    expect(llm.calls.map((c) => promptKind(c.prompt))).toEqual(["merged", "persona", "reply"]);
    expect(result.stages.map((s) => s.kind)).toEqual([
      "context_analysis",
      "scene_analysis",
      "persona_analysis",
      "reply",
    ]);
    expect(result.totalInputTokens).toBe(300);
  });

  test("a merged run satisfies a later traditional run from the cache", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx } = testContext([llm]);
    const orchestrator = new Orchestrator(ctx);

    await orchestrator.run(request, { strategy: "merged" });
    const traditional = await orchestrator.run(request, { strategy: "traditional" });

    expect(llm.calls).toHaveLength(3);
    expect(traditional.stages.every((s) => s.fromCache)).toBe(true);
    expect(kindsOf(traditional.stages)).toEqual(["context_analysis", "persona_analysis", "reply", "scene_analysis"]);
  });

  test("a traditional run satisfies a later merged run without a merged call", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx } = testContext([llm]);
    const orchestrator = new Orchestrator(ctx);

    await orchestrator.run(request);
    const merged = await orchestrator.run(request, { strategy: "merged" });

    expect(countCalls(llm, "merged")).toBe(0);
    expect(llm.calls).toHaveLength(4);
    expect(merged.stages.every((s) => s.fromCache)).toBe(true);
  });

  test("a merged response missing a section fails the merged call", async () => {
    const llm = fakeAdapter({
      id: "primary",
      respond: scripted({ merged: JSON.stringify({ conversation_analysis: { conversation_summary: "x" } }) }),
    });
    const { ctx, failedOutputs } = testContext([llm]);

    const err = await failureOf(new Orchestrator(ctx).run(request, { strategy: "merged" }));

    expect(err).toMatchObject({ stage: "merged_analysis", kind: "UNPARSABLE_MODEL_OUTPUT" });
    expect(failedOutputs.records.map((r) => r.stage)).toEqual(["merged_analysis"]);
  });
});

describe("Orchestrator failures", () => {
  test("unparsable output names the stage, records the raw text and keeps earlier stages cached", async () => {
    let replyOutput = "I'm sorry, I can't answer in that format.";
    const llm = fakeAdapter({
      id: "primary",
      respond: (call: FakeCall) => (promptKind(call.prompt) === "reply" ? replyOutput : scripted()(call)),
    });
    const { ctx, failedOutputs } = testContext([llm]);
    const orchestrator = new Orchestrator(ctx);

    const err = await failureOf(orchestrator.run(request, { requestId: "req-fail" }));

    expect(err).toMatchObject({ stage: "reply", kind: "UNPARSABLE_MODEL_OUTPUT" });
    expect(failedOutputs.records).toHaveLength(1);
    expect(failedOutputs.records[0]).toMatchObject({
      requestId: "req-fail",
      stage: "reply",
      rawTextTruncated: replyOutput,
      rawTextLength: replyOutput.length,
    });
    expect(failedOutputs.records[0].parseError).toContain("object_scan");

    replyOutput = JSON.stringify({ reply: "Sounds fun!" });
    const retry = await orchestrator.run(request);

    expect(retry.replyText).toBe("Sounds fun!");
    expect(retry.replyStrategy).toBeNull();
    expect(llm.calls).toHaveLength(5);
    expect(retry.stages.filter((s) => !s.fromCache).map((s) => s.kind)).toEqual(["reply"]);
  });

  test("exhausted providers fail the stage with the provider's error kind", async () => {
    const llm = fakeAdapter({
      id: "primary",
      respond: (call: FakeCall) => {
        if (promptKind(call.prompt) === "scene") throw new ProviderError("PROVIDER_UNAVAILABLE", "down");
        return scripted()(call);
      },
    });
    const { ctx } = testContext([llm]);

    const err = await failureOf(new Orchestrator(ctx).run(request));

    expect(err).toMatchObject({ stage: "scene_analysis", kind: "PROVIDER_UNAVAILABLE" });
    expect(err.cause).toBeInstanceOf(ProviderError);
  });

  test("an invalid request fails before any call", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx } = testContext([llm]);

    const err = await failureOf(new Orchestrator(ctx).run({ conversation: [], participants: { selfId: "u1", otherId: "u2" } }));

    expect(err).toMatchObject({ stage: null, kind: "INVALID_REQUEST" });
    expect(err.message).toBe("Invalid pipeline request (conversation: conversation or image is required)");
    expect(llm.calls).toHaveLength(0);
  });

  test("the deadline aborts the run with a timeout", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted(), delayMs: 500 });
    const { ctx } = testContext([llm]);

    const err = await failureOf(new Orchestrator(ctx).run(request, { deadlineMs: 20 }));

    expect(err.kind).toBe("TIMEOUT");
    expect(["context_analysis", "scene_analysis"]).toContain(err.stage);
  });
});

describe("Orchestrator images", () => {
  test("reads screenshots and image entries through the image stage", async () => {
    const llm = fakeAdapter({ id: "primary", vision: true, respond: scripted() });
    const { ctx } = testContext([llm]);

    const result = await new Orchestrator(ctx).run({
      ...request,
      conversation: [
        { speaker: "u1", text: "look at this" },
        { speaker: "u2", text: "https://img.local/photo.png", kind: "image" },
      ],
      image: { kind: "url", url: "https://img.local/screenshot.png" },
    });

    const visionCalls = llm.calls.filter((c) => c.image !== null);
    expect(visionCalls.map((c) => c.image)).toEqual(
      expect.arrayContaining([
        { kind: "url", url: "https://img.local/photo.png" },
        { kind: "url", url: "https://img.local/screenshot.png" },
      ]),
    );
    expect(visionCalls).toHaveLength(2);
    expect(result.stages.filter((s) => s.kind === "image_result")).toHaveLength(2);

    const contextPrompt = llm.calls.find((c) => promptKind(c.prompt) === "context")?.prompt ?? "";
    expect(contextPrompt).toContain("u1: look at this\nu2: other: Saturday works for me\nu2: Saturday works for me");
  });

  test("a screenshot-only request is accepted", async () => {
    const llm = fakeAdapter({ id: "primary", vision: true, respond: scripted() });
    const { ctx } = testContext([llm]);

    const result = await new Orchestrator(ctx).run({
      participants: { selfId: "u1", otherId: "u2" },
      image: { kind: "bytes", bytes: Buffer.from("png-bytes"), contentType: "image/png" },
    });

    expect(result.replyText).toBe("Saturday it is! Trailhead at 9?");
    expect(countCalls(llm, "image")).toBe(1);
  });

  test("without a vision provider the image stage fails", async () => {
    const llm = fakeAdapter({ id: "primary", respond: scripted() });
    const { ctx } = testContext([llm]);

    const err = await failureOf(
      new Orchestrator(ctx).run({ ...request, image: { kind: "url", url: "https://img.local/screenshot.png" } }),
    );

    expect(err).toMatchObject({ stage: "image_result", kind: "CAPABILITY_UNSUPPORTED" });
  });
});
