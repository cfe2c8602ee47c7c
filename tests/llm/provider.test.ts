import nock from "nock";

import type { ProviderConfig } from "../../src/config/pipelineConfig";
import {
  createAdapter,
  createGeminiAdapter,
  createOpenAiCompatibleAdapter,
  parseRetryAfterMs,
  ProviderError,
} from "../../src/llm/provider";

const openAiConfig: ProviderConfig = {
  id: "openai",
  kind: "openai",
  baseUrl: "http://llm.local/v1",
  apiKey: "test-key",
  textModel: "test-model",
  visionModel: "test-vision",
  priority: 0,
  timeoutMs: 2_000,
  pricing: { inputPer1k: 0, outputPer1k: 0 },
};

const geminiConfig: ProviderConfig = {
  ...openAiConfig,
  id: "gemini",
  kind: "gemini",
  baseUrl: "http://gemini.local/v1beta",
  apiKey: "test-gemini-key",
  textModel: "gemini-1.5-flash",
  visionModel: "models/gemini-1.5-pro",
};

beforeAll(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
});

afterAll(() => {
  nock.enableNetConnect();
});

describe("OpenAI-compatible adapter", () => {
  test("returns text, token counts and the served model", async () => {
    const scope = nock("http://llm.local")
      .matchHeader("authorization", "Bearer test-key")
      .post(
        "/v1/chat/completions",
        (body) => body.model === "test-model" && body.response_format.type === "json_object" && body.max_tokens === 300,
      )
      .reply(200, {
        model: "test-model-2026",
        choices: [{ message: { content: '{"a":1}' } }],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      });

    const adapter = createOpenAiCompatibleAdapter(openAiConfig);
    const out = await adapter.callText("Return JSON", { maxTokens: 300 });

    expect(out).toEqual({ text: '{"a":1}', inputTokens: 12, outputTokens: 3, model: "test-model-2026" });
    expect(scope.isDone()).toBe(true);
  });

  test("maps 429 to a rate limit carrying Retry-After", async () => {
    nock("http://llm.local").post("/v1/chat/completions").reply(429, { error: { message: "slow down" } }, { "Retry-After": "2" });

    const adapter = createOpenAiCompatibleAdapter(openAiConfig);

    await expect(adapter.callText("x")).rejects.toMatchObject({
      code: "PROVIDER_RATE_LIMITED",
      retryAfterMs: 2_000,
      message: "openai request failed (HTTP 429): slow down",
    });
  });

  test.each([
    [500, "PROVIDER_UNAVAILABLE"],
    [503, "PROVIDER_UNAVAILABLE"],
    [401, "PROVIDER_UNAVAILABLE"],
    [408, "PROVIDER_TIMEOUT"],
    [400, "PROVIDER_REQUEST_INVALID"],
    [422, "PROVIDER_REQUEST_INVALID"],
  ])("maps HTTP %i to %s", async (status, code) => {
    nock("http://llm.local").post("/v1/chat/completions").reply(status, { error: { message: "nope" } });

    const adapter = createOpenAiCompatibleAdapter(openAiConfig);

    await expect(adapter.callText("x")).rejects.toMatchObject({ code });
  });

  test("sends images as an image_url part to the vision model", async () => {
    const scope = nock("http://llm.local")
      .post(
        "/v1/chat/completions",
        (body) =>
          body.model === "test-vision" &&
          body.messages[1].content[0].text === "Read this" &&
          body.messages[1].content[1].image_url.url === "data:image/png;base64,eA==",
      )
      .reply(200, { choices: [{ message: { content: "{}" } }] });

    const adapter = createOpenAiCompatibleAdapter(openAiConfig);
    const out = await adapter.callVision("Read this", { kind: "bytes", bytes: Buffer.from("x"), contentType: "image/png" });

    expect(out).toEqual({ text: "{}", inputTokens: 0, outputTokens: 0, model: "test-vision" });
    expect(scope.isDone()).toBe(true);
  });

  test("declares and enforces its capabilities", async () => {
    const textOnly = createOpenAiCompatibleAdapter({ ...openAiConfig, visionModel: null });

    expect(textOnly.capabilities).toEqual(["text"]);
    await expect(
      textOnly.callVision("x", { kind: "url", url: "https://example.com/a.png" }),
    ).rejects.toMatchObject({ code: "CAPABILITY_UNSUPPORTED" });
  });

  test("an aborted signal becomes a timeout", async () => {
    const controller = new AbortController();
    controller.abort();

    const adapter = createOpenAiCompatibleAdapter(openAiConfig);
    const err = await adapter.callText("x", { signal: controller.signal }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ code: "PROVIDER_TIMEOUT" });
  });
});

describe("Gemini adapter", () => {
  test("calls generateContent with the API key and reads usage metadata", async () => {
    nock("http://gemini.local")
      .post("/v1beta/models/gemini-1.5-flash:generateContent", (body) => body.contents[0].parts[0].text === "Return JSON")
      .query({ key: "test-gemini-key" })
      .reply(200, {
        candidates: [{ content: { parts: [{ text: '{"b":2}' }] } }],
        usageMetadata: { promptTokenCount: 7, candidatesTokenCount: 2 },
      });

    const adapter = createGeminiAdapter(geminiConfig);

    await expect(adapter.callText("Return JSON")).resolves.toEqual({
      text: '{"b":2}',
      inputTokens: 7,
      outputTokens: 2,
      model: "gemini-1.5-flash",
    });
  });

  test("inlines URL images as bytes for the vision model", async () => {
    nock("http://img.local").get("/a.png").reply(200, Buffer.from("png"), { "Content-Type": "image/png" });
    const scope = nock("http://gemini.local")
      .post(
        "/v1beta/models/gemini-1.5-pro:generateContent",
        (body) => body.contents[0].parts[1].inlineData.mimeType === "image/png" && body.contents[0].parts[1].inlineData.data === "cG5n",
      )
      .query(true)
      .reply(200, { candidates: [{ content: { parts: [{ text: "{}" }] } }] });

    const adapter = createAdapter(geminiConfig);
    await adapter.callVision("Read", { kind: "url", url: "http://img.local/a.png" });

    expect(scope.isDone()).toBe(true);
  });

  test("maps a failed image download onto the error taxonomy", async () => {
    nock("http://img.local").get("/missing.png").reply(404);

    const adapter = createGeminiAdapter(geminiConfig);

    await expect(adapter.callVision("Read", { kind: "url", url: "http://img.local/missing.png" })).rejects.toMatchObject({
      code: "PROVIDER_REQUEST_INVALID",
    });
  });
});

describe("parseRetryAfterMs", () => {
  const now = Date.parse("2026-01-01T00:00:00Z");

  test("reads seconds and HTTP dates", () => {
    expect(parseRetryAfterMs("3", now)).toBe(3_000);
    expect(parseRetryAfterMs("Thu, 01 Jan 2026 00:00:05 GMT", now)).toBe(5_000);
  });

  test("ignores empty and unparseable values", () => {
    expect(parseRetryAfterMs(undefined, now)).toBeNull();
    expect(parseRetryAfterMs("", now)).toBeNull();
    expect(parseRetryAfterMs("soon", now)).toBeNull();
  });
});
